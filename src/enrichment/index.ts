/**
 * Enrichment module public API
 */

export {
  EnrichmentOrchestrator,
  clampLatestLimit,
  createEnrichmentOrchestrator,
  enrichmentTargetFromPlace,
} from "./orchestrator";
export type { EnrichmentOrchestratorDeps } from "./orchestrator";
export { reconcileTasks } from "./reconcile";
export type { ReconcileDeps } from "./reconcile";
export { handleCallback } from "./callbackHandler";
export { materializeTask } from "./materializer";
export type { MaterializerDeps, MaterializeOptions } from "./materializer";
export { evaluateSchedule, selectDueKinds, formatCooldown } from "./schedulingPolicy";
export type { LatestTasksByKind } from "./schedulingPolicy";
export {
  buildBusinessInfoItem,
  buildQuestionsAndAnswersItem,
  buildReviewsItem,
  buildSocialProfilesItem,
  buildUpdatesItem,
  submitBusinessInfo,
} from "./submission";
export type { BusinessInfoPayloadMode, SubmissionSettings } from "./submission";
export { AssetResolver, assetFileName } from "./assets/assetResolver";
export { computeQuestionAnswerKey, computeUpdateKey } from "./identity/itemKeys";
export {
  classifyStatusCode,
  isAllKindsFilter,
  isLiveKind,
  isPolledKind,
  isTerminalStatus,
  normalizeTaskKind,
  normalizeTaskStatus,
} from "./taskKinds";
export type { StatusCodeClass } from "./taskKinds";
