/**
 * Enrichment type definitions
 *
 * Task ledger rows, orchestration inputs/outputs and the normalized payloads
 * produced by the per-kind result parsers.
 */

/**
 * Enrichment job kind (wire name used by the provider paths and the ledger)
 */
export type TaskKind =
  | "reviews"
  | "my_business_info"
  | "my_business_updates"
  | "questions_and_answers"
  | "social_profiles";

/**
 * Kinds tracked through the provider queue (task_post / tasks_ready / task_get)
 */
export type PolledTaskKind = Exclude<TaskKind, "social_profiles">;

/**
 * Kinds submitted and fetched in one live call
 */
export type LiveTaskKind = "social_profiles";

/**
 * Task lifecycle status
 *
 * Created -> Pending -> Ready -> Populated | CompletedNoData
 * Any non-terminal -> Error
 */
export type TaskStatus =
  | "Created"
  | "Pending"
  | "Ready"
  | "Populated"
  | "CompletedNoData"
  | "Error";

/**
 * Ledger row as stored (kind/status are plain TEXT columns)
 */
export type EnrichmentTaskDbRow = Omit<EnrichmentTaskRow, "kind" | "status"> & {
  kind: string;
  status: string;
};

/**
 * Task ledger row (enrichment_tasks table)
 */
export type EnrichmentTaskRow = {
  /** Local row id (used by populate-by-id) */
  id: number;
  /** Provider task id, or "{kind}-err-{uuid}" for local submission failures */
  remote_task_id: string;
  kind: TaskKind;
  place_id: string;
  location_name: string | null;
  status: TaskStatus;
  status_code: number | null;
  status_message: string | null;
  /** Cached task_get path */
  endpoint: string | null;
  created_at: string;
  last_checked_at: string | null;
  ready_at: string | null;
  populated_at: string | null;
  last_attempted_populate_at: string | null;
  last_populate_count: number | null;
  callback_received_at: string | null;
  callback_task_id: string | null;
  last_error: string | null;
};

/**
 * Input for insertOrMergeTask (upsert by remote_task_id)
 */
export type EnrichmentTaskInput = {
  remote_task_id: string;
  kind: TaskKind;
  place_id: string;
  location_name?: string | null;
  status: TaskStatus;
  status_code?: number | null;
  status_message?: string | null;
  endpoint?: string | null;
  last_error?: string | null;
  ready_at?: string | null;
  /** Defaults to now; only applied on insert */
  created_at?: string;
};

/**
 * Place selected for enrichment by the ingestion pipeline
 */
export type PlaceEnrichmentTarget = {
  placeId: string;
  locationName?: string | null;
  lat?: number | null;
  lng?: number | null;
  radiusMeters?: number | null;
  /** Known review count, used as the review depth when present */
  reviewCount?: number | null;
};

/**
 * Staleness decision for one (place, kind)
 */
export type ScheduleDecision = {
  kind: TaskKind;
  due: boolean;
  /** Milliseconds until the kind becomes due again (0 when due) */
  remainingMs: number;
  lastCreatedAt: string | null;
};

export type EnrichPlacesResult = {
  submitted: number;
  skipped: number;
  failed: number;
  /** Rows touched by the reconciliation pass that follows submission */
  touched: number;
};

export type PopulateResult = {
  success: boolean;
  message: string;
  itemCount: number;
};

export type BulkPopulateResult = {
  attempted: number;
  succeeded: number;
  failed: number;
  itemCount: number;
};

export type CallbackInput = {
  remoteIdHint?: string | null;
  tagHint?: string | null;
  /** Raw callback body (JSON text) */
  payload: string;
};

export type CallbackResult = {
  accepted: boolean;
  message: string;
};

// ============================================================================
// Normalized result payloads
// ============================================================================

export type ReviewPayload = {
  reviewId: string;
  reviewUrl: string | null;
  profileName: string | null;
  profileUrl: string | null;
  profileImageUrl: string | null;
  reviewText: string | null;
  originalReviewText: string | null;
  originalLanguage: string | null;
  rating: number | null;
  reviewsCount: number | null;
  photosCount: number | null;
  localGuide: boolean | null;
  timeAgo: string | null;
  reviewTimestamp: string | null;
  ownerAnswer: string | null;
  originalOwnerAnswer: string | null;
  ownerTimeAgo: string | null;
  ownerTimestamp: string | null;
  rawJson: string;
};

export type BusinessInfoPayload = {
  description: string | null;
  photoCount: number | null;
  additionalCategories: string[];
  placeTopics: string[];
  logoUrl: string | null;
  mainPhotoUrl: string | null;
  rawJson: string | null;
};

export type UpdateLink = {
  type: string | null;
  title: string | null;
  url: string | null;
};

export type UpdatePayload = {
  updateKey: string;
  postText: string | null;
  url: string | null;
  imageUrls: string[];
  postDate: string | null;
  links: UpdateLink[];
  rawJson: string;
};

export type QuestionAnswerPayload = {
  qaKey: string;
  questionText: string | null;
  questionTimestamp: string | null;
  questionProfileName: string | null;
  answerText: string | null;
  answerTimestamp: string | null;
  answerProfileName: string | null;
  rawJson: string;
};

export type SocialPlatform =
  | "facebook"
  | "instagram"
  | "linkedin"
  | "x"
  | "youtube"
  | "tiktok"
  | "pinterest"
  | "bluesky";

export type SocialProfileSet = Partial<Record<SocialPlatform, string>>;

/**
 * Parsed task result for one kind
 */
export type KindSnapshot<TItem> = {
  statusCode: number;
  statusMessage: string | null;
  isCompleted: boolean;
  items: TItem[];
};
