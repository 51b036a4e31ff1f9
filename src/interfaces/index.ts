export type { EnrichmentGateway } from "./clients/enrichmentGateway";
