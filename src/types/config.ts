/**
 * Configuration type definitions
 */

import type { TaskKind } from "./enrichment";

export type DataForSeoSettings = {
  baseUrl: string;
  login: string;
  password: string;
  /** Sent as postback_url with every submission when non-empty */
  postbackUrl: string;
  languageCode: string;
  reviewsDepth: number;
  updatesDepth: number;
  questionsDepth: number;
};

export type EnrichmentConfig = {
  dataForSeo: DataForSeoSettings;
  /** Staleness threshold per kind, in hours (0 = always due) */
  refreshHours: Record<TaskKind, number>;
  assetsDir: string;
  runner: {
    intervalMs: number;
  };
  server: {
    port: number;
    host: string;
  };
};
