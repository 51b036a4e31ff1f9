/**
 * Enrichment configuration loader
 *
 * Reads the environment (populated by dotenv in entrypoints) into a typed
 * EnrichmentConfig. Invalid numbers fall back to defaults with a warning.
 */

import type { EnrichmentConfig, TaskKind } from "@/types";
import {
  DATAFORSEO_DEFAULT_BASE_URL,
  DEFAULT_REFRESH_HOURS,
  DEFAULT_RUNNER_INTERVAL_MS,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  MAX_REFRESH_HOURS,
} from "@/constants";
import * as logger from "@/logger";

type Env = Record<string, string | undefined>;

const DEFAULT_LANGUAGE_CODE = "en";
const DEFAULT_REVIEWS_DEPTH = 100;
const DEFAULT_UPDATES_DEPTH = 100;
const DEFAULT_QA_DEPTH = 20;
const DEFAULT_ASSETS_DIR = "data/assets";

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

/**
 * Read a finite number clamped to [min, max]; fallback when missing or invalid
 */
function readNumber(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn("Ignoring invalid numeric setting", { key, value: raw, fallback });
    return fallback;
  }

  return Math.min(max, Math.max(min, value));
}

/**
 * Environment key of a kind's refresh threshold, e.g. ENRICH_REFRESH_HOURS_MY_BUSINESS_INFO
 */
export function refreshHoursEnvKey(kind: TaskKind): string {
  return `ENRICH_REFRESH_HOURS_${kind.toUpperCase()}`;
}

export function loadEnrichmentConfig(env: Env = process.env): EnrichmentConfig {
  const hours = (kind: TaskKind): number =>
    readNumber(env, refreshHoursEnvKey(kind), DEFAULT_REFRESH_HOURS, 0, MAX_REFRESH_HOURS);

  const refreshHours: Record<TaskKind, number> = {
    reviews: hours("reviews"),
    my_business_info: hours("my_business_info"),
    my_business_updates: hours("my_business_updates"),
    questions_and_answers: hours("questions_and_answers"),
    social_profiles: hours("social_profiles"),
  };

  return {
    dataForSeo: {
      baseUrl: readString(env, "DATAFORSEO_BASE_URL", DATAFORSEO_DEFAULT_BASE_URL).replace(
        /\/+$/,
        "",
      ),
      login: readString(env, "DATAFORSEO_LOGIN", ""),
      password: readString(env, "DATAFORSEO_PASSWORD", ""),
      postbackUrl: readString(env, "DATAFORSEO_POSTBACK_URL", ""),
      languageCode: readString(env, "DATAFORSEO_LANGUAGE_CODE", DEFAULT_LANGUAGE_CODE),
      reviewsDepth: Math.trunc(
        readNumber(env, "DATAFORSEO_REVIEWS_DEPTH", DEFAULT_REVIEWS_DEPTH, 1, 4490),
      ),
      updatesDepth: Math.trunc(
        readNumber(env, "DATAFORSEO_UPDATES_DEPTH", DEFAULT_UPDATES_DEPTH, 1, 1000),
      ),
      questionsDepth: Math.trunc(
        readNumber(env, "DATAFORSEO_QA_DEPTH", DEFAULT_QA_DEPTH, 1, 1000),
      ),
    },
    refreshHours,
    assetsDir: readString(env, "ASSETS_DIR", DEFAULT_ASSETS_DIR),
    runner: {
      intervalMs: readNumber(
        env,
        "RUNNER_INTERVAL_MS",
        DEFAULT_RUNNER_INTERVAL_MS,
        1_000,
        24 * 60 * 60 * 1000,
      ),
    },
    server: {
      port: Math.trunc(readNumber(env, "PORT", DEFAULT_SERVER_PORT, 0, 65535)),
      host: readString(env, "HOST", DEFAULT_SERVER_HOST),
    },
  };
}
