/**
 * Credential cache for the DataForSEO Basic auth header
 *
 * Owned by one client instance. The header is rebuilt from the credential
 * loader once it expires or after invalidate() (e.g. on HTTP 401).
 */

import type { DataForSeoCredentials } from "@/types";
import { DATAFORSEO_CREDENTIAL_TTL_MS } from "@/constants";
import { ConfigError } from "@/config";
import * as logger from "@/logger";

export type CredentialLoader = () => DataForSeoCredentials;

export class CredentialCache {
  private header: string | null = null;
  private expiresAt = 0;

  constructor(
    private readonly loader: CredentialLoader,
    private readonly ttlMs: number = DATAFORSEO_CREDENTIAL_TTL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Cached Authorization header, refreshed when expired
   *
   * @throws {ConfigError} When the loader yields an empty login or password
   */
  getOrRefresh(): string {
    const now = this.clock();
    if (this.header && now < this.expiresAt) {
      return this.header;
    }

    const { login, password } = this.loader();
    if (!login || !password) {
      throw new ConfigError(
        "DATAFORSEO_LOGIN",
        "DataForSEO credentials are not configured (DATAFORSEO_LOGIN / DATAFORSEO_PASSWORD).",
      );
    }

    const encoded = Buffer.from(`${login}:${password}`, "utf-8").toString("base64");
    this.header = `Basic ${encoded}`;
    this.expiresAt = now + this.ttlMs;
    logger.debug("DataForSEO auth header refreshed");
    return this.header;
  }

  invalidate(): void {
    this.header = null;
    this.expiresAt = 0;
  }
}
