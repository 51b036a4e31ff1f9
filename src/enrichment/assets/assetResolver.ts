/**
 * Asset resolver for business logo / main photo URLs
 *
 * Remote assets are downloaded once under a content-addressed file name
 * (first 16 hex chars of sha256(url) + extension). A failed download keeps
 * the previously stored local path (last good wins).
 */

import { createHash } from "node:crypto";
import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import { extname, join } from "path";
import type { HttpRequestFn } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { ASSET_HASH_LENGTH, DEFAULT_ASSET_EXTENSION } from "@/constants";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

const KNOWN_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".gif", ".webp", ".svg", ".bmp"]);

/**
 * Asset download timeout (milliseconds)
 */
const ASSET_DOWNLOAD_TIMEOUT_MS = 20_000;

export interface AssetResolverConfig {
  assetsDir: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
}

function isRemoteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Content-addressed file name for a source URL
 *
 * @example
 * assetFileName("https://cdn.example.com/logo.PNG?size=2") // => "<16 hex>.png"
 */
export function assetFileName(url: string): string {
  const hash = createHash("sha256").update(url, "utf8").digest("hex").substring(0, ASSET_HASH_LENGTH);

  let extension = DEFAULT_ASSET_EXTENSION;
  try {
    const candidate = extname(new URL(url).pathname).toLowerCase();
    if (KNOWN_EXTENSIONS.has(candidate)) {
      extension = candidate;
    }
  } catch {
    extension = DEFAULT_ASSET_EXTENSION;
  }

  return `${hash}${extension}`;
}

export class AssetResolver {
  private readonly assetsDir: string;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: AssetResolverConfig) {
    this.assetsDir = config.assetsDir;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  /**
   * Resolve a source URL to a local path
   *
   * @param url - Source URL from the provider (null = nothing to resolve)
   * @param priorLocalPath - Path stored for this asset before this run
   * @returns Local path to store (null only when nothing is known)
   */
  async resolve(
    url: string | null,
    priorLocalPath: string | null,
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (!url) {
      return priorLocalPath;
    }
    if (!isRemoteUrl(url)) {
      logger.debug("Asset URL is not downloadable, keeping prior asset", { url });
      return priorLocalPath;
    }

    const localPath = join(this.assetsDir, assetFileName(url));
    if (existsSync(localPath)) {
      return localPath;
    }

    try {
      const body = await this.httpRequest<unknown>({
        method: "GET",
        url,
        responseType: "buffer",
        timeoutMs: ASSET_DOWNLOAD_TIMEOUT_MS,
        signal,
      });

      if (!Buffer.isBuffer(body) || body.length === 0) {
        logger.warn("Asset download returned no content", { url });
        return priorLocalPath;
      }

      await mkdir(this.assetsDir, { recursive: true });
      await writeFile(localPath, body);
      logger.debug("Asset stored", { url, localPath, bytes: body.length });
      return localPath;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn("Asset download failed, keeping prior asset", {
        url,
        priorLocalPath,
        error: errorMessage(error),
      });
      return priorLocalPath;
    }
  }
}
