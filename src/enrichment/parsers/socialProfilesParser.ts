/**
 * Social profiles result parser
 *
 * Walks the whole result tree collecting URL strings, classifies each by
 * hostname and keeps the first URL found per platform.
 */

import type { FetchResult, JsonValue, KindSnapshot, SocialPlatform, SocialProfileSet } from "@/types";
import { SOCIAL_PLATFORM_HOSTS, SOCIAL_PLATFORMS } from "@/constants";
import { isJsonObject } from "@/utils";
import { toSnapshot } from "./shared";

/**
 * Collect URL-looking strings depth-first, in document order
 */
export function collectUrls(node: JsonValue, into: string[] = []): string[] {
  if (typeof node === "string") {
    const value = node.trim();
    if (/^https?:\/\//i.test(value) || /^www\./i.test(value)) {
      into.push(value);
    }
  } else if (Array.isArray(node)) {
    for (const entry of node) {
      collectUrls(entry, into);
    }
  } else if (isJsonObject(node)) {
    for (const value of Object.values(node)) {
      collectUrls(value, into);
    }
  }
  return into;
}

function toUrl(candidate: string): URL | null {
  const withScheme = /^https?:\/\//i.test(candidate) ? candidate : `https://${candidate}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

/**
 * Platform of a profile URL; null for other hosts and bare platform home pages
 */
export function classifySocialUrl(candidate: string): SocialPlatform | null {
  const url = toUrl(candidate);
  if (!url) {
    return null;
  }

  const host = url.hostname.toLowerCase().replace(/^(www|m|mobile)\./, "");
  if (url.pathname === "/" || url.pathname === "") {
    return null;
  }

  for (const platform of SOCIAL_PLATFORMS) {
    const hosts = SOCIAL_PLATFORM_HOSTS[platform];
    if (hosts.some((h) => host === h || host.endsWith(`.${h}`))) {
      return platform;
    }
  }
  return null;
}

export function extractSocialProfiles(node: JsonValue): SocialProfileSet {
  const profiles: SocialProfileSet = {};
  for (const candidate of collectUrls(node)) {
    const platform = classifySocialUrl(candidate);
    if (platform && !profiles[platform]) {
      profiles[platform] = candidate;
    }
  }
  return profiles;
}

/**
 * Zero or one profile set (only when at least one platform was found)
 */
export function parseSocialProfiles(fetched: FetchResult): KindSnapshot<SocialProfileSet> {
  const profiles = extractSocialProfiles(fetched.results ?? []);
  const found = Object.keys(profiles).length > 0;
  return toSnapshot(fetched, found ? [profiles] : []);
}
