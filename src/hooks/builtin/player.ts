import type { HookContext, HookPlayerUrl, HookResult, PlayerHook } from "../types.js";
import { HookResults } from "../types.js";
import type { ResolvedHookOptions } from "./options.js";
import { setHeader, setHeaderIfMissing } from "../../utils/headers.js";
import { findDomain, getHostname, getOrigin, getPathExtension } from "../../utils/url-helpers.js";

/**
 * Path extensions that identify a playable stream
 */
export const DIRECT_MEDIA_EXTENSIONS = new Set(["mp4", "m3u8", "flv", "avi", "mkv", "mov", "wmv", "webm", "ts", "m4a", "mp3"]);

/**
 * Query parameters that only bust caches or track clicks
 */
export const TRACKING_PARAMS = new Set(["t", "timestamp", "time", "r", "random", "cache", "_"]);

export function isDirectMediaUrl(url: string): boolean {
  return DIRECT_MEDIA_EXTENSIONS.has(getPathExtension(url));
}

export function requiresSecondaryParse(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes("parse") || lower.includes("jx.");
}

export class M3u8Hook implements PlayerHook {
  readonly name = "M3u8";
  readonly description = "HLS playlist headers";
  readonly priority = 10;

  matches(context: HookContext<HookPlayerUrl>): boolean {
    return getPathExtension(context.value.processedUrl) === "m3u8";
  }

  execute(context: HookContext<HookPlayerUrl>): HookResult<HookPlayerUrl> {
    const playerUrl = context.value;
    setHeader(playerUrl.headers, "Accept", "application/vnd.apple.mpegurl");
    const origin = getOrigin(playerUrl.processedUrl);
    if (origin) {
      setHeaderIfMissing(playerUrl.headers, "Referer", origin);
    }
    return HookResults.success(playerUrl);
  }
}

export class Mp4Hook implements PlayerHook {
  readonly name = "Mp4";
  readonly description = "Progressive download headers";
  readonly priority = 20;

  matches(context: HookContext<HookPlayerUrl>): boolean {
    return getPathExtension(context.value.processedUrl) === "mp4";
  }

  execute(context: HookContext<HookPlayerUrl>): HookResult<HookPlayerUrl> {
    const playerUrl = context.value;
    setHeader(playerUrl.headers, "Accept", "video/mp4,video/*;q=0.9,*/*;q=0.8");
    setHeader(playerUrl.headers, "Range", "bytes=0-");
    return HookResults.success(playerUrl);
  }
}

/**
 * Cleans the play URL, attaches playback headers and decides whether the
 * player can open it directly or it needs a secondary parse step
 */
export class PlayerUrlHook implements PlayerHook {
  readonly name = "PlayerUrl";
  readonly description = "Clean, upgrade and classify play URLs";
  readonly priority = 70;

  constructor(private readonly options: ResolvedHookOptions) {}

  matches(context: HookContext<HookPlayerUrl>): boolean {
    return context.value.processedUrl.length > 0;
  }

  execute(context: HookContext<HookPlayerUrl>): HookResult<HookPlayerUrl> {
    const playerUrl = context.value;
    const url = this.upgradeScheme(stripTrackingParams(playerUrl.processedUrl));
    playerUrl.processedUrl = url;

    setHeaderIfMissing(playerUrl.headers, "User-Agent", this.options.userAgent);
    setHeaderIfMissing(playerUrl.headers, "Accept", "*/*");
    setHeaderIfMissing(playerUrl.headers, "Accept-Encoding", "identity");

    const domain = findDomain(getHostname(url), Object.keys(this.options.hostHeaders));
    if (domain) {
      for (const [name, value] of Object.entries(this.options.hostHeaders[domain] ?? {})) {
        setHeader(playerUrl.headers, name, value);
      }
    }

    if (requiresSecondaryParse(url)) {
      playerUrl.needsParse = true;
    } else if (isDirectMediaUrl(url)) {
      playerUrl.needsParse = false;
    }

    return HookResults.success(playerUrl);
  }

  private upgradeScheme(url: string): string {
    if (!url.startsWith("http://")) {
      return url;
    }
    const hostname = getHostname(url);
    if (this.options.httpsHosts.some((fragment) => hostname.includes(fragment))) {
      return `https://${url.slice("http://".length)}`;
    }
    return url;
  }
}

/**
 * Remove cache-busting and utm_* parameters, keeping the rest in order
 */
export function stripTrackingParams(url: string): string {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return url;
  }
  if (!parsedUrl.search) {
    return url;
  }

  const keys = [...parsedUrl.searchParams.keys()];
  const tracked = keys.filter((key) => TRACKING_PARAMS.has(key.toLowerCase()) || key.toLowerCase().startsWith("utm_"));
  if (tracked.length === 0) {
    return url;
  }
  for (const key of tracked) {
    parsedUrl.searchParams.delete(key);
  }
  return parsedUrl.toString();
}
