/**
 * Host tables used by the built-in hooks
 */

export interface BuiltInHookOptions {
  /** User-Agent applied when a request has none or a bare library one */
  userAgent?: string;
  /** Domains whose requests get Referer/Origin set to their own origin */
  hotlinkHosts?: string[];
  /** Hostname fragments whose play URLs are upgraded to https */
  httpsHosts?: string[];
  /** Per-domain header overrides (Referer, Origin, User-Agent...) */
  hostHeaders?: Record<string, Record<string, string>>;
}

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const DEFAULT_HOTLINK_HOSTS = ["qq.com", "163.com", "sina.com", "sohu.com", "youku.com", "iqiyi.com"];

export const DEFAULT_HTTPS_HOSTS = ["cdn", "video", "youku", "iqiyi", "qq.com", "bilibili"];

export const DEFAULT_HOST_HEADERS: Record<string, Record<string, string>> = {
  "youku.com": { Referer: "https://www.youku.com/" },
  "iqiyi.com": { Referer: "https://www.iqiyi.com/" },
  "qq.com": { Referer: "https://v.qq.com/" },
  "bilibili.com": { Referer: "https://www.bilibili.com/", Origin: "https://www.bilibili.com" },
};

export interface ResolvedHookOptions {
  userAgent: string;
  hotlinkHosts: string[];
  httpsHosts: string[];
  hostHeaders: Record<string, Record<string, string>>;
}

export function resolveHookOptions(options: BuiltInHookOptions = {}): ResolvedHookOptions {
  return {
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    hotlinkHosts: options.hotlinkHosts ?? DEFAULT_HOTLINK_HOSTS,
    httpsHosts: options.httpsHosts ?? DEFAULT_HTTPS_HOSTS,
    hostHeaders: options.hostHeaders ?? DEFAULT_HOST_HEADERS,
  };
}
