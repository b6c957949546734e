import RE2 from "re2";

/**
 * URL and pattern utilities shared by spiders and hooks
 */

/**
 * Resolve a relative URL against a base URL
 */
export function resolveUrl(relative: string, base: string): string {
  try {
    return new URL(relative, base).toString();
  } catch {
    return relative;
  }
}

/**
 * Scheme and host of a URL ("https://example.com"), or "" when unparsable
 */
export function getOrigin(url: string): string {
  try {
    const parsedUrl = new URL(url);
    if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
      return "";
    }
    return `${parsedUrl.protocol}//${parsedUrl.host}`;
  } catch {
    return "";
  }
}

/**
 * Lower-cased hostname of a URL, or "" when unparsable
 */
export function getHostname(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Check whether a hostname equals a domain or is one of its subdomains
 */
export function isHostInDomain(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase();
  const target = domain.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}

/**
 * First domain in the list that the hostname belongs to
 */
export function findDomain(hostname: string, domains: Iterable<string>): string | undefined {
  for (const domain of domains) {
    if (isHostInDomain(hostname, domain)) {
      return domain;
    }
  }
  return undefined;
}

/**
 * Lower-cased extension of the URL path ("m3u8"), or "" when there is none
 */
export function getPathExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? "";
  }
  const lastSegment = pathname.slice(pathname.lastIndexOf("/") + 1);
  const dot = lastSegment.lastIndexOf(".");
  return dot >= 0 ? lastSegment.slice(dot + 1).toLowerCase() : "";
}

/**
 * Fill `{name}` placeholders of a URL template with encoded values
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = values[name];
    return value === undefined ? match : encodeURIComponent(String(value));
  });
}

/**
 * Append query parameters; empty values are dropped
 */
export function addQueryParams(url: string, params: Record<string, string | number | undefined>): string {
  const entries = Object.entries(params).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== ""
  );
  if (entries.length === 0) {
    return url;
  }

  try {
    const parsedUrl = new URL(url);
    for (const [key, value] of entries) {
      parsedUrl.searchParams.set(key, String(value));
    }
    return parsedUrl.toString();
  } catch {
    const query = entries.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`).join("&");
    return `${url}${url.includes("?") ? "&" : "?"}${query}`;
  }
}

// =============================================================================
// Patterns from site configuration
// =============================================================================

/**
 * Compile a pattern coming from site configuration
 *
 * Uses Google's RE2 engine which guarantees linear time execution,
 * so a pathological pattern in a site rule cannot stall the event loop.
 * Returns undefined for invalid or unsupported patterns.
 */
export function compilePattern(pattern: string, flags = ""): RE2 | undefined {
  try {
    return new RE2(pattern, flags);
  } catch {
    return undefined;
  }
}
