/**
 * Site definitions
 *
 * Turns TVBox-style config entries into Site values:
 *
 * @example
 * normalizeSite({ key: "demo", name: "Demo", type: 1, api: "https://cms.example/api.php/provide/vod", quickSearch: 0 });
 * // { key: "demo", name: "Demo", kind: "rule", api: "...", quickSearchable: false, ... }
 */

import type { ParserKind, Site } from "../types.js";
import { ConfigError } from "../errors.js";

type RawSite = Record<string, unknown>;

export interface SiteListResult {
  sites: Site[];
  /** Entries that were rejected; each is fatal to that site only */
  errors: ConfigError[];
}

function isRecord(value: unknown): value is RawSite {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readFlag(raw: RawSite, names: string[], siteKey: string): boolean {
  for (const name of names) {
    const value = raw[name];
    if (value === undefined || value === null) continue;
    if (typeof value === "boolean") return value;
    if (value === 0 || value === 1) return value === 1;
    throw new ConfigError(`"${name}" must be 0, 1 or a boolean`, { siteKey, field: name });
  }
  return true;
}

function readHeaders(raw: RawSite, siteKey: string): Record<string, string> | undefined {
  const value = raw.headers ?? raw.header;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`"header" must be an object`, { siteKey, field: "header" });
  }
  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") {
      throw new ConfigError(`Header ${name} must be a string`, { siteKey, field: "header" });
    }
    headers[name] = headerValue;
  }
  return headers;
}

function readKind(raw: RawSite, api: string, siteKey: string): ParserKind {
  const kind = raw.kind;
  if (kind === "rule" || kind === "script" || kind === "module") {
    return kind;
  }
  if (kind !== undefined) {
    throw new ConfigError(`Unknown kind ${String(kind)}`, { siteKey, field: "kind" });
  }

  const type = typeof raw.type === "string" ? Number.parseInt(raw.type, 10) : raw.type;
  switch (type) {
    case 0:
    case 1:
      return "rule";
    case 3:
      return /\.m?js(?:[?#].*)?$/i.test(api) ? "script" : "module";
    default:
      throw new ConfigError(`Unsupported site type ${String(raw.type)}`, { siteKey, field: "type" });
  }
}

function readCategories(raw: RawSite, siteKey: string): string[] | undefined {
  const value = raw.categories;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
    throw new ConfigError(`"categories" must be a list of names`, { siteKey, field: "categories" });
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

/**
 * Validate one config entry
 *
 * @throws ConfigError
 */
export function normalizeSite(raw: unknown): Site {
  if (!isRecord(raw)) {
    throw new ConfigError("Site entry must be an object");
  }

  const key = typeof raw.key === "string" ? raw.key.trim() : "";
  if (key === "") {
    throw new ConfigError("Site is missing a key", { field: "key" });
  }
  const api = typeof raw.api === "string" ? raw.api.trim() : "";
  if (api === "") {
    throw new ConfigError("Site is missing an api", { siteKey: key, field: "api" });
  }

  const kind = readKind(raw, api, key);
  let ext: unknown = raw.ext;
  // AppYs sites (type 1) always speak the CMS JSON API
  if (String(raw.type) === "1" && (ext === undefined || isRecord(ext))) {
    ext = { ...(isRecord(ext) ? ext : {}), type: "json" };
  }

  let timeoutMs: number | undefined;
  if (raw.timeout !== undefined && raw.timeout !== null) {
    if (typeof raw.timeout !== "number" || !(raw.timeout > 0)) {
      throw new ConfigError(`"timeout" must be a positive number of seconds`, { siteKey: key, field: "timeout" });
    }
    timeoutMs = Math.round(raw.timeout * 1000);
  }

  return {
    key,
    name: typeof raw.name === "string" && raw.name.trim() !== "" ? raw.name.trim() : key,
    kind,
    api,
    ext,
    headers: readHeaders(raw, key),
    searchable: readFlag(raw, ["searchable"], key),
    quickSearchable: readFlag(raw, ["quickSearch", "quickSearchable"], key),
    filterable: readFlag(raw, ["filterable"], key),
    timeoutMs,
    categories: readCategories(raw, key),
  };
}

/**
 * Read a site list: a bare array or a TVBox config object with `sites`
 *
 * Duplicate keys keep the first entry.
 */
export function normalizeSites(raw: unknown): SiteListResult {
  const entries: unknown[] | undefined = Array.isArray(raw)
    ? raw
    : isRecord(raw) && Array.isArray(raw.sites)
      ? raw.sites
      : undefined;
  if (!entries) {
    throw new ConfigError("Site list must be an array or an object with a sites array", { field: "sites" });
  }

  const sites: Site[] = [];
  const errors: ConfigError[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    try {
      const site = normalizeSite(entry);
      if (seen.has(site.key)) {
        throw new ConfigError(`Duplicate site key ${site.key}`, { siteKey: site.key, field: "key" });
      }
      seen.add(site.key);
      sites.push(site);
    } catch (error: unknown) {
      if (!(error instanceof ConfigError)) throw error;
      errors.push(error);
    }
  }
  return { sites, errors };
}
