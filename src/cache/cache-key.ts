import type { ParserOperation } from "../types.js";

/**
 * Canonical cache key: `siteKey|op|args`
 *
 * Equal queries map to equal keys: keywords are trimmed and lower-cased,
 * filters sorted with empty values dropped, booleans written as 1/0.
 * Every part is percent-encoded, so the separators only ever come from
 * the key layout itself.
 */
export function cacheKey(siteKey: string, operation: ParserOperation): string {
  return [part(siteKey), operation.type, canonicalArgs(operation)].join("|");
}

/**
 * Prefix covering every key of a site, or of one operation of a site
 */
export function cacheKeyPrefix(siteKey: string, operation?: ParserOperation["type"]): string {
  return operation ? `${part(siteKey)}|${operation}|` : `${part(siteKey)}|`;
}

function canonicalArgs(operation: ParserOperation): string {
  switch (operation.type) {
    case "home":
      return flag(operation.filter);
    case "category":
      return [part(operation.typeId), String(Math.trunc(operation.page)), canonicalFilters(operation.filters)].join("|");
    case "detail":
      return operation.ids.map(part).join(",");
    case "search":
      return [part(operation.keyword.trim().toLowerCase()), flag(operation.quick)].join("|");
    case "play":
      return [part(operation.flag), part(operation.id), operation.vipFlags.map(part).join(",")].join("|");
    default: {
      const unreachable: never = operation;
      throw new Error(`Unknown operation ${JSON.stringify(unreachable)}`);
    }
  }
}

function part(value: string): string {
  return encodeURIComponent(value);
}

function flag(value: boolean): string {
  return value ? "1" : "0";
}

function canonicalFilters(filters: Record<string, string>): string {
  return Object.entries(filters)
    .filter(([, value]) => value !== "")
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${part(key)}=${part(value)}`)
    .join("&");
}
