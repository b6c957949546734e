/**
 * Envelope normalization
 *
 * Turns raw CatVod payloads (JSON string or object) into the content model.
 *
 * Listing payload:
 *   { class: [{type_id, type_name}], list: [{vod_id, vod_name, ...}],
 *     filters: {typeId: [{key, name, value: [{n, v}]}]}, page, pagecount, limit, total }
 *
 * Play payload:
 *   { url, header, parse: 0|1, jx, playUrl }
 */

import type {
  Category,
  ContentEnvelope,
  ContentItem,
  EnvelopeStatus,
  Episode,
  FilterGroup,
  FilterOption,
  ListingEnvelope,
  OperationName,
  ParserOperation,
  PlayDescriptor,
  PlaySource,
} from "../types.js";
import type { RawPayload } from "../spiders/types.js";
import { CancelledError, MalformedResponseError, TimeoutError, type VodError } from "../errors.js";

type JsonObject = Record<string, unknown>;

// =============================================================================
// Field readers
// =============================================================================

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: JsonObject, key: string): string {
  const value = source[key];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function readInt(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
}

function readArray(source: JsonObject, key: string): JsonObject[] {
  const value = source[key];
  return Array.isArray(value) ? value.filter(isObject) : [];
}

/**
 * Parse a raw payload into a JSON object
 *
 * An empty string is an empty payload.
 * @throws MalformedResponseError
 */
export function parseRawPayload(payload: RawPayload, siteKey: string): JsonObject {
  if (typeof payload !== "string") {
    return payload;
  }

  const text = payload.trim();
  if (text === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new MalformedResponseError(`Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      siteKey,
    });
  }

  if (!isObject(parsed)) {
    throw new MalformedResponseError(`Payload is not a JSON object`, { siteKey });
  }
  return parsed;
}

// =============================================================================
// Listing
// =============================================================================

/**
 * Split `vod_play_from` / `vod_play_url` into play sources
 *
 * Sources are separated by `$$$`, episodes by `#`, and each episode is `name$id`.
 * Episodes without a `$` are dropped.
 */
export function parsePlaySources(playFrom: string, playUrl: string): PlaySource[] {
  if (playFrom === "" || playUrl === "") {
    return [];
  }

  const names = playFrom.split("$$$");
  const groups = playUrl.split("$$$");

  return names.map((name, index) => {
    const episodes: Episode[] = [];
    for (const entry of (groups[index] ?? "").split("#")) {
      const separator = entry.indexOf("$");
      if (separator < 0) continue;
      episodes.push({ name: entry.slice(0, separator).trim(), id: entry.slice(separator + 1).trim() });
    }
    return { name: name.trim(), episodes };
  });
}

function toContentItem(vod: JsonObject): ContentItem | undefined {
  const id = readString(vod, "vod_id");
  const title = readString(vod, "vod_name");
  if (id === "" && title === "") {
    return undefined;
  }

  const item: ContentItem = {
    id,
    title,
    poster: readString(vod, "vod_pic"),
    remark: readString(vod, "vod_remarks"),
  };

  const typeId = readString(vod, "type_id");
  const typeName = readString(vod, "type_name");
  if (typeId !== "" || typeName !== "") {
    item.category = { id: typeId, name: typeName };
  }

  const details = [
    ["year", "vod_year"],
    ["area", "vod_area"],
    ["actors", "vod_actor"],
    ["director", "vod_director"],
    ["description", "vod_content"],
  ] as const;
  for (const [field, key] of details) {
    const value = readString(vod, key);
    if (value !== "") item[field] = value;
  }

  const playSources = parsePlaySources(readString(vod, "vod_play_from"), readString(vod, "vod_play_url"));
  if (playSources.length > 0) {
    item.playSources = playSources;
  }
  return item;
}

function toCategories(payload: JsonObject): Category[] {
  return readArray(payload, "class")
    .map((entry) => ({ id: readString(entry, "type_id"), name: readString(entry, "type_name") }))
    .filter((category) => category.id !== "");
}

function toFilterOptions(value: unknown): FilterOption[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isObject).map((option) => ({ name: readString(option, "n"), value: readString(option, "v") }));
}

function toFilters(payload: JsonObject): Record<string, FilterGroup[]> {
  const raw = payload.filters;
  const filters: Record<string, FilterGroup[]> = {};
  if (!isObject(raw)) {
    return filters;
  }

  for (const [typeId, groups] of Object.entries(raw)) {
    if (!Array.isArray(groups)) continue;
    filters[typeId] = groups.filter(isObject).map((group) => ({
      key: readString(group, "key"),
      name: readString(group, "name"),
      options: toFilterOptions(group.value),
    }));
  }
  return filters;
}

/**
 * Normalize a listing payload (home, category, detail, search)
 */
export function normalizeListing(
  siteKey: string,
  operation: Exclude<OperationName, "play">,
  payload: RawPayload,
  requestedPage = 1
): ListingEnvelope {
  const json = parseRawPayload(payload, siteKey);
  const items: ContentItem[] = [];
  for (const vod of readArray(json, "list")) {
    const item = toContentItem(vod);
    if (item) items.push(item);
  }
  const categories = toCategories(json);

  const page = readInt(json, "page") ?? requestedPage;
  const limit = readInt(json, "limit") ?? items.length;
  const total = readInt(json, "total") ?? items.length;
  const pageCount = readInt(json, "pagecount") ?? (items.length > 0 ? page : 0);

  return {
    kind: "listing",
    siteKey,
    operation,
    items,
    categories,
    filters: toFilters(json),
    page,
    pageCount,
    total,
    limit,
    status: items.length > 0 || categories.length > 0 ? "ok" : "empty",
  };
}

// =============================================================================
// Play
// =============================================================================

function readHeaderMap(value: unknown, siteKey: string): Record<string, string> {
  let source = value;
  if (typeof source === "string") {
    if (source.trim() === "") return {};
    try {
      source = JSON.parse(source);
    } catch {
      throw new MalformedResponseError(`Play header is not valid JSON`, { siteKey });
    }
  }

  const headers: Record<string, string> = {};
  if (!isObject(source)) {
    return headers;
  }
  for (const [name, headerValue] of Object.entries(source)) {
    if (typeof headerValue === "string") headers[name] = headerValue;
    else if (typeof headerValue === "number") headers[name] = String(headerValue);
  }
  return headers;
}

/**
 * Normalize a play payload
 *
 * `playUrl` is a parser prefix: when present the final URL is prefix + url.
 */
export function normalizePlay(siteKey: string, flag: string, payload: RawPayload): PlayDescriptor {
  const json = parseRawPayload(payload, siteKey);
  const prefix = readString(json, "playUrl");
  const rawUrl = readString(json, "url");
  const url = rawUrl === "" ? "" : prefix + rawUrl;

  const parse = readInt(json, "parse") ?? 0;
  const jx = readInt(json, "jx") ?? 0;

  return {
    kind: "play",
    siteKey,
    url,
    headers: readHeaderMap(json.header, siteKey),
    needsParse: parse === 1 || jx === 1,
    flag: readString(json, "flag") || flag,
    status: url === "" ? "empty" : "ok",
  };
}

/**
 * Normalize a payload for the operation that produced it
 */
export function normalizePayload(siteKey: string, operation: ParserOperation, payload: RawPayload): ContentEnvelope {
  switch (operation.type) {
    case "play":
      return normalizePlay(siteKey, operation.flag, payload);
    case "category":
      return normalizeListing(siteKey, "category", payload, operation.page);
    default:
      return normalizeListing(siteKey, operation.type, payload);
  }
}

// =============================================================================
// Failure envelopes
// =============================================================================

/**
 * Envelope status matching an error
 */
export function statusForError(error: VodError): EnvelopeStatus {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof CancelledError) return "cancelled";
  return "error";
}

function envelopeError(error: VodError) {
  return { code: error.code, message: error.message, retryable: error.retryable };
}

/**
 * Empty listing carrying an error
 */
export function failureListing(
  siteKey: string,
  operation: Exclude<ParserOperation, { type: "play" }>,
  error: VodError
): ListingEnvelope {
  return {
    kind: "listing",
    siteKey,
    operation: operation.type,
    items: [],
    categories: [],
    filters: {},
    page: operation.type === "category" ? operation.page : 1,
    pageCount: 0,
    total: 0,
    limit: 0,
    status: statusForError(error),
    error: envelopeError(error),
  };
}

/**
 * Play descriptor without a URL, carrying an error
 */
export function failurePlay(siteKey: string, flag: string, error: VodError): PlayDescriptor {
  return {
    kind: "play",
    siteKey,
    url: "",
    headers: {},
    needsParse: false,
    flag,
    status: statusForError(error),
    error: envelopeError(error),
  };
}

/**
 * Empty envelope of the operation's kind, carrying an error
 */
export function failureEnvelope(siteKey: string, operation: ParserOperation, error: VodError): ContentEnvelope {
  return operation.type === "play" ? failurePlay(siteKey, operation.flag, error) : failureListing(siteKey, operation, error);
}

/**
 * Whether an envelope may be stored in the cache
 */
export function isCacheable(envelope: ContentEnvelope): boolean {
  return envelope.status === "ok" || envelope.status === "empty";
}
