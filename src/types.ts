import type { Logger } from "./utils/logger.js";
import type { VodErrorCode } from "./errors.js";

// =============================================================================
// Sites
// =============================================================================

/**
 * Declared parser kind of a site
 *
 * - rule: in-process rule engine (HTML rules or JSON API, picked from the api URL)
 * - script: embedded JavaScript program
 * - module: dynamically loaded module exposing a spider class
 */
export type ParserKind = "rule" | "script" | "module";

/**
 * A configured content source. Immutable once loaded.
 */
export interface Site {
  /** Unique site key */
  readonly key: string;
  /** Display name */
  readonly name: string;
  /** Declared parser kind */
  readonly kind: ParserKind;
  /** Endpoint URL/template, script URL or module reference */
  readonly api: string;
  /** Opaque extension payload, interpreted by the chosen backend only */
  readonly ext?: unknown;
  /** Static headers sent with every request to this site */
  readonly headers?: Readonly<Record<string, string>>;
  /** Site takes part in full searches (default: true) */
  readonly searchable?: boolean;
  /** Site takes part in quick searches (default: true) */
  readonly quickSearchable?: boolean;
  /** Site supports category filters (default: true) */
  readonly filterable?: boolean;
  /** Per-call timeout override in milliseconds */
  readonly timeoutMs?: number;
  /** Category names to keep from the home listing (rule sites) */
  readonly categories?: readonly string[];
}

// =============================================================================
// Operations
// =============================================================================

export type OperationName = "home" | "category" | "detail" | "search" | "play";

export type ParserOperation =
  | { type: "home"; filter: boolean }
  | { type: "category"; typeId: string; page: number; filters: Record<string, string> }
  | { type: "detail"; ids: string[] }
  | { type: "search"; keyword: string; quick: boolean }
  | { type: "play"; flag: string; id: string; vipFlags: string[] };

// =============================================================================
// Content model
// =============================================================================

export type EnvelopeStatus = "ok" | "empty" | "error" | "timeout" | "cancelled";

export interface EnvelopeError {
  code: VodErrorCode;
  message: string;
  retryable: boolean;
}

export interface Category {
  id: string;
  name: string;
}

export interface Episode {
  name: string;
  id: string;
}

export interface PlaySource {
  name: string;
  episodes: Episode[];
}

export interface ContentItem {
  id: string;
  title: string;
  poster: string;
  remark: string;
  category?: Category;
  year?: string;
  area?: string;
  actors?: string;
  director?: string;
  description?: string;
  playSources?: PlaySource[];
}

export interface FilterOption {
  name: string;
  value: string;
}

export interface FilterGroup {
  key: string;
  name: string;
  options: FilterOption[];
}

export interface ListingEnvelope {
  kind: "listing";
  siteKey: string;
  operation: OperationName;
  items: ContentItem[];
  categories: Category[];
  filters: Record<string, FilterGroup[]>;
  page: number;
  pageCount: number;
  total: number;
  limit: number;
  status: EnvelopeStatus;
  error?: EnvelopeError;
}

export interface PlayDescriptor {
  kind: "play";
  siteKey: string;
  url: string;
  headers: Record<string, string>;
  /** The URL is a page or parser endpoint, not a media stream */
  needsParse: boolean;
  flag: string;
  status: EnvelopeStatus;
  error?: EnvelopeError;
}

export type ContentEnvelope = ListingEnvelope | PlayDescriptor;

/**
 * Options accepted by every resolve call
 */
export interface CallOptions {
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

// =============================================================================
// Engine options
// =============================================================================

export interface CacheOptions {
  /** Memory tier entry limit (default: 500) */
  maxEntries?: number;
  /** Memory tier size limit in bytes (default: 16 MiB) */
  maxBytes?: number;
  /** Enable the persistent tier (default: true) */
  persistent?: boolean;
  /** Directory of the persistent tier (default: VODHUB_CACHE_DIR or <tmpdir>/vodhub-cache) */
  cacheDir?: string;
  /** TTL per operation in milliseconds */
  ttl?: Partial<Record<OperationName, number>>;
}

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** First backoff delay (default: 500ms) */
  baseDelayMs?: number;
  /** Backoff cap (default: 8000ms) */
  maxDelayMs?: number;
}

export interface AggregatorOptions {
  /** Sites queried in parallel (default: derived from CPU count) */
  concurrency?: number;
  /** Per-site timeout when the site declares none (default: 15000ms) */
  siteTimeoutMs?: number;
  /** Global deadline of one search (default: 30000ms) */
  deadlineMs?: number;
  /** Per-site timeout factor for quick searches (default: 0.5) */
  quickTimeoutFactor?: number;
  /** Items kept per site for quick searches (default: 10) */
  quickResultLimit?: number;
}

export interface VodEngineOptions {
  /** Logger instance (default: pino logger named "vodhub") */
  logger?: Logger;
  /** Per-hook timeout (default: 10000ms) */
  hookTimeoutMs?: number;
  /** Cool-down before a failed backend initialization is retried (default: 60000ms) */
  initCooldownMs?: number;
  /** Time allowed for one backend initialization (default: 30000ms) */
  initTimeoutMs?: number;
  /** Simultaneous calls allowed on one site (default: 3) */
  perSiteConcurrency?: number;
  /** Calls slower than this are flagged (default: 5000ms) */
  slowCallMs?: number;
  /** Attempt timeout factor for degraded sites (default: 0.5) */
  degradedTimeoutFactor?: number;
  /** Register the built-in hooks (default: true) */
  builtInHooks?: boolean;
  cache?: CacheOptions;
  retry?: RetryOptions;
  aggregator?: AggregatorOptions;
}

/**
 * Default TTL per operation (ms)
 */
export const DEFAULT_TTL: Record<OperationName, number> = {
  home: 10 * 60 * 1000,
  category: 5 * 60 * 1000,
  detail: 30 * 60 * 1000,
  search: 5 * 60 * 1000,
  play: 30 * 1000,
};

/**
 * Default engine options
 */
export const DEFAULT_ENGINE_OPTIONS = {
  hookTimeoutMs: 10000,
  initCooldownMs: 60000,
  initTimeoutMs: 30000,
  perSiteConcurrency: 3,
  slowCallMs: 5000,
  degradedTimeoutFactor: 0.5,
  builtInHooks: true,
  cache: {
    maxEntries: 500,
    maxBytes: 16 * 1024 * 1024,
    persistent: true,
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000,
  },
  aggregator: {
    siteTimeoutMs: 15000,
    deadlineMs: 30000,
    quickTimeoutFactor: 0.5,
    quickResultLimit: 10,
  },
} as const;

/**
 * Check if a value is a known operation name
 */
export function isOperationName(value: string): value is OperationName {
  return ["home", "category", "detail", "search", "play"].includes(value);
}
