/**
 * Concurrent search aggregator
 *
 * Fans a search out over many sites with a bounded worker pool and streams one
 * result event per targeted site as soon as it settles, then exactly one
 * complete event.
 *
 * - every site call has its own timeout; quick searches shorten it and keep
 *   fewer items per site
 * - the whole query has a deadline; sites still outstanding when it passes
 *   report `timeout`
 * - cancelling the signal, or leaving the iteration early, aborts every call
 *
 * @example
 * for await (const event of aggregator.search(sites, "moon", false)) {
 *   if (event.type === "result") console.log(event.site.key, event.envelope.items.length);
 *   else console.log(event.summary);
 * }
 */

import os from "node:os";
import pLimit from "p-limit";
import type { AggregatorOptions, EnvelopeStatus, ListingEnvelope, ParserOperation, Site } from "../types.js";
import { DEFAULT_ENGINE_OPTIONS } from "../types.js";
import type { ReliabilityOptimizer } from "../optimizer/reliability-optimizer.js";
import { failureListing } from "../normalize/envelope.js";
import { CancelledError, MalformedResponseError, wrapError } from "../errors.js";
import { abortReason, linkSignals, raceSignal } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

export type SiteSearcher = Pick<ReliabilityOptimizer, "execute">;

type SearchOperation = Extract<ParserOperation, { type: "search" }>;

export interface SearchResultEvent {
  type: "result";
  site: Site;
  envelope: ListingEnvelope;
  status: EnvelopeStatus;
  durationMs: number;
  cached: boolean;
}

export interface SearchSummary {
  keyword: string;
  quick: boolean;
  /** Sites queried */
  targeted: number;
  /** Sites not searchable */
  skipped: number;
  ok: number;
  empty: number;
  error: number;
  timeout: number;
  cancelled: number;
  totalItems: number;
  durationMs: number;
  /** The deadline cut the query short */
  deadlineReached: boolean;
}

export interface SearchCompleteEvent {
  type: "complete";
  summary: SearchSummary;
}

export type AggregatorEvent = SearchResultEvent | SearchCompleteEvent;

export interface SearchOptions extends AggregatorOptions {
  signal?: AbortSignal;
}

export interface SearchCollection {
  results: SearchResultEvent[];
  summary: SearchSummary;
}

export interface AggregatorStats {
  searches: number;
  completed: number;
  abandoned: number;
  deadlineHits: number;
  siteResults: Record<EnvelopeStatus, number>;
  averageDurationMs: number;
}

export interface ConcurrentAggregatorOptions extends AggregatorOptions {
  searcher: SiteSearcher;
  logger?: Logger;
}

/**
 * Default worker count: twice the CPU count, between 2 and 16
 */
export function defaultConcurrency(): number {
  return Math.min(16, Math.max(2, os.availableParallelism() * 2));
}

export class ConcurrentAggregator {
  private readonly searcher: SiteSearcher;
  private readonly defaults: Required<AggregatorOptions>;
  private readonly logger?: Logger;
  private counters = emptyStats();
  private totalDurationMs = 0;

  constructor(options: ConcurrentAggregatorOptions) {
    this.searcher = options.searcher;
    this.logger = options.logger;
    this.defaults = {
      concurrency: options.concurrency ?? defaultConcurrency(),
      siteTimeoutMs: options.siteTimeoutMs ?? DEFAULT_ENGINE_OPTIONS.aggregator.siteTimeoutMs,
      deadlineMs: options.deadlineMs ?? DEFAULT_ENGINE_OPTIONS.aggregator.deadlineMs,
      quickTimeoutFactor: options.quickTimeoutFactor ?? DEFAULT_ENGINE_OPTIONS.aggregator.quickTimeoutFactor,
      quickResultLimit: options.quickResultLimit ?? DEFAULT_ENGINE_OPTIONS.aggregator.quickResultLimit,
    };
  }

  /**
   * Search every searchable site and stream the results
   */
  async *search(
    sites: readonly Site[],
    keyword: string,
    quick: boolean,
    options: SearchOptions = {}
  ): AsyncGenerator<AggregatorEvent, void, undefined> {
    const settings = { ...this.defaults, ...definedOnly(options) };
    const startTime = Date.now();
    const targets = sites.filter((site) => isTargeted(site, quick));
    const operation: SearchOperation = { type: "search", keyword, quick };

    this.counters.searches++;
    this.logger?.debug(
      `[aggregator] ${quick ? "Quick search" : "Search"} "${keyword}" on ${targets.length} sites (${sites.length - targets.length} skipped)`
    );

    const query = linkSignals([options.signal], settings.deadlineMs);
    const limit = pLimit(Math.max(1, settings.concurrency));
    const pending = new Map<number, Promise<{ index: number; event: SearchResultEvent }>>();
    for (const [index, site] of targets.entries()) {
      pending.set(
        index,
        limit(() => this.searchSite(site, operation, settings, query.signal)).then((event) => ({ index, event }))
      );
    }

    const summary: SearchSummary = {
      keyword,
      quick,
      targeted: targets.length,
      skipped: sites.length - targets.length,
      ok: 0,
      empty: 0,
      error: 0,
      timeout: 0,
      cancelled: 0,
      totalItems: 0,
      durationMs: 0,
      deadlineReached: false,
    };

    let finished = false;
    try {
      while (pending.size > 0) {
        const { index, event } = await Promise.race(pending.values());
        pending.delete(index);

        summary[event.status]++;
        summary.totalItems += event.envelope.items.length;
        this.counters.siteResults[event.status]++;
        yield event;
      }

      summary.deadlineReached = query.timedOut;
      summary.durationMs = Date.now() - startTime;
      finished = true;

      this.counters.completed++;
      if (summary.deadlineReached) this.counters.deadlineHits++;
      this.totalDurationMs += summary.durationMs;
      this.logger?.debug(
        `[aggregator] "${keyword}" done in ${summary.durationMs}ms: ${summary.ok} ok, ${summary.empty} empty, ${summary.error} error, ${summary.timeout} timeout`
      );

      yield { type: "complete", summary };
    } finally {
      if (!finished) {
        // The consumer stopped iterating
        this.counters.abandoned++;
        limit.clearQueue();
        query.abort(new CancelledError("Search abandoned"));
      }
      query.dispose();
    }
  }

  /**
   * Run a search to completion and gather its events
   */
  async collect(
    sites: readonly Site[],
    keyword: string,
    quick: boolean,
    options: SearchOptions = {}
  ): Promise<SearchCollection> {
    const results: SearchResultEvent[] = [];
    for await (const event of this.search(sites, keyword, quick, options)) {
      if (event.type === "complete") {
        return { results, summary: event.summary };
      }
      results.push(event);
    }
    throw new Error("Search ended without a complete event");
  }

  stats(): AggregatorStats {
    return {
      ...this.counters,
      siteResults: { ...this.counters.siteResults },
      averageDurationMs: this.counters.completed === 0 ? 0 : Math.round(this.totalDurationMs / this.counters.completed),
    };
  }

  clearStats(): void {
    this.counters = emptyStats();
    this.totalDurationMs = 0;
  }

  /**
   * One site's call; never rejects
   */
  private async searchSite(
    site: Site,
    operation: SearchOperation,
    settings: Required<AggregatorOptions>,
    querySignal: AbortSignal
  ): Promise<SearchResultEvent> {
    const startTime = Date.now();
    const { quick } = operation;
    const baseTimeout = site.timeoutMs ?? settings.siteTimeoutMs;
    const timeoutMs = Math.max(1, Math.round(quick ? baseTimeout * settings.quickTimeoutFactor : baseTimeout));
    const linked = linkSignals([querySignal], timeoutMs);

    try {
      const { envelope, cached } = await raceSignal(
        this.searcher.execute(site, operation, { signal: linked.signal }),
        linked.signal,
        site.key
      );
      if (envelope.kind !== "listing") {
        throw new MalformedResponseError("Search produced a play envelope", { siteKey: site.key });
      }

      const listing = quick ? { ...envelope, items: envelope.items.slice(0, settings.quickResultLimit) } : envelope;
      return { type: "result", site, envelope: listing, status: listing.status, durationMs: Date.now() - startTime, cached };
    } catch (error: unknown) {
      const err = wrapError(linked.signal.aborted ? abortReason(linked.signal, site.key) : error, site.key);
      const envelope = failureListing(site.key, operation, err);
      return { type: "result", site, envelope, status: envelope.status, durationMs: Date.now() - startTime, cached: false };
    } finally {
      linked.dispose();
    }
  }
}

function isTargeted(site: Site, quick: boolean): boolean {
  if (site.searchable === false) return false;
  return !quick || site.quickSearchable !== false;
}

function definedOnly(options: SearchOptions): Partial<Required<AggregatorOptions>> {
  const result: Partial<Required<AggregatorOptions>> = {};
  if (options.concurrency !== undefined) result.concurrency = options.concurrency;
  if (options.siteTimeoutMs !== undefined) result.siteTimeoutMs = options.siteTimeoutMs;
  if (options.deadlineMs !== undefined) result.deadlineMs = options.deadlineMs;
  if (options.quickTimeoutFactor !== undefined) result.quickTimeoutFactor = options.quickTimeoutFactor;
  if (options.quickResultLimit !== undefined) result.quickResultLimit = options.quickResultLimit;
  return result;
}

function emptyStats() {
  return {
    searches: 0,
    completed: 0,
    abandoned: 0,
    deadlineHits: 0,
    siteResults: { ok: 0, empty: 0, error: 0, timeout: 0, cancelled: 0 } satisfies Record<EnvelopeStatus, number>,
  };
}
