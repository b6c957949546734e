/**
 * VodEngine - owns one set of engine components
 *
 * Every cache, counter and spider belongs to the instance, so several engines
 * can run side by side in one process.
 *
 * @example
 * import { VodEngine, normalizeSites } from "vodhub";
 *
 * const engine = new VodEngine({ cache: { persistent: false } });
 * const { sites } = normalizeSites(config);
 *
 * const home = await engine.resolveHome(sites[0]);
 * for await (const event of engine.search(sites, "moon")) {
 *   if (event.type === "result") console.log(event.site.key, event.status);
 * }
 *
 * await engine.close();
 */

import type {
  CallOptions,
  ContentEnvelope,
  ListingEnvelope,
  ParserOperation,
  PlayDescriptor,
  Site,
  VodEngineOptions,
} from "./types.js";
import { resolveEngineOptions, type ResolvedEngineOptions } from "./config/options.js";
import { HookPipeline, type HookStats } from "./hooks/pipeline.js";
import type { HookStage } from "./hooks/types.js";
import { registerBuiltInHooks, type BuiltInHookOptions } from "./hooks/builtin/index.js";
import { TransportCascade } from "./transport/cascade.js";
import type { Transport } from "./transport/types.js";
import { SandboxScriptRuntime } from "./runtime/sandbox-script-runtime.js";
import { ImportModuleLoader } from "./runtime/import-module-loader.js";
import type { ModuleLoader, ScriptRuntime } from "./runtime/types.js";
import { EngineSelector } from "./engines/selector.js";
import type { Backend, BackendName, EngineStats } from "./engines/types.js";
import { ResultCache, type CacheStats } from "./cache/result-cache.js";
import { FileCacheStore } from "./cache/store.js";
import type { CacheStore } from "./cache/types.js";
import { ReliabilityOptimizer, type OptimizerStats, type Suggestion } from "./optimizer/reliability-optimizer.js";
import {
  ConcurrentAggregator,
  type AggregatorEvent,
  type AggregatorStats,
  type SearchCollection,
  type SearchOptions,
} from "./aggregator/aggregator.js";
import { CategoryPager } from "./aggregator/pager.js";
import { failureListing, failurePlay } from "./normalize/envelope.js";
import { EngineClosedError, MalformedResponseError, type VodError, wrapError } from "./errors.js";
import { abortReason, linkSignals, type LinkedController } from "./utils/abort.js";
import { createLogger, type Logger } from "./utils/logger.js";

type ListingOperation = Exclude<ParserOperation, { type: "play" }>;

/**
 * Engine options plus the collaborators a caller may replace
 */
export interface VodEngineConfig extends VodEngineOptions {
  /** HTTP collaborator (default: http → tlsclient cascade) */
  transport?: Transport;
  /** Script runtime for `script` sites (default: in-process sandbox) */
  runtime?: ScriptRuntime;
  /** Module loader for `module` sites (default: dynamic import) */
  loader?: ModuleLoader;
  /** Persistent cache tier (default: files under cache.cacheDir) */
  cacheStore?: CacheStore;
  /** Replace individual backends */
  backends?: Partial<Record<BackendName, Backend>>;
  /** Host tables of the built-in hooks */
  hookOptions?: BuiltInHookOptions;
}

export interface VodEngineStats {
  engine: EngineStats;
  hook: {
    hooks: Record<string, HookStats>;
    registered: Record<HookStage, number>;
  };
  cache: CacheStats;
  aggregator: AggregatorStats;
  performance: OptimizerStats;
}

export class VodEngine {
  /** Hook chains; register or unregister hooks at any time */
  readonly hooks: HookPipeline;
  /** Per-site category paging over `resolveCategory` */
  readonly pager: CategoryPager;

  private readonly options: ResolvedEngineOptions;
  private readonly logger: Logger;
  private readonly selector: EngineSelector;
  private readonly cache: ResultCache;
  private readonly optimizer: ReliabilityOptimizer;
  private readonly aggregator: ConcurrentAggregator;
  private readonly active = new Set<LinkedController>();
  private closed = false;

  constructor(config: VodEngineConfig = {}) {
    this.options = resolveEngineOptions(config);
    this.logger = config.logger ?? createLogger("vodhub");

    this.hooks = new HookPipeline({ hookTimeoutMs: this.options.hookTimeoutMs, logger: this.logger });
    if (this.options.builtInHooks) {
      registerBuiltInHooks(this.hooks, config.hookOptions);
    }

    this.selector = new EngineSelector({
      transport: config.transport ?? new TransportCascade({ logger: this.logger }),
      hooks: this.hooks,
      runtime: config.runtime ?? new SandboxScriptRuntime(),
      loader: config.loader ?? new ImportModuleLoader(),
      backends: config.backends,
      initCooldownMs: this.options.initCooldownMs,
      initTimeoutMs: this.options.initTimeoutMs,
      logger: this.logger,
    });

    const store = this.options.cache.persistent
      ? (config.cacheStore ?? new FileCacheStore(this.options.cache.cacheDir))
      : undefined;
    this.cache = new ResultCache({
      maxEntries: this.options.cache.maxEntries,
      maxBytes: this.options.cache.maxBytes,
      store,
      logger: this.logger,
    });

    this.optimizer = new ReliabilityOptimizer({
      selector: this.selector,
      cache: this.cache,
      perSiteConcurrency: this.options.perSiteConcurrency,
      retry: this.options.retry,
      ttl: this.options.cache.ttl,
      slowCallMs: this.options.slowCallMs,
      degradedTimeoutFactor: this.options.degradedTimeoutFactor,
      defaultTimeoutMs: this.options.aggregator.siteTimeoutMs,
      logger: this.logger,
    });

    this.aggregator = new ConcurrentAggregator({
      ...this.options.aggregator,
      searcher: this.optimizer,
      logger: this.logger,
    });

    this.pager = new CategoryPager((site, typeId, page, filters, options) =>
      this.resolveCategory(site, typeId, page, filters, options)
    );
  }

  // ===========================================================================
  // Content operations
  // ===========================================================================

  /**
   * Home listing: categories, filters and recommended items
   */
  async resolveHome(site: Site, options: CallOptions = {}): Promise<ListingEnvelope> {
    return this.runListing(site, { type: "home", filter: site.filterable !== false }, options);
  }

  /**
   * One page of a category; filters are dropped for sites that take none
   */
  async resolveCategory(
    site: Site,
    typeId: string,
    page = 1,
    filters: Record<string, string> = {},
    options: CallOptions = {}
  ): Promise<ListingEnvelope> {
    return this.runListing(
      site,
      {
        type: "category",
        typeId,
        page: Math.max(1, Math.trunc(page)),
        filters: site.filterable === false ? {} : filters,
      },
      options
    );
  }

  /**
   * Detail records for the given ids
   */
  async resolveDetail(site: Site, ids: string[], options: CallOptions = {}): Promise<ListingEnvelope> {
    return this.runListing(site, { type: "detail", ids }, options);
  }

  /**
   * Resolve an episode id into a playable URL
   */
  async resolvePlay(
    site: Site,
    flag: string,
    id: string,
    vipFlags: string[] = [],
    options: CallOptions = {}
  ): Promise<PlayDescriptor> {
    const envelope = await this.run(site, { type: "play", flag, id, vipFlags }, options);
    if (envelope instanceof Error) {
      return failurePlay(site.key, flag, envelope);
    }
    if (envelope.kind !== "play") {
      return failurePlay(site.key, flag, new MalformedResponseError("Play produced a listing", { siteKey: site.key }));
    }
    return envelope;
  }

  /**
   * Search many sites and stream one result per site, then a complete event
   *
   * @throws EngineClosedError when the engine is closed
   */
  async *search(
    sites: readonly Site[],
    keyword: string,
    quick = false,
    options: SearchOptions = {}
  ): AsyncGenerator<AggregatorEvent, void, undefined> {
    this.ensureOpen();
    const linked = this.track(options.signal);
    try {
      yield* this.aggregator.search(sites, keyword, quick, { ...options, signal: linked.signal });
    } finally {
      this.untrack(linked);
    }
  }

  /**
   * Run a search to completion
   *
   * @throws EngineClosedError when the engine is closed
   */
  async searchAll(
    sites: readonly Site[],
    keyword: string,
    quick = false,
    options: SearchOptions = {}
  ): Promise<SearchCollection> {
    this.ensureOpen();
    const linked = this.track(options.signal);
    try {
      return await this.aggregator.collect(sites, keyword, quick, { ...options, signal: linked.signal });
    } finally {
      this.untrack(linked);
    }
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  stats(): VodEngineStats {
    return {
      engine: this.selector.stats(),
      hook: { hooks: this.hooks.stats(), registered: this.hooks.counts() },
      cache: this.cache.stats(),
      aggregator: this.aggregator.stats(),
      performance: this.optimizer.stats(),
    };
  }

  suggestions(): Suggestion[] {
    return this.optimizer.suggestions();
  }

  clearStats(): void {
    this.selector.clearStats();
    this.hooks.clearStats();
    this.cache.clearStats();
    this.aggregator.clearStats();
    this.optimizer.clearStats();
  }

  /**
   * Drop cached results whose key starts with the prefix
   *
   * @example
   * await engine.invalidate(cacheKeyPrefix("demo", "home"));
   */
  async invalidate(prefix: string): Promise<number> {
    return this.cache.invalidate(prefix);
  }

  /**
   * Check if the engine still accepts calls
   */
  isReady(): boolean {
    return !this.closed;
  }

  /**
   * Cancel in-flight calls and release every spider
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const controller of this.active) {
      controller.abort(new EngineClosedError());
    }
    this.active.clear();

    await this.selector.close();
    this.logger.info("[vodhub] Engine closed");
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async runListing(site: Site, operation: ListingOperation, options: CallOptions): Promise<ListingEnvelope> {
    const envelope = await this.run(site, operation, options);
    if (envelope instanceof Error) {
      return failureListing(site.key, operation, envelope);
    }
    if (envelope.kind !== "listing") {
      return failureListing(
        site.key,
        operation,
        new MalformedResponseError(`${operation.type} produced a play envelope`, { siteKey: site.key })
      );
    }
    return envelope;
  }

  /**
   * One call through the optimizer; errors are returned, never thrown
   */
  private async run(site: Site, operation: ParserOperation, options: CallOptions): Promise<ContentEnvelope | VodError> {
    if (this.closed) {
      return new EngineClosedError();
    }

    const linked = this.track(options.signal);
    try {
      const { envelope } = await this.optimizer.execute(site, operation, { signal: linked.signal });
      return envelope;
    } catch (error: unknown) {
      const err = linked.signal.aborted ? abortReason(linked.signal, site.key) : error;
      return wrapError(err, site.key);
    } finally {
      this.untrack(linked);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new EngineClosedError();
    }
  }

  private track(signal?: AbortSignal): LinkedController {
    const linked = linkSignals([signal]);
    this.active.add(linked);
    return linked;
  }

  private untrack(linked: LinkedController): void {
    this.active.delete(linked);
    linked.dispose();
  }
}
