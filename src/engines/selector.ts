/**
 * Engine Selector
 *
 * Maps a site to a parser backend and runs operations on the resulting spider.
 *
 * - Spiders are created lazily, once per site; concurrent first calls share
 *   one initialization.
 * - When the preferred backend fails to initialize the site is demoted to the
 *   default-rule backend. A failed initialization is not retried until the
 *   cool-down has passed; after that the next call tries the preferred
 *   backend again.
 * - Play envelopes go through the player hooks before they are returned.
 */

import type { ContentEnvelope, ParserOperation, PlayDescriptor, Site } from "../types.js";
import type { Transport } from "../transport/types.js";
import type { HookPipeline } from "../hooks/pipeline.js";
import type { ModuleLoader, ScriptRuntime } from "../runtime/types.js";
import type { Spider } from "../spiders/types.js";
import { dispatch } from "../spiders/types.js";
import { SpiderHttp } from "../spiders/spider-http.js";
import { normalizePayload } from "../normalize/envelope.js";
import type { Backend, BackendName, BackendStats, DegradedSite, EngineStats } from "./types.js";
import { BACKEND_NAMES } from "./types.js";
import { createBackends } from "./backends.js";
import { BackendInitError, CancelledError, type VodError, wrapError } from "../errors.js";
import { abortReason, raceSignal, throwIfAborted, withTimeout } from "../utils/abort.js";
import { CounterMap, OutcomeCounter } from "../utils/stats.js";
import type { Logger } from "../utils/logger.js";

export interface EngineSelectorOptions {
  transport: Transport;
  hooks: HookPipeline;
  runtime: ScriptRuntime;
  loader: ModuleLoader;
  /** Replace individual backends */
  backends?: Partial<Record<BackendName, Backend>>;
  /** Cool-down before a failed initialization is retried (default: 60000ms) */
  initCooldownMs?: number;
  /** Limit on one backend initialization (default: 30000ms) */
  initTimeoutMs?: number;
  logger?: Logger;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

interface SpiderHandle {
  backend: BackendName;
  spider: Spider;
  /** Set when the site runs on the fallback backend */
  demotedAt?: number;
}

type InitOutcome = { ok: true; handle: SpiderHandle } | { ok: false; error: VodError; at: number };

/**
 * Pick the backend a site asks for
 */
export function preferredBackend(site: Site): BackendName {
  switch (site.kind) {
    case "script":
      return "script";
    case "module":
      return "module";
    case "rule":
      return isJsonApi(site) ? "json-api" : "html-rule";
    default: {
      const unreachable: never = site.kind;
      throw new Error(`Unknown parser kind ${String(unreachable)}`);
    }
  }
}

function isJsonApi(site: Site): boolean {
  const api = site.api.toLowerCase();
  if (api.includes("/provide/vod") || api.includes("ac=")) {
    return true;
  }
  if (api.split(/[?#]/)[0].endsWith(".json")) {
    return true;
  }
  const ext = site.ext;
  return typeof ext === "object" && ext !== null && Reflect.get(ext, "type") === "json";
}

export class EngineSelector {
  private readonly backends: Record<BackendName, Backend>;
  private readonly transport: Transport;
  private readonly hooks: HookPipeline;
  private readonly initCooldownMs: number;
  private readonly initTimeoutMs: number;
  private readonly logger?: Logger;

  private handles = new Map<string, Promise<InitOutcome>>();
  private counters = new CounterMap();
  private demotions = new Map<BackendName, number>();
  private degraded = new Map<string, DegradedSite>();

  constructor(options: EngineSelectorOptions) {
    this.backends = {
      ...createBackends({ runtime: options.runtime, loader: options.loader }),
      ...options.backends,
    };
    this.transport = options.transport;
    this.hooks = options.hooks;
    this.initCooldownMs = options.initCooldownMs ?? 60000;
    this.initTimeoutMs = options.initTimeoutMs ?? 30000;
    this.logger = options.logger;
  }

  /**
   * Run one operation against a site
   *
   * @throws VodError on any failure; CancelledError when the signal fires
   */
  async execute(site: Site, operation: ParserOperation, options: ExecuteOptions = {}): Promise<ContentEnvelope> {
    const { signal } = options;
    throwIfAborted(signal, site.key);

    const handle = await this.acquire(site, signal);
    const counter = this.counters.get(handle.backend);
    const startTime = Date.now();

    try {
      const payload = await raceSignal(dispatch(handle.spider, operation, { signal }), signal, site.key);
      const envelope = normalizePayload(site.key, operation, payload);
      const result = envelope.kind === "play" ? await this.applyPlayerHooks(envelope, signal) : envelope;

      counter.recordSuccess(Date.now() - startTime);
      this.logger?.debug(`[selector] ${site.key} ${operation.type} via ${handle.backend}: ${result.status}`);
      return result;
    } catch (error: unknown) {
      const err = wrapError(signal?.aborted ? abortReason(signal, site.key) : error, site.key);
      if (!(err instanceof CancelledError)) {
        counter.recordFailure(Date.now() - startTime, { message: err.message, code: err.code });
      }
      throw err;
    }
  }

  /**
   * Backend currently serving a site, if initialized
   */
  async backendFor(siteKey: string): Promise<BackendName | undefined> {
    const outcome = await this.handles.get(siteKey);
    return outcome?.ok ? outcome.handle.backend : undefined;
  }

  stats(): EngineStats {
    const names = new Set<BackendName>(this.demotions.keys());
    for (const [name] of this.counters.entries()) {
      if (isBackendName(name)) names.add(name);
    }

    const backends: Partial<Record<BackendName, BackendStats>> = {};
    for (const name of names) {
      const snapshot = (this.counters.peek(name) ?? new OutcomeCounter()).snapshot();
      backends[name] = { ...snapshot, demotions: this.demotions.get(name) ?? 0 };
    }
    return { backends, degradedSites: this.degradedSites() };
  }

  /**
   * Sites that were demoted to the default backend
   */
  degradedSites(): Record<string, DegradedSite> {
    return Object.fromEntries(this.degraded);
  }

  clearStats(): void {
    this.counters.clear();
    this.demotions.clear();
  }

  /**
   * Destroy every spider and forget all sites
   */
  async close(): Promise<void> {
    const outcomes = await Promise.all(this.handles.values());
    this.handles.clear();
    this.degraded.clear();

    for (const outcome of outcomes) {
      if (!outcome.ok) continue;
      await this.destroy(outcome.handle);
    }
  }

  // ===========================================================================
  // Initialization
  // ===========================================================================

  private async acquire(site: Site, signal?: AbortSignal): Promise<SpiderHandle> {
    let pending = this.handles.get(site.key);
    let outcome = pending ? await raceSignal(pending, signal, site.key) : undefined;

    if (outcome && this.isStale(outcome)) {
      const current = this.handles.get(site.key) === pending;
      if (current) this.handles.delete(site.key);
      if (current && outcome.ok) {
        this.logger?.info(`[selector] Cool-down over for ${site.key}, retrying ${preferredBackend(site)}`);
        await this.destroy(outcome.handle);
      }
      outcome = undefined;
    }

    if (!outcome) {
      // Another caller may have started a fresh initialization meanwhile
      pending = this.handles.get(site.key);
      if (!pending) {
        pending = this.initialize(site);
        this.handles.set(site.key, pending);
      }
      outcome = await raceSignal(pending, signal, site.key);
    }

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.handle;
  }

  /**
   * Failures and demotions expire after the cool-down
   */
  private isStale(outcome: InitOutcome): boolean {
    const since = outcome.ok ? outcome.handle.demotedAt : outcome.at;
    return since !== undefined && Date.now() - since >= this.initCooldownMs;
  }

  /**
   * Create the site's spider; never rejects
   */
  private async initialize(site: Site): Promise<InitOutcome> {
    const preferred = preferredBackend(site);

    try {
      const spider = await this.create(preferred, site);
      this.degraded.delete(site.key);
      this.logger?.debug(`[selector] ${site.key} initialized on ${preferred}`);
      return { ok: true, handle: { backend: preferred, spider } };
    } catch (error: unknown) {
      const err = wrapError(error, site.key);
      this.counters.get(preferred).recordFailure(0, { message: err.message, code: err.code });

      if (preferred === "default-rule") {
        return { ok: false, error: err, at: Date.now() };
      }

      this.demotions.set(preferred, (this.demotions.get(preferred) ?? 0) + 1);
      this.degraded.set(site.key, { backend: preferred, reason: err.message, at: Date.now() });
      this.logger?.warn(`[selector] ${preferred} failed for ${site.key} (${err.message}), demoting to default-rule`);

      try {
        const spider = await this.create("default-rule", site);
        return { ok: true, handle: { backend: "default-rule", spider, demotedAt: Date.now() } };
      } catch (fallbackError: unknown) {
        const fallback = wrapError(fallbackError, site.key);
        this.logger?.warn(`[selector] default-rule failed for ${site.key}: ${fallback.message}`);
        return {
          ok: false,
          error: new BackendInitError("default-rule", `${err.message}; fallback failed: ${fallback.message}`, {
            siteKey: site.key,
            cause: fallback,
          }),
          at: Date.now(),
        };
      }
    }
  }

  private create(backendName: BackendName, site: Site): Promise<Spider> {
    const backend = this.backends[backendName];
    const http = new SpiderHttp({ site, transport: this.transport, hooks: this.hooks, logger: this.logger });
    return withTimeout(
      (signal) => backend.createSpider({ site, http, logger: this.logger, signal }),
      this.initTimeoutMs,
      undefined,
      site.key
    );
  }

  private async destroy(handle: SpiderHandle): Promise<void> {
    try {
      await handle.spider.destroy?.();
    } catch (error: unknown) {
      this.logger?.warn(`[selector] destroy() of ${handle.spider.siteKey} failed: ${wrapError(error).message}`);
    }
  }

  // ===========================================================================
  // Player hooks
  // ===========================================================================

  private async applyPlayerHooks(envelope: PlayDescriptor, signal?: AbortSignal): Promise<PlayDescriptor> {
    if (envelope.url === "") {
      return envelope;
    }

    const processed = await this.hooks.run(
      "player",
      {
        originalUrl: envelope.url,
        processedUrl: envelope.url,
        headers: { ...envelope.headers },
        needsParse: envelope.needsParse,
        flag: envelope.flag,
        metadata: { siteKey: envelope.siteKey },
      },
      { siteKey: envelope.siteKey, signal }
    );

    return {
      ...envelope,
      url: processed.processedUrl,
      headers: processed.headers,
      needsParse: processed.needsParse,
    };
  }
}

function isBackendName(name: string): name is BackendName {
  return BACKEND_NAMES.some((backend) => backend === name);
}
