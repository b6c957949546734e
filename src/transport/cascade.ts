/**
 * Transport Cascade
 *
 * Tries fetch engines in order: http first, then tlsclient.
 * A response is returned as soon as one engine produces an acceptable status;
 * 403, 429 and 5xx responses, timeouts and network errors fall through to the
 * next engine. The last engine's response (or error) is final.
 */

import type {
  Transport,
  TransportEngine,
  TransportEngineName,
  TransportRequest,
  TransportResponse,
} from "./types.js";
import { DEFAULT_TRANSPORT_ORDER } from "./types.js";
import { httpEngine } from "./http/index.js";
import { tlsClientEngine } from "./tlsclient/index.js";
import { CancelledError, TransientNetworkError, VodError, wrapError } from "../errors.js";
import { abortReason, linkSignals } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

/**
 * Cascade options
 */
export interface TransportCascadeOptions {
  /** Engines to use (in order). Default: ['http', 'tlsclient'] */
  engines?: TransportEngineName[];
  /** Force a specific engine (skips others) */
  forceEngine?: TransportEngineName;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Engine registry
 */
const ENGINE_REGISTRY: Record<TransportEngineName, TransportEngine> = {
  http: httpEngine,
  tlsclient: tlsClientEngine,
};

/**
 * Default Transport implementation
 *
 * @example
 * const transport = new TransportCascade({ logger });
 * const response = await transport.fetch({ url, method: "GET", headers: {} }, signal);
 */
export class TransportCascade implements Transport {
  private engines: TransportEngine[];
  private logger?: Logger;

  constructor(options: TransportCascadeOptions = {}, registry: Record<TransportEngineName, TransportEngine> = ENGINE_REGISTRY) {
    const order = options.forceEngine ? [options.forceEngine] : (options.engines ?? [...DEFAULT_TRANSPORT_ORDER]);
    this.engines = order.map((name) => registry[name]).filter((engine) => engine.isAvailable());
    this.logger = options.logger;
  }

  /**
   * Get available engines
   */
  getAvailableEngines(): TransportEngineName[] {
    return this.engines.map((e) => e.config.name);
  }

  async fetch(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (this.engines.length === 0) {
      throw new TransientNetworkError("No fetch engine available");
    }

    let lastError: VodError | undefined;

    for (const [index, engine] of this.engines.entries()) {
      const engineName = engine.config.name;
      const isLast = index === this.engines.length - 1;

      if (signal?.aborted) {
        throw abortReason(signal);
      }

      // Per-engine timeout linked to the caller's signal
      const linked = linkSignals([signal], engine.config.maxTimeout);

      try {
        const response = await engine.fetch(request, linked.signal, this.logger);

        if (!isLast && this.shouldFallBack(response.statusCode)) {
          this.logger?.debug(`[transport] ${engineName} HTTP ${response.statusCode}, falling back to next engine`);
          continue;
        }

        return response;
      } catch (error: unknown) {
        const err = wrapError(error);

        // The caller gave up: do not try another engine
        if (signal?.aborted || err instanceof CancelledError) {
          throw signal?.aborted ? abortReason(signal) : err;
        }

        lastError = err;
        this.logger?.debug(`[transport] ${engineName} failed: ${err.message}`);

        if (!err.retryable) {
          break;
        }
      } finally {
        linked.dispose();
      }
    }

    this.logger?.debug(`[transport] All engines failed for ${request.url}`);
    throw lastError ?? new TransientNetworkError(`All fetch engines failed for ${request.url}`);
  }

  /**
   * Statuses that often mean bot detection or a struggling server
   */
  private shouldFallBack(statusCode: number): boolean {
    return statusCode === 403 || statusCode === 429 || statusCode >= 500;
  }
}
