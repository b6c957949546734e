/**
 * HTTP Engine - Native fetch
 *
 * Fastest engine, no extra client. Falls back to tlsclient when blocked.
 */

import type { TransportEngine, TransportEngineConfig, TransportRequest, TransportResponse } from "../types.js";
import { TRANSPORT_ENGINE_CONFIGS } from "../types.js";
import { abortReason } from "../../utils/abort.js";
import { wrapError } from "../../errors.js";
import type { Logger } from "../../utils/logger.js";

/**
 * HTTP Engine implementation using native fetch
 */
export class HttpEngine implements TransportEngine {
  readonly config: TransportEngineConfig = TRANSPORT_ENGINE_CONFIGS.http;

  async fetch(request: TransportRequest, signal: AbortSignal, logger?: Logger): Promise<TransportResponse> {
    const startTime = Date.now();

    try {
      logger?.debug(`[http] ${request.method} ${request.url}`);

      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.method === "POST" ? request.body : undefined,
        redirect: "follow",
        signal,
      });

      const bytes = new Uint8Array(await response.arrayBuffer());
      const duration = Date.now() - startTime;

      logger?.debug(`[http] Got response: ${response.status} (${bytes.byteLength} bytes) in ${duration}ms`);

      return {
        url: response.url || request.url,
        statusCode: response.status,
        headers: this.headersToRecord(response.headers),
        bytes,
        engine: "http",
        duration,
      };
    } catch (error: unknown) {
      if (signal.aborted) {
        throw abortReason(signal);
      }
      throw wrapError(error);
    }
  }

  /**
   * Convert Headers to Record<string, string>
   */
  private headersToRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, key) => {
      record[key.toLowerCase()] = value;
    });
    return record;
  }

  isAvailable(): boolean {
    return typeof fetch === "function";
  }
}

/**
 * Singleton instance
 */
export const httpEngine = new HttpEngine();
