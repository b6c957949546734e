/**
 * TLS Client Engine - got-scraping
 *
 * Uses got-scraping for browser-like TLS fingerprinting.
 * Better compatibility with sites that check TLS signatures.
 */

import { gotScraping } from "got-scraping";
import type { IncomingHttpHeaders } from "node:http";
import type { TransportEngine, TransportEngineConfig, TransportRequest, TransportResponse } from "../types.js";
import { TRANSPORT_ENGINE_CONFIGS } from "../types.js";
import { abortReason } from "../../utils/abort.js";
import { wrapError } from "../../errors.js";
import type { Logger } from "../../utils/logger.js";

/**
 * TLS Client Engine implementation using got-scraping
 */
export class TlsClientEngine implements TransportEngine {
  readonly config: TransportEngineConfig = TRANSPORT_ENGINE_CONFIGS.tlsclient;

  async fetch(request: TransportRequest, signal: AbortSignal, logger?: Logger): Promise<TransportResponse> {
    const startTime = Date.now();

    try {
      logger?.debug(`[tlsclient] ${request.method} ${request.url}`);

      const response = await gotScraping({
        url: request.url,
        method: request.method,
        headers: request.headers,
        body: request.method === "POST" ? request.body : undefined,
        timeout: {
          request: this.config.maxTimeout,
        },
        followRedirect: true,
        throwHttpErrors: false,
        retry: { limit: 0 },
        signal,
      });

      const duration = Date.now() - startTime;
      const bytes = new Uint8Array(response.rawBody);

      logger?.debug(`[tlsclient] Got response: ${response.statusCode} (${bytes.byteLength} bytes) in ${duration}ms`);

      return {
        url: response.url,
        statusCode: response.statusCode,
        headers: this.headersToRecord(response.headers),
        bytes,
        engine: "tlsclient",
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
   * Flatten Node's header object; repeated headers are joined with ", "
   */
  private headersToRecord(headers: IncomingHttpHeaders): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      record[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
    }
    return record;
  }

  isAvailable(): boolean {
    return typeof gotScraping === "function";
  }
}

/**
 * Singleton instance
 */
export const tlsClientEngine = new TlsClientEngine();
