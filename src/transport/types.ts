/**
 * Transport types
 *
 * Fetch engine stack (in order of preference):
 * 1. http - Native fetch, fastest
 * 2. tlsclient - TLS fingerprinting via got-scraping
 */

import type { Logger } from "../utils/logger.js";

/**
 * Available fetch engine names
 */
export type TransportEngineName = "http" | "tlsclient";

export type HttpMethod = "GET" | "POST";

/**
 * Outbound request as seen by a transport
 */
export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Raw response. Non-2xx statuses are returned, not thrown.
 */
export interface TransportResponse {
  /** Final URL after redirects */
  url: string;
  statusCode: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Undecoded body */
  bytes: Uint8Array;
  /** Engine that produced this response */
  engine: TransportEngineName | "custom";
  /** Time taken in milliseconds */
  duration: number;
}

/**
 * HTTP fetch collaborator used by every spider
 */
export interface Transport {
  /**
   * Perform a request
   * @throws TransientNetworkError, TimeoutError or CancelledError
   */
  fetch(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

/**
 * Fetch engine configuration
 */
export interface TransportEngineConfig {
  name: TransportEngineName;
  /** Absolute max time before killing (ms) */
  maxTimeout: number;
}

/**
 * A single fetch engine inside the cascade
 */
export interface TransportEngine {
  readonly config: TransportEngineConfig;

  fetch(request: TransportRequest, signal: AbortSignal, logger?: Logger): Promise<TransportResponse>;

  /**
   * Check if engine is available and configured
   */
  isAvailable(): boolean;
}

/**
 * Default engine configurations
 */
export const TRANSPORT_ENGINE_CONFIGS: Record<TransportEngineName, TransportEngineConfig> = {
  http: {
    name: "http",
    maxTimeout: 10000,
  },
  tlsclient: {
    name: "tlsclient",
    maxTimeout: 15000,
  },
};

/**
 * Default engine order
 */
export const DEFAULT_TRANSPORT_ORDER: TransportEngineName[] = ["http", "tlsclient"];
