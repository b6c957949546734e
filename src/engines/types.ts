/**
 * Parser backend types
 *
 * A backend turns a site into a ready spider. Backends in order of how a site
 * declares them:
 * 1. script - embedded JavaScript program
 * 2. module - dynamically loaded spider class
 * 3. json-api - CMS JSON endpoint (rule sites)
 * 4. html-rule - CSS selector rules from `ext` (rule sites)
 * 5. default-rule - built-in HTML rules; the fallback for every site
 */

import type { Site } from "../types.js";
import type { Spider } from "../spiders/types.js";
import type { SpiderHttp } from "../spiders/spider-http.js";
import type { OutcomeSnapshot } from "../utils/stats.js";
import type { Logger } from "../utils/logger.js";

/**
 * Available backend names
 */
export type BackendName = "script" | "module" | "html-rule" | "json-api" | "default-rule";

export const BACKEND_NAMES: readonly BackendName[] = ["script", "module", "html-rule", "json-api", "default-rule"];

/**
 * Everything a backend needs to build a spider for one site
 */
export interface BackendContext {
  site: Site;
  http: SpiderHttp;
  logger?: Logger;
  /** Fires when initialization times out */
  signal?: AbortSignal;
}

/**
 * Backend interface
 */
export interface Backend {
  readonly name: BackendName;

  /**
   * Build and initialize a spider for the site
   * @throws BackendInitError or ConfigError when the site cannot be served
   */
  createSpider(context: BackendContext): Promise<Spider>;
}

/**
 * Demotion record of a site running on the default backend
 */
export interface DegradedSite {
  /** Backend that failed to initialize */
  backend: BackendName;
  reason: string;
  /** Epoch ms of the demotion */
  at: number;
}

export interface BackendStats extends OutcomeSnapshot {
  /** Sites demoted away from this backend */
  demotions: number;
}

export interface EngineStats {
  backends: Partial<Record<BackendName, BackendStats>>;
  degradedSites: Record<string, DegradedSite>;
}
