/**
 * Contracts of the script runtime and module loader
 *
 * The engine only ever talks to an Invoker; how a script is evaluated or a
 * module is resolved stays behind these interfaces.
 */

import type { Site } from "../types.js";
import type { SpiderRequestInit } from "../spiders/spider-http.js";

/**
 * Calls a named spider function on a loaded script or module
 */
export interface Invoker {
  call(fn: string, args: unknown[], signal?: AbortSignal): Promise<unknown>;
  /** Release the underlying script/module instance */
  dispose?(): Promise<void> | void;
}

export interface HostResponse {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * Services a script may use. Requests go through the site's hooks and transport.
 */
export interface ScriptHost {
  readonly siteKey: string;
  request(url: string, init?: Omit<SpiderRequestInit, "signal">): Promise<HostResponse>;
  log(message: string): void;
}

export interface ScriptRuntime {
  /**
   * Evaluate a script and keep it under `scriptId`
   * @throws BackendInitError when the script does not compile or run
   */
  compile(scriptId: string, source: string, host: ScriptHost): Promise<void>;

  /**
   * Call an exported function; its result is returned as a string
   * (objects are serialized as JSON)
   */
  invoke(scriptId: string, fn: string, args: unknown[]): Promise<string>;

  /** Drop a compiled script */
  release?(scriptId: string): void;
}

export interface ModuleLoadOptions {
  site: Site;
  host: ScriptHost;
}

export interface ModuleLoader {
  /**
   * Resolve a module reference to an Invoker over a spider instance
   * @throws BackendInitError when the module or its spider class cannot be loaded
   */
  resolve(moduleRef: string, options: ModuleLoadOptions): Promise<Invoker>;
}
