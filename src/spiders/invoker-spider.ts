/**
 * Spiders backed by a script or a dynamically loaded module
 *
 * Both only see an Invoker; the signal of each call is carried to host
 * requests through the call context.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Site } from "../types.js";
import type { RawPayload, Spider, SpiderCallOptions } from "./types.js";
import type { SpiderHttp } from "./spider-http.js";
import type { HostResponse, Invoker, ModuleLoader, ScriptHost, ScriptRuntime } from "../runtime/types.js";
import { currentSignal, runWithSignal, serializeExt } from "../runtime/call-context.js";
import { BackendInitError, CancelledError, MalformedResponseError } from "../errors.js";
import { raceSignal } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

/**
 * Host object handed to scripts and modules
 */
export function createScriptHost(siteKey: string, http: SpiderHttp, logger?: Logger): ScriptHost {
  return {
    siteKey,
    async request(url, init = {}): Promise<HostResponse> {
      const response = await http.request(url, { ...init, signal: currentSignal() });
      return {
        status: response.statusCode,
        url: response.url,
        headers: response.headers,
        body: response.body,
      };
    },
    log(message: string): void {
      logger?.debug(`[script:${siteKey}] ${message}`);
    },
  };
}

export class InvokerSpider implements Spider {
  constructor(
    readonly siteKey: string,
    private readonly invoker: Invoker
  ) {}

  homeContent(filter: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.invoke("homeContent", [filter], options);
  }

  categoryContent(
    typeId: string,
    page: number,
    filters: Record<string, string>,
    options: SpiderCallOptions = {}
  ): Promise<RawPayload> {
    // CatVod spiders take the page as a string and `filter` as a flag
    return this.invoke("categoryContent", [typeId, String(page), Object.keys(filters).length > 0, filters], options);
  }

  detailContent(ids: string[], options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.invoke("detailContent", [ids], options);
  }

  searchContent(keyword: string, quick: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.invoke("searchContent", [keyword, quick], options);
  }

  playerContent(flag: string, id: string, vipFlags: string[], options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.invoke("playerContent", [flag, id, vipFlags], options);
  }

  async destroy(): Promise<void> {
    await this.invoker.dispose?.();
  }

  private async invoke(fn: string, args: unknown[], options: SpiderCallOptions): Promise<RawPayload> {
    const { signal } = options;
    const result = await raceSignal(
      runWithSignal(signal, () => this.invoker.call(fn, args, signal)),
      signal,
      this.siteKey
    );

    if (typeof result === "string") {
      return result;
    }
    if (typeof result === "object" && result !== null && !Array.isArray(result)) {
      return Object.fromEntries(Object.entries(result));
    }
    throw new MalformedResponseError(`${fn}() returned ${result === null ? "null" : typeof result}`, {
      siteKey: this.siteKey,
    });
  }
}

// =============================================================================
// Script spider
// =============================================================================

export interface ScriptSpiderOptions {
  site: Site;
  runtime: ScriptRuntime;
  http: SpiderHttp;
  logger?: Logger;
  signal?: AbortSignal;
}

export class ScriptSpider extends InvokerSpider {
  /**
   * Load the script named by `site.api`, compile it and run its `init`
   *
   * @throws BackendInitError
   */
  static async create(options: ScriptSpiderOptions): Promise<ScriptSpider> {
    const { site, runtime, http, logger, signal } = options;
    const source = await loadScriptSource(site, http, signal);
    const host = createScriptHost(site.key, http, logger);

    await runtime.compile(site.key, source, host);
    try {
      await runWithSignal(signal, () => runtime.invoke(site.key, "init", [serializeExt(site.ext)]));
    } catch (error: unknown) {
      runtime.release?.(site.key);
      throw new BackendInitError("script", `init() failed: ${error instanceof Error ? error.message : String(error)}`, {
        siteKey: site.key,
        cause: error instanceof Error ? error : undefined,
      });
    }

    return new ScriptSpider(site.key, {
      call: (fn, args) => runtime.invoke(site.key, fn, args),
      dispose: () => runtime.release?.(site.key),
    });
  }
}

async function loadScriptSource(site: Site, http: SpiderHttp, signal?: AbortSignal): Promise<string> {
  try {
    if (/^https?:\/\//i.test(site.api)) {
      return await http.text(site.api, { signal });
    }
    const filePath = site.api.startsWith("file:") ? fileURLToPath(site.api) : site.api;
    return await readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (error instanceof CancelledError) {
      throw error;
    }
    throw new BackendInitError("script", `Cannot load script ${site.api}: ${error instanceof Error ? error.message : String(error)}`, {
      siteKey: site.key,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// =============================================================================
// Module spider
// =============================================================================

export interface ModuleSpiderOptions {
  site: Site;
  loader: ModuleLoader;
  http: SpiderHttp;
  logger?: Logger;
}

export class ModuleSpider extends InvokerSpider {
  /**
   * Resolve the module named by `site.api` through the loader
   *
   * @throws BackendInitError
   */
  static async create(options: ModuleSpiderOptions): Promise<ModuleSpider> {
    const { site, loader, http, logger } = options;
    const invoker = await loader.resolve(site.api, { site, host: createScriptHost(site.key, http, logger) });
    return new ModuleSpider(site.key, invoker);
  }
}
