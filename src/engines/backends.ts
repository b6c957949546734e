/**
 * Built-in backends
 */

import type { Backend, BackendContext, BackendName } from "./types.js";
import type { Spider } from "../spiders/types.js";
import type { ModuleLoader, ScriptRuntime } from "../runtime/types.js";
import { ScriptSpider, ModuleSpider } from "../spiders/invoker-spider.js";
import { HtmlRuleSpider } from "../spiders/html-rule-spider.js";
import { JsonApiSpider, resolveJsonApiOptions } from "../spiders/json-api-spider.js";
import { DEFAULT_RULES, resolveHtmlRules } from "../spiders/rules/html-rules.js";
import { BackendInitError } from "../errors.js";
import { getOrigin } from "../utils/url-helpers.js";

export class ScriptBackend implements Backend {
  readonly name = "script";

  constructor(private readonly runtime: ScriptRuntime) {}

  createSpider({ site, http, logger, signal }: BackendContext): Promise<Spider> {
    return ScriptSpider.create({ site, runtime: this.runtime, http, logger, signal });
  }
}

export class ModuleBackend implements Backend {
  readonly name = "module";

  constructor(private readonly loader: ModuleLoader) {}

  createSpider({ site, http, logger }: BackendContext): Promise<Spider> {
    return ModuleSpider.create({ site, loader: this.loader, http, logger });
  }
}

export class HtmlRuleBackend implements Backend {
  readonly name = "html-rule";

  async createSpider({ site, http }: BackendContext): Promise<Spider> {
    return new HtmlRuleSpider(site, http, resolveHtmlRules(site.ext, site.key));
  }
}

export class JsonApiBackend implements Backend {
  readonly name = "json-api";

  async createSpider({ site, http }: BackendContext): Promise<Spider> {
    return new JsonApiSpider(site, http, resolveJsonApiOptions(site.ext));
  }
}

/**
 * Fallback backend: the built-in HTML rules against the origin of the site's api
 */
export class DefaultRuleBackend implements Backend {
  readonly name = "default-rule";

  async createSpider({ site, http }: BackendContext): Promise<Spider> {
    const origin = getOrigin(site.api);
    if (origin === "") {
      throw new BackendInitError(this.name, `No http(s) origin in ${site.api}`, { siteKey: site.key });
    }
    return new HtmlRuleSpider(site, http, DEFAULT_RULES, origin);
  }
}

export interface BackendDependencies {
  runtime: ScriptRuntime;
  loader: ModuleLoader;
}

/**
 * Backend registry
 */
export function createBackends(dependencies: BackendDependencies): Record<BackendName, Backend> {
  return {
    script: new ScriptBackend(dependencies.runtime),
    module: new ModuleBackend(dependencies.loader),
    "html-rule": new HtmlRuleBackend(),
    "json-api": new JsonApiBackend(),
    "default-rule": new DefaultRuleBackend(),
  };
}
