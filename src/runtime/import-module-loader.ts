/**
 * Default ModuleLoader
 *
 * Resolves a module reference in this order:
 * 1. a spider registered in-process under that name (`csp_Demo`)
 * 2. a `file:` or `data:` URL, or a local path, loaded with `import()`
 *
 * The module's spider is its default export, its `Spider` export, or the
 * export named by `ext.className`. Classes are instantiated without arguments;
 * an `init(ext, host)` method is awaited when present.
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import type { Invoker, ModuleLoader, ModuleLoadOptions } from "./types.js";
import { callMember, hasMember, serializeExt } from "./call-context.js";
import { BackendInitError } from "../errors.js";

/**
 * Spider class or ready-made spider object
 */
export type ModuleExport = (new () => object) | object;

export interface ImportModuleLoaderOptions {
  /** Directory that relative module paths resolve against (default: cwd) */
  baseDir?: string;
  /** In-process spiders by module name */
  registry?: Record<string, ModuleExport>;
}

export class ImportModuleLoader implements ModuleLoader {
  private readonly baseDir: string;
  private readonly registry: Map<string, ModuleExport>;

  constructor(options: ImportModuleLoaderOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.registry = new Map(Object.entries(options.registry ?? {}));
  }

  /**
   * Make a spider available under a module name
   */
  register(name: string, spider: ModuleExport): void {
    this.registry.set(name, spider);
  }

  async resolve(moduleRef: string, options: ModuleLoadOptions): Promise<Invoker> {
    const siteKey = options.site.key;
    const exported = this.registry.get(moduleRef) ?? (await this.importExport(moduleRef, options));
    const instance = this.instantiate(exported, moduleRef, siteKey);

    if (hasMember(instance, "init")) {
      try {
        await callMember(instance, "init", [serializeExt(options.site.ext), options.host]);
      } catch (error: unknown) {
        throw new BackendInitError("module", `init() of ${moduleRef} failed: ${errorMessage(error)}`, {
          siteKey,
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    return {
      call: (fn: string, args: unknown[]) => callMember(instance, fn, args),
      dispose: async () => {
        if (hasMember(instance, "destroy")) {
          await callMember(instance, "destroy", []);
        }
      },
    };
  }

  private async importExport(moduleRef: string, options: ModuleLoadOptions): Promise<ModuleExport> {
    const siteKey = options.site.key;
    if (/^https?:\/\//i.test(moduleRef)) {
      throw new BackendInitError("module", `Remote module ${moduleRef} is not loaded; install it locally`, { siteKey });
    }

    const specifier =
      moduleRef.startsWith("file:") || moduleRef.startsWith("data:")
        ? moduleRef
        : pathToFileURL(path.resolve(this.baseDir, moduleRef)).href;

    let namespace: unknown;
    try {
      namespace = await import(specifier);
    } catch (error: unknown) {
      throw new BackendInitError("module", `Cannot load ${moduleRef}: ${errorMessage(error)}`, {
        siteKey,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const className = readClassName(options.site.ext);
    const candidates = className ? [className] : ["default", "Spider"];
    for (const name of candidates) {
      const value: unknown = typeof namespace === "object" && namespace !== null ? Reflect.get(namespace, name) : undefined;
      if ((typeof value === "function" || typeof value === "object") && value !== null) {
        return value;
      }
    }
    throw new BackendInitError("module", `${moduleRef} has no export ${candidates.join(" or ")}`, { siteKey });
  }

  private instantiate(exported: unknown, moduleRef: string, siteKey: string): object {
    if (typeof exported === "function") {
      let instance: unknown;
      try {
        instance = Reflect.construct(exported, []);
      } catch (error: unknown) {
        throw new BackendInitError("module", `Cannot instantiate ${moduleRef}: ${errorMessage(error)}`, {
          siteKey,
          cause: error instanceof Error ? error : undefined,
        });
      }
      if (typeof instance === "object" && instance !== null) {
        return instance;
      }
    } else if (typeof exported === "object" && exported !== null) {
      return exported;
    }
    throw new BackendInitError("module", `${moduleRef} did not provide a spider object`, { siteKey });
  }
}

function readClassName(ext: unknown): string | undefined {
  if (typeof ext !== "object" || ext === null) {
    return undefined;
  }
  const className: unknown = Reflect.get(ext, "className");
  return typeof className === "string" && className !== "" ? className : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
