/**
 * Default ScriptRuntime
 *
 * Evaluates CommonJS-style spider scripts with `new Function`. A script sees
 * `module`, `exports`, `host` and a `console` that writes to the engine log,
 * and exports the CatVod functions:
 *
 * @example
 * module.exports = {
 *   async homeContent(filter) {
 *     const res = await host.request("https://example.com/api/home");
 *     return res.body;
 *   },
 * };
 *
 * Scripts run in-process and are trusted in the same way as site configuration.
 */

import type { ScriptHost, ScriptRuntime } from "./types.js";
import { callMember, hasMember } from "./call-context.js";
import { BackendInitError } from "../errors.js";

/**
 * Lifecycle functions a script may leave out
 */
const OPTIONAL_FUNCTIONS = new Set(["init", "destroy"]);

export class SandboxScriptRuntime implements ScriptRuntime {
  private scripts = new Map<string, object>();

  async compile(scriptId: string, source: string, host: ScriptHost): Promise<void> {
    let factory: Function;
    try {
      factory = new Function("module", "exports", "host", "console", `"use strict";\n${source}`);
    } catch (error: unknown) {
      throw new BackendInitError("script", `Compile error in ${scriptId}: ${describe(error)}`, {
        siteKey: host.siteKey,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const moduleObject: { exports: unknown } = { exports: {} };
    try {
      const completion: unknown = Reflect.apply(factory, undefined, [
        moduleObject,
        moduleObject.exports,
        host,
        this.createConsole(host),
      ]);
      await completion;
    } catch (error: unknown) {
      throw new BackendInitError("script", `Evaluation of ${scriptId} failed: ${describe(error)}`, {
        siteKey: host.siteKey,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const exported = moduleObject.exports;
    if (typeof exported !== "object" || exported === null) {
      throw new BackendInitError("script", `${scriptId} exports no spider object`, { siteKey: host.siteKey });
    }
    if (!hasMember(exported, "homeContent")) {
      throw new BackendInitError("script", `${scriptId} does not export homeContent()`, { siteKey: host.siteKey });
    }

    this.scripts.set(scriptId, exported);
  }

  async invoke(scriptId: string, fn: string, args: unknown[]): Promise<string> {
    const exported = this.scripts.get(scriptId);
    if (!exported) {
      throw new BackendInitError("script", `Script ${scriptId} is not compiled`);
    }

    if (OPTIONAL_FUNCTIONS.has(fn) && !hasMember(exported, fn)) {
      return "";
    }

    const result = await callMember(exported, fn, args);
    if (typeof result === "string") {
      return result;
    }
    return JSON.stringify(result ?? {});
  }

  release(scriptId: string): void {
    this.scripts.delete(scriptId);
  }

  private createConsole(host: ScriptHost): Record<"log" | "info" | "warn" | "error", (...args: unknown[]) => void> {
    const write = (...args: unknown[]) => host.log(args.map((arg) => (typeof arg === "string" ? arg : describe(arg))).join(" "));
    return { log: write, info: write, warn: write, error: write };
  }
}

function describe(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
