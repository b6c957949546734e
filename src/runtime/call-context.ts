import { AsyncLocalStorage } from "node:async_hooks";
import { MalformedResponseError } from "../errors.js";

/**
 * Signal of the spider call currently running on this async path. Host
 * requests issued by scripts and modules pick it up so they stop with the call.
 */
const callContext = new AsyncLocalStorage<AbortSignal | undefined>();

export function runWithSignal<T>(signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
  return callContext.run(signal, fn);
}

export function currentSignal(): AbortSignal | undefined {
  return callContext.getStore();
}

/**
 * Call a named function on an untyped spider object
 *
 * @throws MalformedResponseError when the member is not a function
 */
export async function callMember(target: object, fn: string, args: unknown[]): Promise<unknown> {
  const member: unknown = Reflect.get(target, fn);
  if (typeof member !== "function") {
    throw new MalformedResponseError(`Spider does not implement ${fn}()`);
  }
  const result: unknown = await Reflect.apply(member, target, args);
  return result;
}

export function hasMember(target: object, fn: string): boolean {
  return typeof Reflect.get(target, fn) === "function";
}

/**
 * A site's `ext` as the string CatVod spiders expect in init()
 */
export function serializeExt(ext: unknown): string {
  if (ext === undefined || ext === null) return "";
  return typeof ext === "string" ? ext : JSON.stringify(ext);
}
