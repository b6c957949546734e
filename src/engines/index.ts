/**
 * Parser backends and the engine selector
 */

export type { Backend, BackendContext, BackendName, BackendStats, DegradedSite, EngineStats } from "./types.js";
export { BACKEND_NAMES } from "./types.js";
export {
  ScriptBackend,
  ModuleBackend,
  HtmlRuleBackend,
  JsonApiBackend,
  DefaultRuleBackend,
  createBackends,
  type BackendDependencies,
} from "./backends.js";
export { EngineSelector, preferredBackend, type EngineSelectorOptions, type ExecuteOptions } from "./selector.js";
