export type {
  Hook,
  HookContext,
  HookPlayerUrl,
  HookRequest,
  HookResponse,
  HookResult,
  HookStage,
  HookValueMap,
  PlayerHook,
  RequestHook,
  ResponseHook,
} from "./types.js";
export { HookResults, DEFAULT_HOOK_PRIORITY } from "./types.js";
export { HookPipeline, type HookPipelineOptions, type HookRunOptions, type HookStats } from "./pipeline.js";
export * from "./builtin/index.js";
