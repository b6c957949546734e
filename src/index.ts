/**
 * vodhub
 *
 * Multi-source video-on-demand aggregation engine: pluggable site parsers,
 * hook pipeline, two-tier result cache, concurrent search and per-site
 * reliability tracking.
 */

// =============================================================================
// Main API exports
// =============================================================================
export { VodEngine } from "./vod-engine.js";
export type { VodEngineConfig, VodEngineStats } from "./vod-engine.js";

// =============================================================================
// Type exports
// =============================================================================
export type {
  Site,
  ParserKind,
  OperationName,
  ParserOperation,
  EnvelopeStatus,
  EnvelopeError,
  Category,
  Episode,
  PlaySource,
  ContentItem,
  FilterOption,
  FilterGroup,
  ListingEnvelope,
  PlayDescriptor,
  ContentEnvelope,
  CallOptions,
  CacheOptions,
  RetryOptions,
  AggregatorOptions,
  VodEngineOptions,
} from "./types.js";
export { DEFAULT_ENGINE_OPTIONS, DEFAULT_TTL, isOperationName } from "./types.js";

// =============================================================================
// Site configuration
// =============================================================================
export * from "./config/index.js";

// =============================================================================
// Components (for advanced usage)
// =============================================================================
export * from "./hooks/index.js";
export * from "./transport/index.js";
export * from "./spiders/index.js";
export * from "./engines/index.js";
export * from "./cache/index.js";
export * from "./optimizer/index.js";
export * from "./aggregator/index.js";

export type { Invoker, HostResponse, ScriptHost, ScriptRuntime, ModuleLoadOptions, ModuleLoader } from "./runtime/types.js";
export { SandboxScriptRuntime } from "./runtime/sandbox-script-runtime.js";
export { ImportModuleLoader, type ImportModuleLoaderOptions, type ModuleExport } from "./runtime/import-module-loader.js";

export {
  normalizePayload,
  normalizeListing,
  normalizePlay,
  parsePlaySources,
  failureEnvelope,
  isCacheable,
} from "./normalize/envelope.js";

// =============================================================================
// Utility exports
// =============================================================================
export { createLogger, createSilentLogger, type Logger } from "./utils/logger.js";
export { linkSignals, type LinkedController } from "./utils/abort.js";

// =============================================================================
// Error exports
// =============================================================================
export {
  VodError,
  VodErrorCode,
  ConfigError,
  BackendInitError,
  TransientNetworkError,
  TimeoutError,
  PermanentUpstreamError,
  MalformedResponseError,
  CancelledError,
  EngineClosedError,
  errorForStatus,
  wrapError,
} from "./errors.js";
