export {
  ReliabilityOptimizer,
  type OperationExecutor,
  type OptimizedResult,
  type OptimizerCallOptions,
  type OptimizerStats,
  type ReliabilityOptimizerOptions,
  type Suggestion,
  type SuggestionType,
} from "./reliability-optimizer.js";
export { RetryState, backoffDelay, isRetryableError, type RetryDecision } from "./retry.js";
export {
  HealthRegistry,
  SiteHealth,
  type HealthOptions,
  type HealthState,
  type HealthTransition,
  type SiteHealthSnapshot,
} from "./site-health.js";
export { PerformanceStats, type PerformanceEntry, type SitePerformance } from "./performance-stats.js";
