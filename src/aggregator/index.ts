export {
  ConcurrentAggregator,
  defaultConcurrency,
  type AggregatorEvent,
  type AggregatorStats,
  type ConcurrentAggregatorOptions,
  type SearchCollection,
  type SearchCompleteEvent,
  type SearchOptions,
  type SearchResultEvent,
  type SearchSummary,
  type SiteSearcher,
} from "./aggregator.js";
export { CategoryPager, type CategoryLoader, type PagerState } from "./pager.js";
