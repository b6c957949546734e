export { normalizeSite, normalizeSites, type SiteListResult } from "./sites.js";
export { resolveEngineOptions, type ResolvedEngineOptions } from "./options.js";
