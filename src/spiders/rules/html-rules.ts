/**
 * HTML rule sets for rule-driven sites
 */

import { ConfigError } from "../../errors.js";

export interface HtmlRules {
  /** Home page URL, resolved against the site api (default: the api itself) */
  homeUrl: string;
  /** Category page template; `{typeId}`, `{page}` and filter keys are substituted */
  categoryUrl: string;
  /** Search page template; `{keyword}` and `{page}` are substituted */
  searchUrl: string;

  categoryList: string;
  categoryId: string;
  categoryName: string;

  vodList: string;
  vodId: string;
  vodName: string;
  vodPic: string;
  vodRemarks: string;

  /** Falls back to the vod* rules when empty */
  searchList: string;
  searchId: string;
  searchName: string;
  searchPic: string;
  searchRemarks: string;

  detailName: string;
  detailPic: string;
  detailContent: string;
  detailYear: string;
  detailArea: string;
  detailActor: string;
  detailDirector: string;

  /** One match per play source name */
  playFrom: string;
  /** One container per play source, in the same order */
  playList: string;
  /** Episode elements inside a play container */
  playItem: string;
  playItemName: string;
  playItemId: string;

  /** Media URL on a play page */
  playUrl: string;
  /** Total page count on a listing page */
  pageCount: string;
}

/**
 * Best-effort rules for sites without their own, and for demoted sites
 */
export const DEFAULT_RULES: HtmlRules = {
  homeUrl: "",
  categoryUrl: "/category/{typeId}/page/{page}",
  searchUrl: "/search?q={keyword}",

  categoryList: ".nav-item",
  // last path segment of the link, without extension
  categoryId: "a@href##.*/([^/.]+)(?:\\.html?)?/?$##$1",
  categoryName: "a@text",

  vodList: ".video-item",
  vodId: "a@href",
  vodName: ".title@text",
  vodPic: "img@src",
  vodRemarks: ".remarks@text",

  searchList: ".search-item",
  searchId: "a@href",
  searchName: ".title@text",
  searchPic: "img@src",
  searchRemarks: ".remarks@text",

  detailName: ".video-title@text || h1@text",
  detailPic: ".video-pic img@src",
  detailContent: ".video-desc@text",
  detailYear: ".year@text",
  detailArea: ".area@text",
  detailActor: ".actor@text",
  detailDirector: ".director@text",

  playFrom: ".play-source@text",
  playList: ".play-list",
  playItem: "a",
  playItemName: "@text",
  playItemId: "@href",

  playUrl: ".play-url@href",
  pageCount: "",
};

/**
 * Merge a site's `ext` rule object over the defaults
 *
 * @throws ConfigError when `ext` is present but not an object of strings
 */
export function resolveHtmlRules(ext: unknown, siteKey: string): HtmlRules {
  if (ext === undefined || ext === null || ext === "") {
    return { ...DEFAULT_RULES };
  }

  const source = typeof ext === "string" ? parseRuleJson(ext, siteKey) : ext;
  if (typeof source !== "object" || source === null || Array.isArray(source)) {
    throw new ConfigError("Rule set must be an object", { siteKey, field: "ext" });
  }

  const rules: HtmlRules = { ...DEFAULT_RULES };
  for (const key of Object.keys(DEFAULT_RULES)) {
    if (!isRuleKey(key)) continue;
    const value: unknown = Reflect.get(source, key);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigError(`Rule "${key}" must be a string`, { siteKey, field: `ext.${key}` });
    }
    rules[key] = value;
  }
  return rules;
}

function isRuleKey(key: string): key is keyof HtmlRules {
  return key in DEFAULT_RULES;
}

function parseRuleJson(ext: string, siteKey: string): unknown {
  const trimmed = ext.trim();
  if (!trimmed.startsWith("{")) {
    // A plain string ext is a URL or tag for other backends, not a rule set
    return {};
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    throw new ConfigError("Rule set is not valid JSON", { siteKey, field: "ext" });
  }
}
