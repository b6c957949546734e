export type { RawPayload, Spider, SpiderCallOptions } from "./types.js";
export { dispatch } from "./types.js";
export { SpiderHttp, type SpiderHttpOptions, type SpiderRequestInit } from "./spider-http.js";
export { HtmlRuleSpider } from "./html-rule-spider.js";
export { JsonApiSpider, resolveJsonApiOptions, type JsonApiOptions } from "./json-api-spider.js";
export {
  InvokerSpider,
  ScriptSpider,
  ModuleSpider,
  createScriptHost,
  type ScriptSpiderOptions,
  type ModuleSpiderOptions,
} from "./invoker-spider.js";
export { DEFAULT_RULES, resolveHtmlRules, type HtmlRules } from "./rules/html-rules.js";
export { parseRule, parseRuleAlternatives, extractAll, extractFirst, type ParsedRule } from "./rules/rule-selector.js";
