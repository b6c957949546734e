/**
 * Spider types
 *
 * A spider is the per-site content extractor. Every spider answers the five
 * CatVod operations with a raw payload (JSON string or object) that the
 * normalizer turns into an envelope.
 */

import type { ParserOperation } from "../types.js";

/**
 * Raw CatVod-style payload
 */
export type RawPayload = string | Record<string, unknown>;

export interface SpiderCallOptions {
  signal?: AbortSignal;
}

export interface Spider {
  readonly siteKey: string;

  homeContent(filter: boolean, options?: SpiderCallOptions): Promise<RawPayload>;

  categoryContent(
    typeId: string,
    page: number,
    filters: Record<string, string>,
    options?: SpiderCallOptions
  ): Promise<RawPayload>;

  detailContent(ids: string[], options?: SpiderCallOptions): Promise<RawPayload>;

  searchContent(keyword: string, quick: boolean, options?: SpiderCallOptions): Promise<RawPayload>;

  playerContent(flag: string, id: string, vipFlags: string[], options?: SpiderCallOptions): Promise<RawPayload>;

  /**
   * Release resources held by the spider
   */
  destroy?(): Promise<void> | void;
}

/**
 * Route an operation to the matching spider method
 */
export function dispatch(spider: Spider, operation: ParserOperation, options: SpiderCallOptions): Promise<RawPayload> {
  switch (operation.type) {
    case "home":
      return spider.homeContent(operation.filter, options);
    case "category":
      return spider.categoryContent(operation.typeId, operation.page, operation.filters, options);
    case "detail":
      return spider.detailContent(operation.ids, options);
    case "search":
      return spider.searchContent(operation.keyword, operation.quick, options);
    case "play":
      return spider.playerContent(operation.flag, operation.id, operation.vipFlags, options);
    default: {
      const unreachable: never = operation;
      throw new Error(`Unknown operation ${JSON.stringify(unreachable)}`);
    }
  }
}
