/**
 * JSON API spider
 *
 * Talks to CMS-style endpoints (`api.php/provide/vod`) that already answer in
 * CatVod JSON. Actions:
 * - ac=list: categories
 * - ac=videolist: listing page (t, pg, filters)
 * - ac=detail: details (ids)
 * - ac=search: search (wd)
 */

import type { Site } from "../types.js";
import type { RawPayload, Spider, SpiderCallOptions } from "./types.js";
import type { SpiderHttp } from "./spider-http.js";
import { MalformedResponseError } from "../errors.js";
import { isDirectMediaUrl } from "../hooks/builtin/player.js";

export interface JsonApiOptions {
  /** Secondary parser prefix joined to play ids that are not direct media */
  playUrl?: string;
}

/**
 * Read the JSON-API options out of a site's `ext`
 */
export function resolveJsonApiOptions(ext: unknown): JsonApiOptions {
  if (typeof ext !== "object" || ext === null) {
    return {};
  }
  const playUrl: unknown = Reflect.get(ext, "playUrl");
  return typeof playUrl === "string" && playUrl !== "" ? { playUrl } : {};
}

export class JsonApiSpider implements Spider {
  readonly siteKey: string;

  constructor(
    private readonly site: Site,
    private readonly http: SpiderHttp,
    private readonly options: JsonApiOptions = {}
  ) {
    this.siteKey = site.key;
  }

  async homeContent(_filter: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.call({ ac: "list" }, options);
  }

  async categoryContent(
    typeId: string,
    page: number,
    filters: Record<string, string>,
    options: SpiderCallOptions = {}
  ): Promise<RawPayload> {
    return this.call({ ...filters, ac: "videolist", t: typeId, pg: String(page) }, options);
  }

  async detailContent(ids: string[], options: SpiderCallOptions = {}): Promise<RawPayload> {
    return this.call({ ac: "detail", ids: ids.join(",") }, options);
  }

  async searchContent(keyword: string, quick: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    const params: Record<string, string> = { ac: "search", wd: keyword };
    if (quick) {
      params.quick = "1";
    }
    return this.call(params, options);
  }

  /**
   * Play ids of CMS sites are already URLs; nothing to fetch
   */
  async playerContent(_flag: string, id: string, _vipFlags: string[]): Promise<RawPayload> {
    const header = { ...this.site.headers };
    if (isDirectMediaUrl(id)) {
      return { parse: 0, url: id, header };
    }
    if (this.options.playUrl) {
      return { parse: 1, jx: 1, playUrl: this.options.playUrl, url: id, header };
    }
    return { parse: 1, url: id, header };
  }

  private async call(params: Record<string, string>, options: SpiderCallOptions): Promise<RawPayload> {
    const body = await this.http.text(this.site.api, { params, signal: options.signal });
    const trimmed = body.trim();
    if (!trimmed.startsWith("{")) {
      throw new MalformedResponseError(`Expected a JSON object from ${this.site.api}`, { siteKey: this.siteKey });
    }
    return trimmed;
  }
}
