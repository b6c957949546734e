/**
 * HTML rule spider
 *
 * Scrapes listing, detail and play pages with CSS selector rules and emits
 * CatVod payloads.
 */

import { parseHTML } from "linkedom";
import type { Site } from "../types.js";
import type { RawPayload, Spider, SpiderCallOptions } from "./types.js";
import type { SpiderHttp } from "./spider-http.js";
import type { HtmlRules } from "./rules/html-rules.js";
import { extractAll, extractFirst, selectAll, type RuleRoot } from "./rules/rule-selector.js";
import { isDirectMediaUrl } from "../hooks/builtin/player.js";
import { fillTemplate, resolveUrl } from "../utils/url-helpers.js";

interface VodRules {
  list: string;
  id: string;
  name: string;
  pic: string;
  remarks: string;
}

export class HtmlRuleSpider implements Spider {
  readonly siteKey: string;

  constructor(
    private readonly site: Site,
    private readonly http: SpiderHttp,
    private readonly rules: HtmlRules,
    private readonly baseUrl: string = site.api
  ) {
    this.siteKey = site.key;
  }

  async homeContent(_filter: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    const url = resolveUrl(this.rules.homeUrl, this.baseUrl);
    const document = await this.load(url, options);

    const allow = this.site.categories;
    const categories = selectAll(document, this.rules.categoryList)
      .map((element) => ({
        type_id: extractFirst(element, this.rules.categoryId),
        type_name: extractFirst(element, this.rules.categoryName),
      }))
      .filter((category) => category.type_id !== "" && category.type_name !== "")
      .filter((category) => !allow || allow.length === 0 || allow.includes(category.type_name));

    return {
      class: categories,
      list: this.parseVodList(document, this.vodRules()),
      filters: {},
    };
  }

  async categoryContent(
    typeId: string,
    page: number,
    filters: Record<string, string>,
    options: SpiderCallOptions = {}
  ): Promise<RawPayload> {
    const path = this.fillPath(this.rules.categoryUrl, { ...filters, typeId, page });
    const document = await this.load(resolveUrl(path, this.baseUrl), options);
    const list = this.parseVodList(document, this.vodRules());
    const declared = Number.parseInt(extractFirst(document, this.rules.pageCount).replace(/\D+/g, ""), 10);

    return {
      page,
      pagecount: Number.isFinite(declared) && declared > 0 ? declared : list.length > 0 ? page + 1 : page,
      limit: list.length,
      total: list.length,
      list,
    };
  }

  async detailContent(ids: string[], options: SpiderCallOptions = {}): Promise<RawPayload> {
    const list: Array<Record<string, string>> = [];
    for (const id of ids) {
      const document = await this.load(resolveUrl(id, this.baseUrl), options);
      list.push(this.parseDetail(document, id));
    }
    return { list };
  }

  async searchContent(keyword: string, _quick: boolean, options: SpiderCallOptions = {}): Promise<RawPayload> {
    const path = this.fillPath(this.rules.searchUrl, { keyword, page: 1 });
    const document = await this.load(resolveUrl(path, this.baseUrl), options);
    const rules = this.rules.searchList ? this.searchRules() : this.vodRules();
    return { list: this.parseVodList(document, rules) };
  }

  async playerContent(
    _flag: string,
    id: string,
    _vipFlags: string[],
    options: SpiderCallOptions = {}
  ): Promise<RawPayload> {
    const header = { ...this.site.headers };

    if (/^https?:\/\//i.test(id) && isDirectMediaUrl(id)) {
      return { parse: 0, url: id, header };
    }

    const pageUrl = resolveUrl(id, this.baseUrl);
    const document = await this.load(pageUrl, options);
    const mediaUrl = extractFirst(document, this.rules.playUrl);

    if (!mediaUrl) {
      return { parse: 1, url: pageUrl, header };
    }
    const resolved = resolveUrl(mediaUrl, pageUrl);
    return { parse: isDirectMediaUrl(resolved) ? 0 : 1, url: resolved, header };
  }

  // ===========================================================================
  // Parsing
  // ===========================================================================

  private async load(url: string, options: SpiderCallOptions): Promise<RuleRoot> {
    const html = await this.http.text(url, { signal: options.signal });
    const { document } = parseHTML(html);
    return document;
  }

  private parseVodList(root: RuleRoot, rules: VodRules): Array<Record<string, string>> {
    return selectAll(root, rules.list)
      .map((element) => ({
        vod_id: extractFirst(element, rules.id),
        vod_name: extractFirst(element, rules.name),
        vod_pic: this.absolute(extractFirst(element, rules.pic)),
        vod_remarks: extractFirst(element, rules.remarks),
      }))
      .filter((vod) => vod.vod_id !== "" && vod.vod_name !== "");
  }

  private parseDetail(root: RuleRoot, id: string): Record<string, string> {
    const sources = extractAll(root, this.rules.playFrom);
    const containers = selectAll(root, this.rules.playList);

    const playUrls = containers.map((container) =>
      selectAll(container, this.rules.playItem)
        .map((item) => {
          const name = extractFirst(item, this.rules.playItemName);
          const episodeId = extractFirst(item, this.rules.playItemId);
          return episodeId ? `${name || episodeId}$${episodeId}` : "";
        })
        .filter((episode) => episode !== "")
        .join("#")
    );

    const playFrom = playUrls.map((_, index) => sources[index] ?? `source${index + 1}`);

    return {
      vod_id: id,
      vod_name: extractFirst(root, this.rules.detailName),
      vod_pic: this.absolute(extractFirst(root, this.rules.detailPic)),
      vod_content: extractFirst(root, this.rules.detailContent),
      vod_year: extractFirst(root, this.rules.detailYear),
      vod_area: extractFirst(root, this.rules.detailArea),
      vod_actor: extractFirst(root, this.rules.detailActor),
      vod_director: extractFirst(root, this.rules.detailDirector),
      vod_play_from: playFrom.join("$$$"),
      vod_play_url: playUrls.join("$$$"),
    };
  }

  private vodRules(): VodRules {
    return {
      list: this.rules.vodList,
      id: this.rules.vodId,
      name: this.rules.vodName,
      pic: this.rules.vodPic,
      remarks: this.rules.vodRemarks,
    };
  }

  private searchRules(): VodRules {
    return {
      list: this.rules.searchList,
      id: this.rules.searchId || this.rules.vodId,
      name: this.rules.searchName || this.rules.vodName,
      pic: this.rules.searchPic || this.rules.vodPic,
      remarks: this.rules.searchRemarks || this.rules.vodRemarks,
    };
  }

  /**
   * Fill a URL template and drop placeholders that received no value
   */
  private fillPath(template: string, values: Record<string, string | number>): string {
    return fillTemplate(template, values).replace(/\{\w+\}/g, "");
  }

  private absolute(url: string): string {
    return url ? resolveUrl(url, this.baseUrl) : url;
  }
}
