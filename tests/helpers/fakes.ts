/**
 * In-process stand-ins shared by the unit tests
 */

import type { ListingEnvelope, OperationName, ParserOperation, Site } from "../../src/types.js";
import type { Transport, TransportRequest, TransportResponse } from "../../src/transport/types.js";
import type { RawPayload, Spider, SpiderCallOptions } from "../../src/spiders/types.js";
import type { Backend, BackendName } from "../../src/engines/types.js";
import { BackendInitError } from "../../src/errors.js";

export function makeSite(overrides: Partial<Site> & { key: string }): Site {
  return {
    name: overrides.key,
    kind: "rule",
    api: `https://${overrides.key}.example.com/api.php/provide/vod`,
    ...overrides,
  };
}

// =============================================================================
// Transport
// =============================================================================

export interface FakeRoute {
  status?: number;
  body: string;
  headers?: Record<string, string>;
}

/**
 * Serves canned bodies by URL; unknown URLs answer 404
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];

  constructor(private readonly routes: Record<string, FakeRoute | ((request: TransportRequest) => FakeRoute)> = {}) {}

  route(url: string, route: FakeRoute | ((request: TransportRequest) => FakeRoute)): void {
    this.routes[url] = route;
  }

  async fetch(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const entry = this.routes[request.url];
    const route = typeof entry === "function" ? entry(request) : entry ?? { status: 404, body: "" };
    return {
      url: request.url,
      statusCode: route.status ?? 200,
      headers: { "content-type": "text/html; charset=utf-8", ...route.headers },
      bytes: new TextEncoder().encode(route.body),
      engine: "custom",
      duration: 1,
    };
  }
}

// =============================================================================
// Spiders and backends
// =============================================================================

type Answer = RawPayload | ((options?: SpiderCallOptions) => Promise<RawPayload>);

/**
 * Spider answering every operation from a table; counts calls per operation
 */
export class StaticSpider implements Spider {
  readonly calls: ParserOperation["type"][] = [];
  destroyed = false;

  constructor(
    readonly siteKey: string,
    private readonly answers: Partial<Record<ParserOperation["type"], Answer>> = {}
  ) {}

  homeContent(_filter: boolean, options?: SpiderCallOptions): Promise<RawPayload> {
    return this.answer("home", options);
  }

  categoryContent(
    _typeId: string,
    _page: number,
    _filters: Record<string, string>,
    options?: SpiderCallOptions
  ): Promise<RawPayload> {
    return this.answer("category", options);
  }

  detailContent(_ids: string[], options?: SpiderCallOptions): Promise<RawPayload> {
    return this.answer("detail", options);
  }

  searchContent(_keyword: string, _quick: boolean, options?: SpiderCallOptions): Promise<RawPayload> {
    return this.answer("search", options);
  }

  playerContent(_flag: string, _id: string, _vipFlags: string[], options?: SpiderCallOptions): Promise<RawPayload> {
    return this.answer("play", options);
  }

  destroy(): void {
    this.destroyed = true;
  }

  private async answer(type: ParserOperation["type"], options?: SpiderCallOptions): Promise<RawPayload> {
    this.calls.push(type);
    const answer = this.answers[type];
    if (answer === undefined) {
      return {};
    }
    return typeof answer === "function" ? answer(options) : answer;
  }
}

/**
 * Backend handing out spiders from a factory; counts initializations
 */
export class StaticBackend implements Backend {
  initCount = 0;

  constructor(
    readonly name: BackendName,
    private readonly factory: (siteKey: string) => Spider
  ) {}

  async createSpider({ site }: { site: Site }): Promise<Spider> {
    this.initCount++;
    return this.factory(site.key);
  }
}

/**
 * Backend whose initialization always fails
 */
export class FailingBackend implements Backend {
  initCount = 0;

  constructor(
    readonly name: BackendName,
    private readonly message = "init failed"
  ) {}

  async createSpider({ site }: { site: Site }): Promise<Spider> {
    this.initCount++;
    throw new BackendInitError(this.name, this.message, { siteKey: site.key });
  }
}

// =============================================================================
// Payloads
// =============================================================================

export function listPayload(ids: string[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    list: ids.map((id) => ({ vod_id: id, vod_name: `Title ${id}`, vod_pic: "", vod_remarks: "" })),
    ...extra,
  };
}

/**
 * Ready-made listing envelope with one item per id
 */
export function listing(siteKey: string, ids: string[], operation: OperationName = "search"): ListingEnvelope {
  return {
    kind: "listing",
    siteKey,
    operation,
    items: ids.map((id) => ({ id, title: `Title ${id}`, poster: "", remark: "" })),
    categories: [],
    filters: {},
    page: 1,
    pageCount: 1,
    total: ids.length,
    limit: ids.length,
    status: ids.length > 0 ? "ok" : "empty",
  };
}
