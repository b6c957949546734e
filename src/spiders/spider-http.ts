/**
 * HTTP access for spiders
 *
 * Every outbound request of a spider goes through here:
 * site headers → request hooks → transport → response hooks → status check.
 */

import type { Site } from "../types.js";
import type { Transport, HttpMethod } from "../transport/types.js";
import type { HookPipeline } from "../hooks/pipeline.js";
import type { HookRequest, HookResponse } from "../hooks/types.js";
import { errorForStatus } from "../errors.js";
import { mergeHeaders } from "../utils/headers.js";
import { addQueryParams } from "../utils/url-helpers.js";
import { throwIfAborted } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

export interface SpiderRequestInit {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  params?: Record<string, string>;
  signal?: AbortSignal;
}

export interface SpiderHttpOptions {
  site: Site;
  transport: Transport;
  hooks: HookPipeline;
  logger?: Logger;
}

export class SpiderHttp {
  private readonly site: Site;
  private readonly transport: Transport;
  private readonly hooks: HookPipeline;
  private readonly logger?: Logger;
  private readonly decoder = new TextDecoder("utf-8");

  constructor(options: SpiderHttpOptions) {
    this.site = options.site;
    this.transport = options.transport;
    this.hooks = options.hooks;
    this.logger = options.logger;
  }

  /**
   * Perform a request and return the hook-processed response
   *
   * @throws TransientNetworkError / PermanentUpstreamError for error statuses
   */
  async request(url: string, init: SpiderRequestInit = {}): Promise<HookResponse> {
    const { signal } = init;
    const siteKey = this.site.key;
    throwIfAborted(signal, siteKey);

    const hookRequest = await this.hooks.run(
      "request",
      {
        url,
        method: init.method ?? "GET",
        headers: mergeHeaders(this.site.headers, init.headers),
        body: init.body ?? "",
        params: init.params ?? {},
        metadata: { siteKey },
      } satisfies HookRequest,
      { siteKey, signal }
    );

    const finalUrl = addQueryParams(hookRequest.url, hookRequest.params);
    this.logger?.debug(`[spider:${siteKey}] ${hookRequest.method} ${finalUrl}`);

    const response = await this.transport.fetch(
      {
        url: finalUrl,
        method: hookRequest.method,
        headers: hookRequest.headers,
        body: hookRequest.body || undefined,
      },
      signal
    );

    const hookResponse = await this.hooks.run(
      "response",
      {
        url: response.url,
        statusCode: response.statusCode,
        headers: response.headers,
        body: this.decoder.decode(response.bytes),
        bytes: response.bytes,
        metadata: { siteKey, engine: response.engine },
      } satisfies HookResponse,
      { siteKey, signal }
    );

    if (hookResponse.statusCode >= 400) {
      throw errorForStatus(hookResponse.statusCode, finalUrl, siteKey);
    }
    return hookResponse;
  }

  /**
   * Fetch a URL and return its decoded body
   */
  async text(url: string, init: SpiderRequestInit = {}): Promise<string> {
    const response = await this.request(url, init);
    return response.body;
  }
}
