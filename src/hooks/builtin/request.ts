import type { HookContext, HookRequest, HookResult, RequestHook } from "../types.js";
import { HookResults } from "../types.js";
import type { ResolvedHookOptions } from "./options.js";
import { deleteHeader, getHeader, setHeader, setHeaderIfMissing } from "../../utils/headers.js";
import { findDomain, getHostname, getOrigin } from "../../utils/url-helpers.js";

/**
 * User-Agent strings that identify an HTTP library instead of a browser
 */
const LIBRARY_AGENTS = ["okhttp", "node", "undici", "axios", "got", "python-requests", "java/"];

/**
 * Sets Referer and Origin to the request's own origin for hotlink-protected hosts
 * and strips proxy headers that reveal the client
 */
export class AntiHotlinkHook implements RequestHook {
  readonly name = "AntiHotlink";
  readonly description = "Defeat hotlink protection on known video hosts";
  readonly priority = 5;

  constructor(private readonly options: ResolvedHookOptions) {}

  matches(context: HookContext<HookRequest>): boolean {
    return findDomain(getHostname(context.value.url), this.options.hotlinkHosts) !== undefined;
  }

  execute(context: HookContext<HookRequest>): HookResult<HookRequest> {
    const request = context.value;
    const origin = getOrigin(request.url);
    if (!origin) {
      return HookResults.skip("unparsable url");
    }
    setHeader(request.headers, "Referer", origin);
    setHeader(request.headers, "Origin", origin);
    deleteHeader(request.headers, "X-Forwarded-For");
    deleteHeader(request.headers, "X-Real-IP");
    return HookResults.success(request);
  }
}

export class UserAgentHook implements RequestHook {
  readonly name = "UserAgent";
  readonly description = "Add a browser User-Agent or a per-host one";
  readonly priority = 10;

  constructor(private readonly options: ResolvedHookOptions) {}

  matches(): boolean {
    return true;
  }

  execute(context: HookContext<HookRequest>): HookResult<HookRequest> {
    const request = context.value;
    const domain = findDomain(getHostname(request.url), Object.keys(this.options.hostHeaders));
    const hostAgent = domain ? getHeader(this.options.hostHeaders[domain] ?? {}, "User-Agent") : undefined;

    if (hostAgent) {
      setHeader(request.headers, "User-Agent", hostAgent);
      return HookResults.success(request);
    }

    const current = getHeader(request.headers, "User-Agent");
    if (current === undefined || isLibraryAgent(current)) {
      setHeader(request.headers, "User-Agent", this.options.userAgent);
      return HookResults.success(request);
    }
    return HookResults.skip("user agent already set");
  }
}

export class RefererHook implements RequestHook {
  readonly name = "Referer";
  readonly description = "Add a Referer header when missing";
  readonly priority = 20;

  constructor(private readonly options: ResolvedHookOptions) {}

  matches(context: HookContext<HookRequest>): boolean {
    return getHeader(context.value.headers, "Referer") === undefined;
  }

  execute(context: HookContext<HookRequest>): HookResult<HookRequest> {
    const request = context.value;
    const domain = findDomain(getHostname(request.url), Object.keys(this.options.hostHeaders));
    const referer =
      (domain ? getHeader(this.options.hostHeaders[domain] ?? {}, "Referer") : undefined) ?? getOrigin(request.url);
    if (!referer) {
      return HookResults.skip("no referer for url");
    }
    setHeader(request.headers, "Referer", referer);
    return HookResults.success(request);
  }
}

export class CacheControlHook implements RequestHook {
  readonly name = "CacheControl";
  readonly description = "Ask intermediaries for fresh content";
  readonly priority = 30;

  matches(): boolean {
    return true;
  }

  execute(context: HookContext<HookRequest>): HookResult<HookRequest> {
    const request = context.value;
    setHeaderIfMissing(request.headers, "Cache-Control", "no-cache");
    setHeaderIfMissing(request.headers, "Pragma", "no-cache");
    return HookResults.success(request);
  }
}

function isLibraryAgent(userAgent: string): boolean {
  const lower = userAgent.toLowerCase();
  return LIBRARY_AGENTS.some((agent) => lower.startsWith(agent) || lower.includes(`${agent}/`));
}
