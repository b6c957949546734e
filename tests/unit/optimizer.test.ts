import { afterEach, describe, expect, it, vi } from "vitest";
import { ReliabilityOptimizer, type OperationExecutor } from "../../src/optimizer/reliability-optimizer.js";
import { RetryState, backoffDelay, isRetryableError } from "../../src/optimizer/retry.js";
import { SiteHealth } from "../../src/optimizer/site-health.js";
import { ResultCache } from "../../src/cache/result-cache.js";
import type { DegradedSite } from "../../src/engines/types.js";
import type { ContentEnvelope, ParserOperation, Site } from "../../src/types.js";
import {
  CancelledError,
  MalformedResponseError,
  PermanentUpstreamError,
  TimeoutError,
  TransientNetworkError,
  VodErrorCode,
} from "../../src/errors.js";
import { createSilentLogger } from "../../src/utils/logger.js";
import { listing, makeSite } from "../helpers/fakes.js";

type Step = ContentEnvelope | Error | ((signal?: AbortSignal) => Promise<ContentEnvelope>);

/**
 * Selector stand-in that plays a script of outcomes, repeating the last one
 */
class ScriptedSelector implements OperationExecutor {
  calls = 0;
  active = 0;
  maxActive = 0;
  demotions: Record<string, DegradedSite> = {};

  constructor(private readonly steps: Step[]) {}

  async execute(_site: Site, _operation: ParserOperation, options: { signal?: AbortSignal } = {}): Promise<ContentEnvelope> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (step === undefined) throw new Error("no scripted step");
      if (step instanceof Error) throw step;
      if (typeof step === "function") return await step(options.signal);
      return step;
    } finally {
      this.active--;
    }
  }

  degradedSites(): Record<string, DegradedSite> {
    return this.demotions;
  }
}

function search(keyword: string): ParserOperation {
  return { type: "search", keyword, quick: false };
}

function newOptimizer(selector: OperationExecutor, overrides: Partial<ConstructorParameters<typeof ReliabilityOptimizer>[0]> = {}) {
  return new ReliabilityOptimizer({
    selector,
    cache: new ResultCache(),
    retry: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000 },
    logger: createSilentLogger(),
    ...overrides,
  });
}

function waitForAbort(signal?: AbortSignal): Promise<ContentEnvelope> {
  return new Promise((_, reject) => {
    signal?.addEventListener("abort", () => reject(new CancelledError()));
  });
}

describe("retry policy", () => {
  it("doubles the delay up to the cap", () => {
    expect(backoffDelay(0, 500, 8000)).toBe(500);
    expect(backoffDelay(1, 500, 8000)).toBe(1000);
    expect(backoffDelay(4, 500, 8000)).toBe(8000);
    expect(backoffDelay(6, 500, 8000)).toBe(8000);
  });

  it("retries transient failures until the budget is spent", () => {
    const state = new RetryState({ maxRetries: 2, baseDelayMs: 500, maxDelayMs: 8000 });

    expect(state.next(new TransientNetworkError("reset"))).toEqual({ retry: true, attempt: 2, delayMs: 500 });
    expect(state.next(new TimeoutError("slow", 100))).toEqual({ retry: true, attempt: 3, delayMs: 1000 });
    expect(state.next(new TransientNetworkError("reset"))).toEqual({ retry: false, reason: "exhausted" });
  });

  it("never retries permanent or malformed responses", () => {
    expect(isRetryableError(new PermanentUpstreamError(404))).toBe(false);
    expect(isRetryableError(new MalformedResponseError("bad json"))).toBe(false);
    const state = new RetryState({ maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000 });
    expect(state.next(new PermanentUpstreamError(403))).toEqual({ retry: false, reason: "not-retryable" });
  });
});

describe("SiteHealth", () => {
  it("degrades above the error threshold and recovers after consecutive successes", () => {
    const health = new SiteHealth("s1", { windowSize: 20, minSamples: 5, errorThreshold: 0.3, recoverySuccesses: 3 });

    for (const ok of [true, true, true, false]) {
      expect(health.record(ok)).toBeUndefined();
    }
    // 2 failures out of 5 = 40%
    expect(health.record(false)).toEqual({ siteKey: "s1", from: "healthy", to: "degraded", errorRate: 0.4 });

    expect(health.record(true)).toBeUndefined();
    expect(health.record(true)).toBeUndefined();
    expect(health.record(true)?.to).toBe("healthy");
    expect(health.snapshot().samples).toBe(0);
  });

  it("needs the minimum number of samples before degrading", () => {
    const health = new SiteHealth("s1", { windowSize: 20, minSamples: 5, errorThreshold: 0.3, recoverySuccesses: 3 });
    for (let i = 0; i < 4; i++) {
      expect(health.record(false)).toBeUndefined();
    }
    expect(health.state).toBe("healthy");
  });
});

describe("ReliabilityOptimizer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries transient failures with backoff, then succeeds", async () => {
    vi.useFakeTimers();
    const selector = new ScriptedSelector([
      new TransientNetworkError("reset"),
      new TransientNetworkError("reset"),
      listing("s1", ["1"]),
    ]);
    const optimizer = newOptimizer(selector);

    const pending = optimizer.execute(makeSite({ key: "s1" }), search("moon"));
    await vi.advanceTimersByTimeAsync(99);
    expect(selector.calls).toBe(1);
    await vi.advanceTimersByTimeAsync(1000);
    const { envelope, cached } = await pending;

    expect(envelope.status).toBe("ok");
    expect(cached).toBe(false);
    expect(selector.calls).toBe(3);
    expect(optimizer.stats().retries).toBe(2);
    expect(optimizer.stats().performance["s1:search"]).toMatchObject({ success: 1, failure: 2 });
  });

  it("returns permanent failures at once and does not cache them", async () => {
    const selector = new ScriptedSelector([new PermanentUpstreamError(404, "HTTP 404")]);
    const optimizer = newOptimizer(selector);
    const site = makeSite({ key: "s1" });

    const first = await optimizer.execute(site, search("moon"));
    const second = await optimizer.execute(site, search("moon"));

    expect(first.envelope.status).toBe("error");
    expect(first.envelope.error).toEqual({ code: VodErrorCode.PERMANENT_UPSTREAM, message: "HTTP 404", retryable: false });
    expect(second.cached).toBe(false);
    expect(selector.calls).toBe(2);
    expect(optimizer.stats().retries).toBe(0);
  });

  it("reports timeout once retries are exhausted", async () => {
    vi.useFakeTimers();
    const selector = new ScriptedSelector([new TimeoutError("Timed out after 50ms", 50)]);
    const optimizer = newOptimizer(selector, { retry: { maxRetries: 1, baseDelayMs: 10, maxDelayMs: 10 } });

    const pending = optimizer.execute(makeSite({ key: "s1" }), search("moon"));
    await vi.advanceTimersByTimeAsync(10);
    const { envelope } = await pending;

    expect(envelope.status).toBe("timeout");
    expect(selector.calls).toBe(2);
  });

  it("serves repeated calls from the cache", async () => {
    const selector = new ScriptedSelector([listing("s1", ["1"])]);
    const optimizer = newOptimizer(selector);
    const site = makeSite({ key: "s1" });

    await optimizer.execute(site, search("Moon"));
    const again = await optimizer.execute(site, search("moon "));

    expect(again.cached).toBe(true);
    expect(selector.calls).toBe(1);
  });

  it("holds calls to one site to its permit count", async () => {
    const selector = new ScriptedSelector([
      () => new Promise<ContentEnvelope>((resolve) => setTimeout(() => resolve(listing("s1", ["1"])), 10)),
    ]);
    const optimizer = newOptimizer(selector, { perSiteConcurrency: 1 });
    const site = makeSite({ key: "s1" });

    await Promise.all([optimizer.execute(site, search("a")), optimizer.execute(site, search("b")), optimizer.execute(site, search("c"))]);

    expect(selector.calls).toBe(3);
    expect(selector.maxActive).toBe(1);
  });

  it("throws cancellation without recording or caching it", async () => {
    const selector = new ScriptedSelector([(signal) => waitForAbort(signal)]);
    const optimizer = newOptimizer(selector);
    const controller = new AbortController();

    const pending = optimizer.execute(makeSite({ key: "s1" }), search("moon"), { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(optimizer.stats().performance).toEqual({});
  });

  it("shortens the timeout of a degraded site and restores it on recovery", async () => {
    let failing = true;
    const selector = new ScriptedSelector([
      async () => {
        if (failing) throw new PermanentUpstreamError(500, "HTTP 500");
        return listing("s1", ["1"]);
      },
    ]);
    const optimizer = newOptimizer(selector);
    const site = makeSite({ key: "s1", timeoutMs: 2000 });

    for (let i = 0; i < 5; i++) {
      await optimizer.execute(site, search(`fail-${i}`));
    }
    expect(optimizer.attemptTimeout(site)).toBe(1000);
    expect(optimizer.suggestions()).toEqual([
      { type: "error-rate", siteKey: "s1", message: "site s1 failing 100% of calls; check its api or disable it" },
      { type: "degraded-site", siteKey: "s1", message: "site s1 is degraded; its calls run with a shortened timeout" },
    ]);

    failing = false;
    for (let i = 0; i < 3; i++) {
      await optimizer.execute(site, search(`ok-${i}`));
    }
    expect(optimizer.attemptTimeout(site)).toBe(2000);
    expect(optimizer.stats().health.s1?.state).toBe("healthy");
  });

  it("suggests looking at slow sites and demoted sites", async () => {
    const selector = new ScriptedSelector([
      () => new Promise<ContentEnvelope>((resolve) => setTimeout(() => resolve(listing("s1", ["1"])), 30)),
    ]);
    selector.demotions = { s2: { backend: "script", reason: "[script] syntax error", at: 1 } };
    const optimizer = newOptimizer(selector, { slowCallMs: 5 });

    await optimizer.execute(makeSite({ key: "s1" }), search("moon"));
    const suggestions = optimizer.suggestions();

    expect(suggestions.map((suggestion) => suggestion.type)).toEqual(["slow-site", "demoted-site"]);
    expect(suggestions[1]?.message).toBe("site s2 fell back to default rules after script failed: [script] syntax error");
    expect(optimizer.stats().slowCount).toBe(1);
  });
});
