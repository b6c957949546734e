import { afterEach, describe, expect, it } from "vitest";
import { VodEngine, type VodEngineConfig } from "../../src/vod-engine.js";
import { cacheKeyPrefix } from "../../src/cache/cache-key.js";
import { EngineClosedError, VodErrorCode } from "../../src/errors.js";
import { createSilentLogger } from "../../src/utils/logger.js";
import type { RawPayload, Spider, SpiderCallOptions } from "../../src/spiders/types.js";
import type { Backend, BackendName } from "../../src/engines/types.js";
import { FakeTransport, StaticBackend, StaticSpider, listPayload, makeSite } from "../helpers/fakes.js";

describe("VodEngine", () => {
  let engine: VodEngine | undefined;

  afterEach(async () => {
    await engine?.close();
    engine = undefined;
  });

  function start(spider: (siteKey: string) => StaticSpider, config: VodEngineConfig = {}): VodEngine {
    engine = new VodEngine({
      cache: { persistent: false },
      transport: new FakeTransport(),
      backends: { "json-api": new StaticBackend("json-api", spider) },
      logger: createSilentLogger(),
      ...config,
    });
    return engine;
  }

  it("serves a repeated category page from the cache without calling the site", async () => {
    const spiders: StaticSpider[] = [];
    const vod = start((siteKey) => {
      const spider = new StaticSpider(siteKey, { category: listPayload(["1", "2"], { page: 1, pagecount: 3 }) });
      spiders.push(spider);
      return spider;
    });
    const site = makeSite({ key: "demo" });

    const first = await vod.resolveCategory(site, "1", 1, { year: "2024" });
    const second = await vod.resolveCategory(site, "1", 1, { year: "2024" });

    expect(first.status).toBe("ok");
    expect(second).toEqual(first);
    expect(spiders[0]?.calls).toEqual(["category"]);
    expect(vod.stats().cache).toMatchObject({ memoryHits: 1, writes: 1 });
  });

  it("refetches after the cached entries are invalidated", async () => {
    const spiders: StaticSpider[] = [];
    const vod = start((siteKey) => {
      const spider = new StaticSpider(siteKey, { home: listPayload(["1"]) });
      spiders.push(spider);
      return spider;
    });
    const site = makeSite({ key: "demo" });

    await vod.resolveHome(site);
    expect(await vod.invalidate(cacheKeyPrefix("demo", "home"))).toBe(1);
    await vod.resolveHome(site);

    expect(spiders[0]?.calls).toEqual(["home", "home"]);
  });

  it("keeps detail calls apart when an id contains a comma", async () => {
    const spiders: StaticSpider[] = [];
    const vod = start((siteKey) => {
      const spider = new StaticSpider(siteKey, { detail: listPayload(["1"]) });
      spiders.push(spider);
      return spider;
    });
    const site = makeSite({ key: "demo" });

    await vod.resolveDetail(site, ["a,b"]);
    await vod.resolveDetail(site, ["a", "b"]);

    expect(spiders[0]?.calls).toEqual(["detail", "detail"]);
  });

  it("bounds backend initialization by the configured init timeout", async () => {
    const hanging = (name: BackendName): Backend => ({
      name,
      createSpider: () => new Promise<Spider>(() => undefined),
    });
    engine = new VodEngine({
      cache: { persistent: false },
      transport: new FakeTransport(),
      backends: { "json-api": hanging("json-api"), "default-rule": hanging("default-rule") },
      initTimeoutMs: 20,
      logger: createSilentLogger(),
    });

    const envelope = await engine.resolveHome(makeSite({ key: "demo" }));

    expect(envelope.status).toBe("error");
    expect(envelope.error).toMatchObject({
      code: VodErrorCode.BACKEND_INIT_FAILED,
      message: "[default-rule] Timed out after 20ms; fallback failed: Timed out after 20ms",
    });
  });

  it("returns a failure envelope instead of throwing", async () => {
    const vod = start((siteKey) => new StaticSpider(siteKey, { detail: "<html>not json</html>" }));

    const envelope = await vod.resolveDetail(makeSite({ key: "demo" }), ["7"]);

    expect(envelope).toMatchObject({ kind: "listing", operation: "detail", status: "error", items: [] });
    expect(envelope.error?.code).toBe(VodErrorCode.MALFORMED_RESPONSE);
  });

  it("streams search results and a completion summary", async () => {
    const vod = start((siteKey) =>
      new StaticSpider(siteKey, { search: siteKey === "a" ? listPayload(["1", "2"]) : listPayload([]) })
    );

    const { results, summary } = await vod.searchAll([makeSite({ key: "a" }), makeSite({ key: "b" })], "moon");

    expect(results.map((result) => [result.site.key, result.status])).toEqual(
      expect.arrayContaining([
        ["a", "ok"],
        ["b", "empty"],
      ])
    );
    expect(summary).toMatchObject({ targeted: 2, ok: 1, empty: 1, totalItems: 2 });
    expect(vod.stats().aggregator.searches).toBe(1);
  });

  it("cancels in-flight calls when closed and refuses new ones", async () => {
    const vod = start(
      (siteKey) =>
        new StaticSpider(siteKey, {
          home: (options?: SpiderCallOptions) =>
            new Promise<RawPayload>((_, reject) => {
              options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
            }),
        })
    );
    const site = makeSite({ key: "demo" });

    const pending = vod.resolveHome(site);
    await new Promise((resolve) => setTimeout(resolve, 10));
    await vod.close();

    expect((await pending).status).toBe("cancelled");
    expect(vod.isReady()).toBe(false);

    const after = await vod.resolveHome(site);
    expect(after.status).toBe("error");
    expect(after.error?.code).toBe(VodErrorCode.ENGINE_CLOSED);
    await expect(vod.searchAll([site], "moon")).rejects.toBeInstanceOf(EngineClosedError);
  });

  it("clamps the page and drops filters for sites that take none", async () => {
    const vod = start((siteKey) => new StaticSpider(siteKey, { category: listPayload(["1"]) }));
    const site = makeSite({ key: "demo", filterable: false });

    await vod.resolveCategory(site, "1", 0, { year: "2024" });
    const again = await vod.resolveCategory(site, "1", 1);

    expect(vod.stats().cache.memoryHits).toBe(1);
    expect(again.status).toBe("ok");
  });
});
