import { describe, expect, it } from "vitest";
import { EngineSelector, preferredBackend } from "../../src/engines/selector.js";
import type { Backend, BackendName } from "../../src/engines/types.js";
import type { Spider } from "../../src/spiders/types.js";
import { HookPipeline } from "../../src/hooks/pipeline.js";
import { HookResults } from "../../src/hooks/types.js";
import { SandboxScriptRuntime } from "../../src/runtime/sandbox-script-runtime.js";
import { ImportModuleLoader } from "../../src/runtime/import-module-loader.js";
import { BackendInitError, CancelledError, type VodError } from "../../src/errors.js";
import { createSilentLogger } from "../../src/utils/logger.js";
import type { Site } from "../../src/types.js";
import { FailingBackend, FakeTransport, StaticBackend, StaticSpider, listPayload, makeSite } from "../helpers/fakes.js";

function newSelector(backends: Partial<Record<BackendName, Backend>>, initCooldownMs = 60000, hooks = new HookPipeline()) {
  return new EngineSelector({
    transport: new FakeTransport(),
    hooks,
    runtime: new SandboxScriptRuntime(),
    loader: new ImportModuleLoader(),
    backends,
    initCooldownMs,
    logger: createSilentLogger(),
  });
}

function spiderBackend(name: BackendName, spiders: StaticSpider[] = []): StaticBackend {
  return new StaticBackend(name, (siteKey) => {
    const spider = new StaticSpider(siteKey, { home: listPayload(["1"]) });
    spiders.push(spider);
    return spider;
  });
}

/**
 * Fails its first initialization, then succeeds
 */
class RecoveringBackend implements Backend {
  initCount = 0;

  constructor(readonly name: BackendName) {}

  async createSpider({ site }: { site: Site }): Promise<Spider> {
    this.initCount++;
    if (this.initCount === 1) {
      throw new BackendInitError(this.name, "not yet", { siteKey: site.key });
    }
    return new StaticSpider(site.key, { home: listPayload(["fresh"]) });
  }
}

const home = { type: "home", filter: true } as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("preferredBackend", () => {
  it("follows the site kind and the shape of a rule site's api", () => {
    expect(preferredBackend(makeSite({ key: "a", kind: "script" }))).toBe("script");
    expect(preferredBackend(makeSite({ key: "a", kind: "module" }))).toBe("module");
    expect(preferredBackend(makeSite({ key: "a" }))).toBe("json-api");
    expect(preferredBackend(makeSite({ key: "a", api: "https://a.example.com/feed.json?x=1" }))).toBe("json-api");
    expect(preferredBackend(makeSite({ key: "a", api: "https://a.example.com/", ext: { type: "json" } }))).toBe(
      "json-api"
    );
    expect(preferredBackend(makeSite({ key: "a", api: "https://a.example.com/" }))).toBe("html-rule");
  });
});

describe("EngineSelector", () => {
  it("initializes a site once for concurrent first calls", async () => {
    const backend = spiderBackend("json-api");
    const selector = newSelector({ "json-api": backend });
    const site = makeSite({ key: "a" });

    const [first, second] = await Promise.all([selector.execute(site, home), selector.execute(site, home)]);

    expect(backend.initCount).toBe(1);
    expect(first.status).toBe("ok");
    expect(second.status).toBe("ok");
    expect(await selector.backendFor("a")).toBe("json-api");
    expect(selector.stats().backends["json-api"]).toMatchObject({ success: 2, failure: 0, demotions: 0 });
  });

  it("demotes a site to default-rule when its backend fails to initialize", async () => {
    const failing = new FailingBackend("json-api", "boom");
    const selector = newSelector({ "json-api": failing, "default-rule": spiderBackend("default-rule") });
    const site = makeSite({ key: "a" });

    const envelope = await selector.execute(site, home);

    expect(envelope.status).toBe("ok");
    expect(await selector.backendFor("a")).toBe("default-rule");
    expect(selector.degradedSites().a).toMatchObject({ backend: "json-api", reason: "[json-api] boom" });
    expect(selector.stats().backends["json-api"]).toMatchObject({ failure: 1, demotions: 1 });
    expect(selector.stats().backends["default-rule"]).toMatchObject({ success: 1 });

    await selector.execute(site, home);
    expect(failing.initCount).toBe(1);
  });

  it("tries the preferred backend again once the cool-down has passed", async () => {
    const recovering = new RecoveringBackend("json-api");
    const fallbacks: StaticSpider[] = [];
    const selector = newSelector({ "json-api": recovering, "default-rule": spiderBackend("default-rule", fallbacks) }, 30);
    const site = makeSite({ key: "a" });

    await selector.execute(site, home);
    expect(await selector.backendFor("a")).toBe("default-rule");

    await sleep(40);
    const envelope = await selector.execute(site, home);

    expect(recovering.initCount).toBe(2);
    expect(envelope.kind === "listing" && envelope.items.map((item) => item.id)).toEqual(["fresh"]);
    expect(await selector.backendFor("a")).toBe("json-api");
    expect(selector.degradedSites()).toEqual({});
    expect(fallbacks[0]?.destroyed).toBe(true);
  });

  it("keeps failing within the cool-down when the fallback fails too", async () => {
    const failing = new FailingBackend("json-api", "boom");
    const fallback = new FailingBackend("default-rule", "no origin");
    const selector = newSelector({ "json-api": failing, "default-rule": fallback });
    const site = makeSite({ key: "a" });

    const error: VodError = await selector.execute(site, home).then(
      () => {
        throw new Error("expected a failure");
      },
      (reason: VodError) => reason
    );

    expect(error).toBeInstanceOf(BackendInitError);
    expect(error.message).toBe("[default-rule] [json-api] boom; fallback failed: [default-rule] no origin");

    await expect(selector.execute(site, home)).rejects.toBeInstanceOf(BackendInitError);
    expect(failing.initCount).toBe(1);
    expect(fallback.initCount).toBe(1);
  });

  it("passes play envelopes through the player hooks", async () => {
    const hooks = new HookPipeline();
    hooks.register("player", {
      name: "force-https",
      description: "test hook",
      matches: () => true,
      execute: (context) =>
        HookResults.success({
          ...context.value,
          processedUrl: context.value.processedUrl.replace("http://", "https://"),
          headers: { ...context.value.headers, Referer: "https://a.example.com/" },
        }),
    });
    const backend = new StaticBackend(
      "json-api",
      (siteKey) => new StaticSpider(siteKey, { play: { url: "http://cdn.example.com/e1.mp4", parse: 0 } })
    );
    const selector = newSelector({ "json-api": backend }, 60000, hooks);

    const envelope = await selector.execute(makeSite({ key: "a" }), { type: "play", flag: "line1", id: "e1", vipFlags: [] });

    expect(envelope).toMatchObject({
      kind: "play",
      url: "https://cdn.example.com/e1.mp4",
      headers: { Referer: "https://a.example.com/" },
      needsParse: false,
    });
  });

  it("does not count a cancelled call as a backend failure", async () => {
    const backend = new StaticBackend(
      "json-api",
      (siteKey) => new StaticSpider(siteKey, { search: () => new Promise(() => undefined) })
    );
    const selector = newSelector({ "json-api": backend });
    const controller = new AbortController();

    const pending = selector.execute(makeSite({ key: "a" }), { type: "search", keyword: "moon", quick: false }, {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(selector.stats().backends["json-api"]).toMatchObject({ success: 0, failure: 0 });
  });

  it("destroys every spider on close", async () => {
    const spiders: StaticSpider[] = [];
    const selector = newSelector({ "json-api": spiderBackend("json-api", spiders) });

    await selector.execute(makeSite({ key: "a" }), home);
    await selector.execute(makeSite({ key: "b" }), home);
    await selector.close();

    expect(spiders.map((spider) => spider.destroyed)).toEqual([true, true]);
    expect(await selector.backendFor("a")).toBeUndefined();
  });
});
