import { describe, expect, it } from "vitest";
import { HookPipeline } from "../../src/hooks/pipeline.js";
import {
  HookResults,
  type HookContext,
  type HookPlayerUrl,
  type HookRequest,
  type HookResponse,
  type PlayerHook,
} from "../../src/hooks/types.js";
import { registerBuiltInHooks } from "../../src/hooks/builtin/index.js";
import { DEFAULT_USER_AGENT, resolveHookOptions } from "../../src/hooks/builtin/options.js";
import { AntiHotlinkHook, CacheControlHook, RefererHook, UserAgentHook } from "../../src/hooks/builtin/request.js";
import { ContentTypeHook, EncodingHook, inferContentType } from "../../src/hooks/builtin/response.js";
import { stripTrackingParams } from "../../src/hooks/builtin/player.js";
import { CancelledError } from "../../src/errors.js";
import { createSilentLogger } from "../../src/utils/logger.js";

function playerUrl(url: string): HookPlayerUrl {
  return { originalUrl: url, processedUrl: url, headers: {}, needsParse: true, flag: "line1", metadata: {} };
}

function tagHook(name: string, priority?: number): PlayerHook {
  return {
    name,
    description: `appends ${name}`,
    priority,
    matches: () => true,
    execute: (context) => {
      const trail = Array.isArray(context.value.metadata.trail) ? context.value.metadata.trail : [];
      return HookResults.success({ ...context.value, metadata: { trail: [...trail, name] } });
    },
  };
}

function newPipeline(hookTimeoutMs = 1000): HookPipeline {
  return new HookPipeline({ hookTimeoutMs, logger: createSilentLogger() });
}

describe("HookPipeline", () => {
  it("runs hooks by priority, then registration order", async () => {
    const pipeline = newPipeline();
    pipeline.register("player", tagHook("late", 200));
    pipeline.register("player", tagHook("first-default"));
    pipeline.register("player", tagHook("early", 5));
    pipeline.register("player", tagHook("second-default"));

    const result = await pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"));

    expect(result.metadata.trail).toEqual(["early", "first-default", "second-default", "late"]);
  });

  it("replaces a hook registered again under the same name", async () => {
    const pipeline = newPipeline();
    pipeline.register("player", tagHook("same", 10));
    pipeline.register("player", tagHook("same", 300));

    expect(pipeline.counts().player).toBe(1);
    expect(pipeline.list("player")[0]?.priority).toBe(300);
    expect(pipeline.unregister("player", "same")).toBe(true);
    expect(pipeline.unregister("player", "same")).toBe(false);
  });

  it("continues with the previous value after a failure or a throw", async () => {
    const pipeline = newPipeline();
    pipeline.register("player", {
      name: "mutating-failure",
      description: "edits its copy then fails",
      priority: 1,
      matches: () => true,
      execute: (context) => {
        context.value.processedUrl = "https://evil.example.com/";
        return HookResults.failure("bad input");
      },
    });
    pipeline.register("player", {
      name: "thrower",
      description: "throws",
      priority: 2,
      matches: () => true,
      execute: () => {
        throw new Error("boom");
      },
    });
    pipeline.register("player", tagHook("after", 3));

    const result = await pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"), { siteKey: "demo" });

    expect(result.processedUrl).toBe("https://cdn.example.com/a.mp4");
    expect(result.metadata.trail).toEqual(["after"]);

    const stats = pipeline.stats();
    expect(stats["player:mutating-failure"]?.failure).toBe(1);
    expect(stats["player:thrower"]?.failure).toBe(1);
    expect(stats["player:after"]?.success).toBe(1);
  });

  it("records a hook that exceeds its timeout as a failure and moves on", async () => {
    const pipeline = newPipeline(20);
    pipeline.register("player", {
      name: "hangs",
      description: "never answers",
      priority: 1,
      matches: () => true,
      execute: () => new Promise(() => undefined),
    });
    pipeline.register("player", tagHook("after", 2));

    const result = await pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"));

    expect(result.metadata.trail).toEqual(["after"]);
    expect(pipeline.stats()["player:hangs"]?.failure).toBe(1);
  });

  it("returns a stop value without running later hooks", async () => {
    const pipeline = newPipeline();
    pipeline.register("player", {
      name: "stopper",
      description: "ends the chain",
      priority: 1,
      matches: () => true,
      execute: (context) => HookResults.stop({ ...context.value, processedUrl: "https://final.example.com/v.m3u8" }),
    });
    pipeline.register("player", tagHook("never", 2));

    const result = await pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"));

    expect(result.processedUrl).toBe("https://final.example.com/v.m3u8");
    expect(result.metadata).toEqual({});
    expect(pipeline.stats()["player:never"]).toBeUndefined();
  });

  it("skips disabled and non-matching hooks", async () => {
    const pipeline = newPipeline();
    pipeline.register("player", { ...tagHook("disabled", 1), enabled: false });
    pipeline.register("player", { ...tagHook("unmatched", 2), matches: () => false });
    pipeline.register("player", {
      name: "skipper",
      description: "skips",
      priority: 3,
      matches: () => true,
      execute: () => HookResults.skip("nothing to do"),
    });

    const result = await pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"));

    expect(result.metadata).toEqual({});
    expect(pipeline.stats()["player:skipper"]?.skip).toBe(1);
    expect(pipeline.stats()["player:skipper"]?.executions).toBe(1);
  });

  it("stops with CancelledError when the enclosing query is cancelled", async () => {
    const pipeline = newPipeline();
    const controller = new AbortController();
    pipeline.register("player", {
      name: "canceller",
      description: "cancels the query",
      priority: 1,
      matches: () => true,
      execute: (context) => {
        controller.abort();
        return HookResults.success(context.value);
      },
    });
    pipeline.register("player", tagHook("after", 2));

    await expect(
      pipeline.run("player", playerUrl("https://cdn.example.com/a.mp4"), { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("built-in player hooks", () => {
  function builtInPipeline(): HookPipeline {
    const pipeline = newPipeline();
    registerBuiltInHooks(pipeline);
    return pipeline;
  }

  it("prepares an HLS playlist for direct playback", async () => {
    const result = await builtInPipeline().run(
      "player",
      playerUrl("http://cdn.example.com/v/index.m3u8?t=123&id=5")
    );

    expect(result.processedUrl).toBe("https://cdn.example.com/v/index.m3u8?id=5");
    expect(result.needsParse).toBe(false);
    expect(result.headers).toEqual({
      Accept: "application/vnd.apple.mpegurl",
      Referer: "http://cdn.example.com",
      "User-Agent": DEFAULT_USER_AGENT,
      "Accept-Encoding": "identity",
    });
  });

  it("flags parser endpoints for a secondary parse", async () => {
    const input = { ...playerUrl("https://jx.example.org/?url=https://v.example.net/x/abc.html"), needsParse: false };

    const result = await builtInPipeline().run("player", input);

    expect(result.needsParse).toBe(true);
    expect(result.processedUrl).toBe("https://jx.example.org/?url=https://v.example.net/x/abc.html");
  });

  it("adds per-domain playback headers", async () => {
    const result = await builtInPipeline().run("player", playerUrl("https://www.bilibili.com/video/abc"));

    expect(result.headers.Referer).toBe("https://www.bilibili.com/");
    expect(result.headers.Origin).toBe("https://www.bilibili.com");
  });

  it("strips cache busters and utm parameters only", () => {
    expect(stripTrackingParams("https://a.example.com/v.mp4?id=1&_=99&utm_source=x&q=2")).toBe(
      "https://a.example.com/v.mp4?id=1&q=2"
    );
    expect(stripTrackingParams("not a url?t=1")).toBe("not a url?t=1");
  });
});

function context<T>(value: T): HookContext<T> {
  return { value, signal: new AbortController().signal, timestamp: Date.now() };
}

function hookRequest(url: string, headers: Record<string, string> = {}): HookRequest {
  return { url, method: "GET", headers, body: "", params: {}, metadata: {} };
}

function hookResponse(bytes: Uint8Array, headers: Record<string, string> = {}): HookResponse {
  return {
    url: "https://demo.example.com/",
    statusCode: 200,
    headers,
    body: new TextDecoder().decode(bytes),
    bytes,
    metadata: {},
  };
}

describe("built-in request hooks", () => {
  const options = resolveHookOptions();

  it("points Referer and Origin at hotlink-protected hosts and drops proxy headers", () => {
    const hook = new AntiHotlinkHook(options);
    const request = hookRequest("https://v.qq.com/x/1.html", { "x-forwarded-for": "10.0.0.1", "X-Real-IP": "10.0.0.1" });

    expect(hook.matches(context(hookRequest("https://cdn.example.com/a.mp4")))).toBe(false);
    expect(hook.matches(context(request))).toBe(true);

    const result = hook.execute(context(request));
    expect(result.type).toBe("success");
    expect(request.headers).toEqual({ Referer: "https://v.qq.com", Origin: "https://v.qq.com" });
  });

  it("replaces library user agents but keeps browser ones", () => {
    const hook = new UserAgentHook(options);

    const library = hookRequest("https://demo.example.com/", { "user-agent": "okhttp/3.12.0" });
    expect(hook.execute(context(library)).type).toBe("success");
    expect(library.headers).toEqual({ "User-Agent": DEFAULT_USER_AGENT });

    const missing = hookRequest("https://demo.example.com/");
    hook.execute(context(missing));
    expect(missing.headers).toEqual({ "User-Agent": DEFAULT_USER_AGENT });

    const browser = hookRequest("https://demo.example.com/", { "User-Agent": "Mozilla/5.0 (test)" });
    expect(hook.execute(context(browser))).toEqual({ type: "skip", reason: "user agent already set" });
    expect(browser.headers).toEqual({ "User-Agent": "Mozilla/5.0 (test)" });
  });

  it("uses a per-host user agent when one is configured", () => {
    const hook = new UserAgentHook(
      resolveHookOptions({ hostHeaders: { "example.org": { "User-Agent": "host-agent" } } })
    );
    const request = hookRequest("https://m.example.org/list", { "User-Agent": "Mozilla/5.0 (test)" });

    hook.execute(context(request));

    expect(request.headers).toEqual({ "User-Agent": "host-agent" });
  });

  it("adds a missing Referer from the host table or the request origin", () => {
    const hook = new RefererHook(options);

    expect(hook.matches(context(hookRequest("https://demo.example.com/", { referer: "https://a.example.com/" })))).toBe(
      false
    );

    const known = hookRequest("https://v.qq.com/x/1.html");
    hook.execute(context(known));
    expect(known.headers).toEqual({ Referer: "https://v.qq.com/" });

    const other = hookRequest("https://demo.example.com/api?ac=list");
    hook.execute(context(other));
    expect(other.headers).toEqual({ Referer: "https://demo.example.com" });
  });

  it("asks for fresh content without overriding an explicit Cache-Control", () => {
    const hook = new CacheControlHook();
    const request = hookRequest("https://demo.example.com/", { "cache-control": "max-age=60" });

    hook.execute(context(request));

    expect(request.headers).toEqual({ "cache-control": "max-age=60", Pragma: "no-cache" });
  });
});

describe("built-in response hooks", () => {
  const encoder = new TextEncoder();
  // "中文" in GBK
  const gbkText = new Uint8Array([0xd6, 0xd0, 0xce, 0xc4]);

  it("infers a content type from the body", () => {
    expect(inferContentType("#EXTM3U\n#EXT-X-VERSION:3")).toBe("application/vnd.apple.mpegurl");
    expect(inferContentType('  {"list":[]}')).toBe("application/json");
    expect(inferContentType("<html></html>")).toBe("text/html");
    expect(inferContentType("plain words")).toBe("text/plain");
  });

  it("sets Content-Type only when the server sent none", () => {
    const hook = new ContentTypeHook();
    const response = hookResponse(encoder.encode('{"class":[]}'));

    expect(hook.matches(context(hookResponse(encoder.encode("{}"), { "content-type": "text/plain" })))).toBe(false);
    expect(hook.matches(context(response))).toBe(true);

    hook.execute(context(response));
    expect(response.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("re-decodes a body in the charset named by the header", () => {
    const response = hookResponse(gbkText, { "Content-Type": "text/html; charset=GBK" });

    expect(new EncodingHook().execute(context(response)).type).toBe("success");

    expect(response.body).toBe("中文");
    expect(response.headers).toEqual({ "Content-Type": "text/html; charset=GBK" });
  });

  it("reads the charset from a meta tag and declares it in the header", () => {
    const meta = encoder.encode('<meta charset="gbk">');
    const bytes = new Uint8Array(meta.byteLength + gbkText.byteLength);
    bytes.set(meta);
    bytes.set(gbkText, meta.byteLength);
    const response = hookResponse(bytes, { "Content-Type": "text/html" });

    new EncodingHook().execute(context(response));

    expect(response.body).toBe('<meta charset="gbk">中文');
    expect(response.headers).toEqual({ "Content-Type": "text/html; charset=gbk" });
  });

  it("declares utf-8 for bodies without a charset and leaves binary types alone", () => {
    const hook = new EncodingHook();
    const response = hookResponse(encoder.encode('{"name":"月光"}'), { "Content-Type": "application/json" });

    hook.execute(context(response));

    expect(response.body).toBe('{"name":"月光"}');
    expect(response.headers).toEqual({ "Content-Type": "application/json; charset=utf-8" });
    expect(hook.matches(context(hookResponse(gbkText, { "Content-Type": "video/mp4" })))).toBe(false);
  });

  it("fails on a charset it cannot decode", () => {
    const response = hookResponse(gbkText, { "Content-Type": "text/html; charset=x-unknown-set" });

    const result = new EncodingHook().execute(context(response));

    expect(result.type).toBe("failure");
    expect(response.body).toBe(new TextDecoder().decode(gbkText));
  });
});
