import { describe, expect, it } from "vitest";
import { ScriptSpider, ModuleSpider } from "../../src/spiders/invoker-spider.js";
import { SpiderHttp } from "../../src/spiders/spider-http.js";
import { SandboxScriptRuntime } from "../../src/runtime/sandbox-script-runtime.js";
import { ImportModuleLoader } from "../../src/runtime/import-module-loader.js";
import { HookPipeline } from "../../src/hooks/pipeline.js";
import { BackendInitError, CancelledError, MalformedResponseError } from "../../src/errors.js";
import type { Site } from "../../src/types.js";
import { FakeTransport, makeSite } from "../helpers/fakes.js";

const SCRIPT_URL = "https://demo.example.com/spider.js";

const SPIDER_SCRIPT = `
module.exports = {
  ext: "",
  init(ext) {
    this.ext = ext;
  },
  async homeContent(filter) {
    const res = await host.request("https://demo.example.com/home.json");
    console.log("home", res.status);
    return res.body;
  },
  categoryContent(tid, pg, filter, extend) {
    return { tid, pg, filter, extend, ext: this.ext };
  },
  detailContent(ids) {
    return new Promise(() => {});
  },
};
`;

function httpFor(site: Site, transport: FakeTransport): SpiderHttp {
  return new SpiderHttp({ site, transport, hooks: new HookPipeline() });
}

async function scriptSpider(source: string, transport = new FakeTransport()) {
  const site = makeSite({ key: "demo", kind: "script", api: SCRIPT_URL, ext: { k: 1 } });
  transport.route(SCRIPT_URL, { body: source });
  return ScriptSpider.create({ site, runtime: new SandboxScriptRuntime(), http: httpFor(site, transport) });
}

describe("ScriptSpider", () => {
  it("runs the script's functions with the host and init ext", async () => {
    const transport = new FakeTransport({ "https://demo.example.com/home.json": { body: '{"class":[]}' } });
    const spider = await scriptSpider(SPIDER_SCRIPT, transport);

    expect(await spider.homeContent(true)).toBe('{"class":[]}');

    const category = await spider.categoryContent("1", 2, { year: "2024" });
    expect(typeof category === "string" && JSON.parse(category)).toEqual({
      tid: "1",
      pg: "2",
      filter: true,
      extend: { year: "2024" },
      ext: '{"k":1}',
    });
    expect(transport.requests.map((request) => request.url)).toEqual([SCRIPT_URL, "https://demo.example.com/home.json"]);
  });

  it("reports functions the script does not define as malformed", async () => {
    const spider = await scriptSpider(SPIDER_SCRIPT);

    await expect(spider.playerContent("line1", "e1", [])).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("stops waiting on a script call when the caller cancels", async () => {
    const spider = await scriptSpider(SPIDER_SCRIPT);
    const controller = new AbortController();

    const pending = spider.detailContent(["1"], { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("fails initialization for broken scripts", async () => {
    await expect(scriptSpider("module.exports = {")).rejects.toBeInstanceOf(BackendInitError);
    await expect(scriptSpider("module.exports = { searchContent() {} };")).rejects.toThrow(
      "[script] demo does not export homeContent()"
    );
    await expect(
      scriptSpider("module.exports = { homeContent() {}, init() { throw new Error('no token'); } };")
    ).rejects.toThrow("[script] init() failed: no token");
  });

  it("fails initialization when the script cannot be fetched", async () => {
    const site = makeSite({ key: "demo", kind: "script", api: SCRIPT_URL });
    const create = ScriptSpider.create({
      site,
      runtime: new SandboxScriptRuntime(),
      http: httpFor(site, new FakeTransport()),
    });

    await expect(create).rejects.toThrow(`[script] Cannot load script ${SCRIPT_URL}: HTTP 404 from ${SCRIPT_URL}`);
  });
});

describe("ModuleSpider", () => {
  it("instantiates a registered spider class and passes ext to init", async () => {
    let destroyed = false;
    class DemoSpider {
      ext = "";
      init(ext: string): void {
        this.ext = ext;
      }
      homeContent(): Record<string, unknown> {
        return { class: [], ext: this.ext };
      }
      searchContent(): number {
        return 5;
      }
      destroy(): void {
        destroyed = true;
      }
    }
    const loader = new ImportModuleLoader({ registry: { csp_Demo: DemoSpider } });
    const site = makeSite({ key: "demo", kind: "module", api: "csp_Demo", ext: { a: 1 } });

    const spider = await ModuleSpider.create({ site, loader, http: httpFor(site, new FakeTransport()) });

    expect(await spider.homeContent(false)).toEqual({ class: [], ext: '{"a":1}' });
    await expect(spider.searchContent("moon", false)).rejects.toThrow("searchContent() returned number");
    await spider.destroy();
    expect(destroyed).toBe(true);
  });

  it("refuses remote modules and reports missing ones", async () => {
    const loader = new ImportModuleLoader();
    const remote = makeSite({ key: "remote", kind: "module", api: "https://cdn.example.com/spider.mjs" });
    const missing = makeSite({ key: "missing", kind: "module", api: "./no-such-spider.mjs" });

    await expect(
      ModuleSpider.create({ site: remote, loader, http: httpFor(remote, new FakeTransport()) })
    ).rejects.toThrow("[module] Remote module https://cdn.example.com/spider.mjs is not loaded; install it locally");
    await expect(
      ModuleSpider.create({ site: missing, loader, http: httpFor(missing, new FakeTransport()) })
    ).rejects.toBeInstanceOf(BackendInitError);
  });
});
