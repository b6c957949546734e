#!/usr/bin/env node
/**
 * Search Example
 *
 * Streams search results from every site in a TVBox-style config
 *
 * Usage: tsx examples/basic/search-sites.ts sites.json "keyword"
 */

import { readFile } from "node:fs/promises";
import { VodEngine, normalizeSites } from "../../src/index.js";

async function main() {
  const [configPath = "sites.json", keyword = "moon"] = process.argv.slice(2);
  const { sites, errors } = normalizeSites(JSON.parse(await readFile(configPath, "utf8")));

  for (const error of errors) {
    console.warn(`Skipping site: ${error.message}`);
  }
  console.log(`Searching ${sites.length} sites for "${keyword}"\n`);

  const engine = new VodEngine({ aggregator: { deadlineMs: 20000 } });

  try {
    for await (const event of engine.search(sites, keyword)) {
      if (event.type === "result") {
        console.log(`  ${event.site.name}: ${event.status} (${event.envelope.items.length} items, ${event.durationMs}ms)`);
        for (const item of event.envelope.items.slice(0, 3)) {
          console.log(`     - ${item.title} ${item.remark}`);
        }
        continue;
      }

      const { summary } = event;
      console.log("\nSummary:");
      console.log(`  Sites: ${summary.targeted} queried, ${summary.skipped} skipped`);
      console.log(`  Outcomes: ${summary.ok} ok, ${summary.empty} empty, ${summary.error} error, ${summary.timeout} timeout`);
      console.log(`  Items: ${summary.totalItems} in ${summary.durationMs}ms`);
    }

    for (const suggestion of engine.suggestions()) {
      console.log(`  hint: ${suggestion.message}`);
    }
  } catch (error: unknown) {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    await engine.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
