#!/usr/bin/env node
/**
 * Category Browsing Example
 *
 * Opens the first category of a site, pages through it and resolves the first
 * episode of the first item
 *
 * Usage: tsx examples/basic/browse-category.ts sites.json site-key
 */

import { readFile } from "node:fs/promises";
import { VodEngine, normalizeSites } from "../../src/index.js";

async function main() {
  const [configPath = "sites.json", siteKey] = process.argv.slice(2);
  const { sites } = normalizeSites(JSON.parse(await readFile(configPath, "utf8")));
  const site = sites.find((candidate) => candidate.key === siteKey) ?? sites[0];
  if (!site) {
    throw new Error(`No usable site in ${configPath}`);
  }

  const engine = new VodEngine({ cache: { persistent: false } });

  try {
    const home = await engine.resolveHome(site);
    const category = home.categories[0];
    if (!category) {
      console.log(`${site.name} has no categories (${home.status})`);
      return;
    }

    console.log(`Browsing ${site.name} / ${category.name}`);
    await engine.pager.open(site, category.id);
    for (let round = 0; round < 2 && engine.pager.hasMore(site.key); round++) {
      await engine.pager.loadMore(site.key);
    }

    const items = engine.pager.items(site.key);
    console.log(`  Loaded ${items.length} items over ${engine.pager.state(site.key)?.page ?? 0} pages`);

    const first = items[0];
    if (!first) return;

    const detail = await engine.resolveDetail(site, [first.id]);
    const source = detail.items[0]?.playSources?.[0];
    const episode = source?.episodes[0];
    if (!source || !episode) {
      console.log(`  ${first.title}: no play sources`);
      return;
    }

    const play = await engine.resolvePlay(site, source.name, episode.id);
    console.log(`  ${first.title} / ${episode.name}: ${play.url} (needsParse=${play.needsParse})`);
  } finally {
    await engine.close();
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
