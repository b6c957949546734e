#!/usr/bin/env node
/**
 * vodhub CLI
 *
 * Runs engine operations against a site list and prints JSON.
 *
 * @example
 * # Home listing of one site
 * npx vodhub -s sites.json home demo
 *
 * # Second page of a category with a filter
 * npx vodhub -s sites.json category demo 1 -p 2 -f year=2024
 *
 * # Search every searchable site
 * npx vodhub -s sites.json search "moon" --quick
 *
 * # Resolve an episode
 * npx vodhub -s sites.json play demo "Line A" "https://cdn.example/ep1.m3u8"
 *
 * # Probe every site and print stats and suggestions
 * npx vodhub -s sites.json stats
 */

import { Command } from "commander";
import { readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { VodEngine } from "../vod-engine.js";
import { normalizeSites } from "../config/sites.js";
import { ConfigError } from "../errors.js";
import type { Site } from "../types.js";
import { createLogger, type Logger } from "../utils/logger.js";

// Get version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../../package.json"), "utf-8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0";

interface GlobalOptions {
  sites: string;
  output?: string;
  cache: boolean;
  verbose?: boolean;
}

interface CategoryOptions {
  page: string;
  filter: string[];
}

interface SearchCommandOptions {
  quick?: boolean;
  site?: string;
  deadline?: string;
}

interface PlayOptions {
  vip?: string;
}

const program = new Command();

program
  .name("vodhub")
  .description("Query heterogeneous video-on-demand sites through one engine")
  .version(version)
  .requiredOption("-s, --sites <file>", "Site list (JSON array or object with a sites array)")
  .option("-o, --output <file>", "Output file (stdout if omitted)")
  .option("--no-cache", "Disable the persistent result cache")
  .option("-v, --verbose", "Enable verbose logging");

// =============================================================================
// Helpers
// =============================================================================

interface Session {
  engine: VodEngine;
  sites: Site[];
  logger: Logger;
  options: GlobalOptions;
}

function openSession(): Session {
  const options = program.opts<GlobalOptions>();
  const logger = createLogger("vodhub", options.verbose ? "debug" : process.env.LOG_LEVEL || "warn", 2);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(options.sites, "utf-8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read site list ${options.sites}: ${message}`, { field: "sites" });
  }

  const { sites, errors } = normalizeSites(raw);
  for (const error of errors) {
    logger.warn(`[cli] Skipping site ${error.siteKey ?? "(no key)"}: ${error.message}`);
  }

  const engine = new VodEngine({ logger, cache: { persistent: options.cache } });
  return { engine, sites, logger, options };
}

function findSite(session: Session, key: string): Site {
  const site = session.sites.find((candidate) => candidate.key === key);
  if (!site) {
    throw new ConfigError(`Unknown site ${key}`, { siteKey: key, field: "key" });
  }
  return site;
}

function parseFilters(entries: string[]): Record<string, string> {
  const filters: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      throw new ConfigError(`Filter "${entry}" must look like key=value`, { field: "filter" });
    }
    filters[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return filters;
}

function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`, { field: name });
  }
  return parsed;
}

function write(session: Session, result: unknown): void {
  const output = JSON.stringify(result, null, 2);
  if (session.options.output) {
    writeFileSync(session.options.output, output);
    session.logger.info(`[cli] Output written to ${session.options.output}`);
  } else {
    console.log(output);
  }
}

/**
 * Run a command body with a session; Ctrl-C cancels in-flight calls
 */
async function run(body: (session: Session, signal: AbortSignal) => Promise<boolean>): Promise<void> {
  let session: Session | undefined;
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    session = openSession();
    const ok = await body(session, controller.signal);
    process.exitCode = ok ? 0 : 1;
  } catch (error: unknown) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await session?.engine.close();
  }
}

// =============================================================================
// Content Commands
// =============================================================================

program
  .command("home <site>")
  .description("Categories, filters and recommended items of a site")
  .action(async (siteKey: string) => {
    await run(async (session, signal) => {
      const envelope = await session.engine.resolveHome(findSite(session, siteKey), { signal });
      write(session, envelope);
      return envelope.status === "ok" || envelope.status === "empty";
    });
  });

program
  .command("category <site> <typeId>")
  .description("One page of a category")
  .option("-p, --page <n>", "Page number", "1")
  .option("-f, --filter <key=value>", "Category filter (repeatable)", collectValues, [])
  .action(async (siteKey: string, typeId: string, options: CategoryOptions) => {
    await run(async (session, signal) => {
      const envelope = await session.engine.resolveCategory(
        findSite(session, siteKey),
        typeId,
        positiveInt(options.page, "page"),
        parseFilters(options.filter),
        { signal }
      );
      write(session, envelope);
      return envelope.status === "ok" || envelope.status === "empty";
    });
  });

program
  .command("detail <site> <ids...>")
  .description("Detail records with play sources")
  .action(async (siteKey: string, ids: string[]) => {
    await run(async (session, signal) => {
      const envelope = await session.engine.resolveDetail(findSite(session, siteKey), ids, { signal });
      write(session, envelope);
      return envelope.status === "ok" || envelope.status === "empty";
    });
  });

program
  .command("search <keyword>")
  .description("Search every searchable site concurrently")
  .option("-q, --quick", "Quick search (shorter timeouts, fewer items per site)")
  .option("--site <keys>", "Only these sites (comma-separated keys)")
  .option("--deadline <ms>", "Deadline of the whole search in milliseconds")
  .action(async (keyword: string, options: SearchCommandOptions) => {
    await run(async (session, signal) => {
      const keys = options.site?.split(",").map((key) => key.trim());
      const sites = keys ? keys.map((key) => findSite(session, key)) : session.sites;

      const { results, summary } = await session.engine.searchAll(sites, keyword, options.quick ?? false, {
        signal,
        deadlineMs: options.deadline ? positiveInt(options.deadline, "deadline") : undefined,
      });
      write(session, {
        summary,
        results: results.map(({ site, envelope, durationMs, cached }) => ({ site: site.key, durationMs, cached, envelope })),
      });
      return summary.ok + summary.empty > 0 || summary.targeted === 0;
    });
  });

program
  .command("play <site> <flag> <id>")
  .description("Resolve an episode into a playable URL")
  .option("--vip <flags>", "Flags handled by an external parser (comma-separated)")
  .action(async (siteKey: string, flag: string, id: string, options: PlayOptions) => {
    await run(async (session, signal) => {
      const vipFlags = options.vip ? options.vip.split(",").map((value) => value.trim()) : [];
      const descriptor = await session.engine.resolvePlay(findSite(session, siteKey), flag, id, vipFlags, { signal });
      write(session, descriptor);
      return descriptor.status === "ok";
    });
  });

// =============================================================================
// Stats Command
// =============================================================================

program
  .command("stats")
  .description("Load the home listing of every site, then print stats and suggestions")
  .action(async () => {
    await run(async (session, signal) => {
      const probes = await Promise.all(
        session.sites.map(async (site) => {
          const envelope = await session.engine.resolveHome(site, { signal });
          return { site: site.key, status: envelope.status, error: envelope.error };
        })
      );
      write(session, {
        probes,
        stats: session.engine.stats(),
        suggestions: session.engine.suggestions(),
      });
      return true;
    });
  });

// =============================================================================
// Parse and execute
// =============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
