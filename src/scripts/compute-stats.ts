/**
 * Compute distance per country and per city from local files
 *
 * Usage:
 *   npx tsx src/scripts/compute-stats.ts routes.json
 *   npx tsx src/scripts/compute-stats.ts ./activities            (every .gpx in the directory)
 *   npx tsx src/scripts/compute-stats.ts a.gpx b.gpx --segment --max-gap=30
 *
 * Options:
 *   --segment           Split traces at GPS gaps before aggregating (default for GPX)
 *   --no-segment        Never split
 *   --max-gap=<m>       Gap in meters that starts a new segment (default 20)
 *   --attribution=<m>   "equal" (default) or "spacing"
 *   --top=<n>           Countries/cities listed in the summary (default 3)
 *
 * routes.json is either an array of routes or { "routes": [...] }, in the
 * same shape the POST /api/v1/stats endpoint takes.
 *
 * The geo cache follows CACHE_DRIVER (default: .cache/geo-cache.json), so a
 * second run over the same files does no geocoding.
 */

import "dotenv/config";

import fs from "node:fs/promises";
import path from "node:path";

import { CACHE } from "../config/constants.js";
import { closePool } from "../lib/db.js";
import { parseGpx, traceToRoute } from "../services/gpx.service.js";
import { parseRouteList, type Route } from "../services/route.service.js";
import { formatProgress, formatSummary } from "../services/stats-summary.service.js";
import { computeStats, prepareRoutes } from "../services/stats.service.js";
import { CliOptionError, parseStatsCliArgs, type StatsCliOptions } from "./stats-cli-options.js";

/**
 * Expand inputs into file paths (directories contribute their .gpx files)
 */
async function collectFiles(inputs: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    const stat = await fs.stat(input);
    if (stat.isDirectory()) {
      const entries = await fs.readdir(input);
      files.push(
        ...entries
          .filter((entry) => entry.toLowerCase().endsWith(".gpx"))
          .sort()
          .map((entry) => path.join(input, entry))
      );
    } else {
      files.push(input);
    }
  }

  return files;
}

async function loadRoutes(files: string[]): Promise<{ routes: Route[]; fromGpx: boolean }> {
  const routes: Route[] = [];
  let fromGpx = false;

  for (const file of files) {
    const content = await fs.readFile(file, "utf-8");

    if (file.toLowerCase().endsWith(".gpx")) {
      fromGpx = true;
      try {
        routes.push(traceToRoute(parseGpx(content), path.basename(file)));
      } catch (error) {
        console.warn(
          `⚠️  Skipping ${file}: ${error instanceof Error ? error.message : error}`
        );
      }
      continue;
    }

    const parsed: unknown = JSON.parse(content);
    const list =
      typeof parsed === "object" && parsed !== null && "routes" in parsed
        ? parsed.routes
        : parsed;
    routes.push(...parseRouteList(list));
  }

  return { routes, fromGpx };
}

async function main(): Promise<void> {
  let options: StatsCliOptions;
  try {
    options = parseStatsCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CliOptionError)) throw error;
    console.error(`❌ ${error.message}`);
    process.exitCode = 1;
    return;
  }

  if (options.inputs.length === 0) {
    console.log("Usage: npx tsx src/scripts/compute-stats.ts <routes.json | dir | file.gpx ...>");
    process.exitCode = 1;
    return;
  }

  try {
    const files = await collectFiles(options.inputs);
    const { routes, fromGpx } = await loadRoutes(files);

    console.log(`\n📂 Loaded ${routes.length} route(s) from ${files.length} file(s)`);

    const prepared = prepareRoutes(routes, {
      segment: options.segment ?? fromGpx,
      maxGapMeters: options.maxGapMeters,
    });
    if (prepared.length !== routes.length) {
      console.log(`✂️  Split into ${prepared.length} segment(s)`);
    }

    const snapshot = await computeStats(
      prepared,
      { attribution: options.attribution },
      (s) => {
        if (!s.done) console.log(`   ${formatProgress(s)}`);
      }
    );

    const d = snapshot.diagnostics;
    console.log(
      `\n✅ ${formatProgress(snapshot)} (${snapshot.uniqueCoords} cells, ${snapshot.geocodedCount} geocoded)`
    );
    if (d.discardedTooFewPoints + d.discardedInvalidDistance + d.skippedInvalidCoordinates > 0) {
      console.log(
        `⚠️  Discarded ${d.discardedTooFewPoints} short, ${d.discardedInvalidDistance} invalid-distance and ${d.skippedInvalidCoordinates} invalid-coordinate route(s)`
      );
    }

    console.log(`\n${formatSummary(snapshot, options.top)}\n`);
  } catch (error) {
    console.error("❌ Error computing stats:", error);
    process.exitCode = 1;
  } finally {
    if (CACHE.DRIVER === "postgres") await closePool();
  }
}

main().catch((error: unknown) => {
  console.error("❌ Unexpected error:", error);
  process.exit(1);
});
