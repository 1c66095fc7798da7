/**
 * Stats Service
 * Wires the aggregator to configured storage and geocode provider,
 * and prepares incoming routes for aggregation.
 *
 * Two ways to run:
 * - computeStats() / streamStats(): a private aggregator per call.
 *   Concurrent callers never supersede each other.
 * - getSharedAggregator(): one aggregator for background runs. Starting
 *   a new run supersedes the previous one, and latest() only ever
 *   returns snapshots of the newest run.
 */

import { GEOCODER } from "../config/constants.js";
import { createCacheStorage } from "./geo-cache.service.js";
import { LocalGeocoder } from "./local-geocoder.service.js";
import { NominatimGeocoder } from "./nominatim-geocoder.service.js";
import { splitRoute } from "./route-segmenter.service.js";
import { StatsAggregator } from "./stats-aggregator.service.js";
import type { KeyValueStorage } from "../lib/storage.js";
import type { GeocodeProvider } from "../types/geo.types.js";
import type {
  AggregationOptions,
  Snapshot,
  SnapshotListener,
} from "../types/stats.types.js";
import type { Route } from "./route.service.js";

export interface PrepareOptions {
  /** Split traces at GPS gaps before aggregating */
  segment?: boolean;
  maxGapMeters?: number;
}

let storagePromise: Promise<KeyValueStorage> | null = null;
let provider: GeocodeProvider | null = null;
let sharedAggregator: StatsAggregator | null = null;

/**
 * Build the provider named by GEOCODE_PROVIDER
 */
export function createGeocodeProvider(
  kind: (typeof GEOCODER)["PROVIDER"] = GEOCODER.PROVIDER
): GeocodeProvider {
  return kind === "nominatim" ? new NominatimGeocoder() : new LocalGeocoder();
}

function getProvider(): GeocodeProvider {
  if (!provider) {
    provider = createGeocodeProvider();
    console.log(`[Stats] Using ${provider.name} geocode provider`);
  }
  return provider;
}

function getStorage(): Promise<KeyValueStorage> {
  if (!storagePromise) {
    storagePromise = createCacheStorage().catch((error: unknown) => {
      // Allow a retry on the next request
      storagePromise = null;
      throw error;
    });
  }
  return storagePromise;
}

/**
 * Aggregator used for background runs (one per process)
 */
export async function getSharedAggregator(): Promise<StatsAggregator> {
  if (!sharedAggregator) {
    const storage = await getStorage();
    // Another caller may have created it while storage was loading
    if (!sharedAggregator) {
      sharedAggregator = new StatsAggregator({ storage, provider: getProvider() });
    }
  }
  return sharedAggregator;
}

/**
 * Optionally split routes into movement segments
 */
export function prepareRoutes(
  routes: readonly Route[],
  options: PrepareOptions = {}
): Route[] {
  if (!options.segment) return [...routes];
  return routes.flatMap((route) => splitRoute(route, options.maxGapMeters));
}

/**
 * Snapshots of a run on a private aggregator, pulled one at a time
 *
 * Stopping the iteration early stops the run; it then does not save
 * the cache.
 */
export async function* streamStats(
  routes: readonly Route[],
  options: AggregationOptions = {}
): AsyncGenerator<Snapshot> {
  const aggregator = new StatsAggregator({
    storage: await getStorage(),
    provider: getProvider(),
  });
  yield* aggregator.run(routes, options);
}

/**
 * Run an aggregation to completion on a private aggregator
 *
 * @param onSnapshot - Receives every snapshot, including the final one
 * @returns The final (done=true) snapshot
 */
export async function computeStats(
  routes: readonly Route[],
  options: AggregationOptions = {},
  onSnapshot?: SnapshotListener
): Promise<Snapshot> {
  let last: Snapshot | null = null;
  for await (const snapshot of streamStats(routes, options)) {
    last = snapshot;
    onSnapshot?.(snapshot);
  }

  if (!last?.done) {
    throw new Error("Aggregation ended without a final snapshot");
  }
  return last;
}

/**
 * Start a background run on the shared aggregator
 */
export async function startBackgroundStats(
  routes: readonly Route[],
  options: AggregationOptions = {}
): Promise<number> {
  const aggregator = await getSharedAggregator();
  const { generation, done } = aggregator.start(routes, undefined, options);

  done
    .then((final) => {
      if (!final) console.log(`[Stats] Background run ${generation} superseded`);
    })
    .catch((error: unknown) => {
      console.error(`[Stats] Background run ${generation} failed:`, error);
    });

  return generation;
}
