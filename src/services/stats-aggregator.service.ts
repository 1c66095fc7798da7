/**
 * Stats Aggregator
 * Turns a set of routes into distance per country and per city,
 * publishing progress snapshots while it runs.
 *
 * RUN FLOW:
 * ---------
 *
 * ```
 * routes
 *   │
 *   ▼
 * ┌──────────────────────┐
 * │ 1. Validate routes   │  ← <2 points or bad distance: discarded, counted
 * └──────────────────────┘
 *   │
 *   ▼
 * ┌──────────────────────┐
 * │ 2. Load geo cache    │  ← corrupted maps dropped, cleanup pass
 * └──────────────────────┘
 *   │
 *   ▼
 * ┌──────────────────────┐
 * │ 3. For each batch:   │
 * │  sample routes       │  ← ≤ maxSamples points, distance shares
 * │  resolve cache misses│  ← provider, bounded by maxConcurrent
 * │  tally in order      │
 * │  publish snapshot    │  ← done=false
 * └──────────────────────┘
 *   │
 *   ▼
 * ┌──────────────────────┐
 * │ 4. (Unknown) bucket  │  ← distance no country was found for
 * │ 5. Save cache        │
 * │ 6. Final snapshot    │  ← done=true
 * └──────────────────────┘
 * ```
 *
 * STATE & SUPERSEDED RUNS:
 * ------------------------
 * All mutable state (tallies, cache maps, counters) belongs to one run
 * and is only touched from that run's loop. Consumers receive frozen
 * snapshots. Every run() takes a new generation number; a run checks
 * its generation before each publish and stops quietly (no snapshot,
 * no cache save) once a newer run has started.
 *
 * @example
 * const aggregator = new StatsAggregator({ storage: new MemoryStorage() });
 * for await (const snapshot of aggregator.run(routes)) {
 *   console.log(`${snapshot.processed}/${snapshot.total}`);
 * }
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { AGGREGATION, GEOCODER } from "../config/constants.js";
import { createLimiter, type Limiter } from "../utils/concurrency.js";
import { GeoCache } from "./geo-cache.service.js";
import {
  InvalidDistanceError,
  isValidCoordinate,
  isValidDistance,
  quantizeCoordinate,
} from "./geo.service.js";
import { LocalGeocoder } from "./local-geocoder.service.js";
import { attributeDistance, sample } from "./route-sampler.service.js";
import type { KeyValueStorage } from "../lib/storage.js";
import type { Route } from "./route.service.js";
import type {
  Coordinate,
  GeocodeOutcome,
  GeocodeProvider,
} from "../types/geo.types.js";
import type {
  AggregationOptions,
  AttributionMode,
  RunDiagnostics,
  Snapshot,
  SnapshotListener,
  TallyEntry,
} from "../types/stats.types.js";

// ============================================
// Type Definitions
// ============================================

export interface StatsAggregatorConfig extends AggregationOptions {
  /** Persistence backend for the geo cache */
  storage: KeyValueStorage;
}

/** A sample point with its cache key and distance share */
interface PlannedSample extends Coordinate {
  key: string;
  km: number;
}

/** Settings resolved for one run */
interface RunSettings {
  provider: GeocodeProvider;
  maxSamples: number;
  snapshotEvery: number;
  attribution: AttributionMode;
}

/** Mutable state owned by one run */
interface RunState {
  generation: number;
  totalKm: number;
  total: number;
  processed: number;
  countryTally: Map<string, number>;
  cityTally: Map<string, number>;
  seenKeys: Set<string>;
  geocodedCount: number;
  diagnostics: RunDiagnostics;
}

/** Handle for a run started in the background */
export interface StartedRun {
  generation: number;
  /** Resolves with the final snapshot, or null if the run was superseded */
  done: Promise<Snapshot | null>;
}

// ============================================
// Helpers
// ============================================

export function emptyDiagnostics(): RunDiagnostics {
  return {
    discardedTooFewPoints: 0,
    discardedInvalidDistance: 0,
    skippedInvalidCoordinates: 0,
    geocodeFailures: 0,
    corruptedCacheMaps: 0,
    normalizedCacheEntries: 0,
    orphanedCacheEntries: 0,
  };
}

/**
 * Tally entries sorted by distance, largest first.
 * Equal distances keep insertion order (Array.prototype.sort is stable).
 */
export function sortTally(tally: ReadonlyMap<string, number>): TallyEntry[] {
  return [...tally.entries()]
    .map(([label, km]) => ({ label, km }))
    .sort((a, b) => b.km - a.km);
}

function addTo(tally: Map<string, number>, label: string, km: number): void {
  tally.set(label, (tally.get(label) ?? 0) + km);
}

function failureFromError(error: unknown): GeocodeOutcome {
  return {
    ok: false,
    reason: "transport",
    message: error instanceof Error ? error.message : String(error),
  };
}

// ============================================
// Aggregator
// ============================================

export class StatsAggregator {
  private readonly storage: KeyValueStorage;
  private readonly defaults: RunSettings;
  private generation = 0;
  private latestSnapshot: Snapshot | null = null;

  constructor(config: StatsAggregatorConfig) {
    this.storage = config.storage;
    this.defaults = {
      provider: config.provider ?? new LocalGeocoder(),
      maxSamples: config.maxSamples ?? AGGREGATION.MAX_SAMPLES,
      snapshotEvery: config.snapshotEvery ?? AGGREGATION.SNAPSHOT_EVERY,
      attribution: config.attribution ?? AGGREGATION.ATTRIBUTION,
    };
  }

  /** Generation of the most recently requested run */
  get currentGeneration(): number {
    return this.generation;
  }

  isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  /**
   * Newest snapshot published by the current run, if any
   */
  latest(): Snapshot | null {
    if (this.latestSnapshot && this.isCurrent(this.latestSnapshot.generation)) {
      return this.latestSnapshot;
    }
    return null;
  }

  /**
   * Start a run and stream its snapshots
   *
   * The generation is claimed immediately, so calling run() again
   * supersedes this run even before it is iterated. The last snapshot
   * yielded has done=true unless the run was superseded.
   */
  run(
    routes: readonly Route[],
    options: AggregationOptions = {}
  ): AsyncGenerator<Snapshot, void, undefined> {
    const generation = ++this.generation;
    const settings: RunSettings = {
      provider: options.provider ?? this.defaults.provider,
      maxSamples: options.maxSamples ?? this.defaults.maxSamples,
      snapshotEvery: Math.max(
        1,
        Math.floor(options.snapshotEvery ?? this.defaults.snapshotEvery)
      ),
      attribution: options.attribution ?? this.defaults.attribution,
    };
    return this.execute(generation, routes, settings);
  }

  /**
   * Drive a run in the background, handing each snapshot to a listener
   */
  start(
    routes: readonly Route[],
    listener?: SnapshotListener,
    options: AggregationOptions = {}
  ): StartedRun {
    const stream = this.run(routes, options);
    const generation = this.generation;

    const done = (async (): Promise<Snapshot | null> => {
      let last: Snapshot | null = null;
      for await (const snapshot of stream) {
        last = snapshot;
        listener?.(snapshot);
      }
      return last?.done ? last : null;
    })();

    return { generation, done };
  }

  // ============================================
  // Run Loop
  // ============================================

  private async *execute(
    generation: number,
    routes: readonly Route[],
    settings: RunSettings
  ): AsyncGenerator<Snapshot, void, undefined> {
    const state: RunState = {
      generation,
      totalKm: 0,
      total: 0,
      processed: 0,
      countryTally: new Map(),
      cityTally: new Map(),
      seenKeys: new Set(),
      geocodedCount: 0,
      diagnostics: emptyDiagnostics(),
    };

    // Step 1: validate
    const valid = this.validate(routes, state);

    if (valid.length === 0) {
      if (!this.isCurrent(generation)) return;
      this.logDiagnostics(state);
      yield this.publish(state, true);
      return;
    }

    // Step 2: load and repair the cache
    const cache = new GeoCache(this.storage);
    const loadReport = await cache.load();
    const cleanupReport = cache.cleanup();
    state.diagnostics.corruptedCacheMaps = loadReport.corruptedMaps.length;
    state.diagnostics.normalizedCacheEntries = cleanupReport.normalized;
    state.diagnostics.orphanedCacheEntries = cleanupReport.orphansRemoved;

    const limit = createLimiter(settings.provider.maxConcurrent);

    // Step 3: process in batches, publishing between them
    for (let start = 0; start < valid.length; start += settings.snapshotEvery) {
      const batch = valid.slice(start, start + settings.snapshotEvery);
      const plans = batch.map((route) => this.plan(route, settings, state));

      await this.resolveMisses(plans, cache, settings.provider, limit, state);

      for (const plan of plans) {
        if (plan) this.tally(plan, cache, state);
      }
      state.processed += batch.length;

      if (state.processed < state.total) {
        if (!this.isCurrent(generation)) {
          this.logSuperseded(generation);
          return;
        }
        yield this.publish(state, false);
        await yieldToEventLoop();
      }
    }

    // Step 4: whatever no country claimed goes to (Unknown)
    const known = [...state.countryTally.values()].reduce((s, km) => s + km, 0);
    const remainder = state.totalKm - known;
    if (remainder > AGGREGATION.EPSILON_KM) {
      addTo(state.countryTally, AGGREGATION.UNKNOWN_BUCKET, remainder);
    }

    // Step 5: persist the cache
    if (!this.isCurrent(generation)) {
      this.logSuperseded(generation);
      return;
    }
    try {
      await cache.save();
    } catch (error) {
      // New entries are lost for this run; the old persisted state stays valid
      console.error("[StatsAggregator] Failed to save geo cache:", error);
    }

    // Step 6: final snapshot
    if (!this.isCurrent(generation)) {
      this.logSuperseded(generation);
      return;
    }
    this.logDiagnostics(state);
    yield this.publish(state, true);
  }

  /**
   * Drop routes that carry no usable distance and sum the rest
   */
  private validate(routes: readonly Route[], state: RunState): Route[] {
    const valid: Route[] = [];

    for (const route of routes) {
      if (route.coordinates.length < 2) {
        state.diagnostics.discardedTooFewPoints++;
        continue;
      }

      const km = route.distanceKm;
      if (!isValidDistance(km)) {
        state.diagnostics.discardedInvalidDistance++;
        console.warn(
          `[StatsAggregator] ${new InvalidDistanceError(route.id, km).message}`
        );
        continue;
      }

      valid.push(route);
      state.totalKm += km;
    }

    state.total = valid.length;
    return valid;
  }

  /**
   * Sample a route and key each sample; null if the route is unusable
   */
  private plan(
    route: Route,
    settings: RunSettings,
    state: RunState
  ): PlannedSample[] | null {
    if (!route.coordinates.every(isValidCoordinate)) {
      state.diagnostics.skippedInvalidCoordinates++;
      return null;
    }

    const samples = sample(route.coordinates, settings.maxSamples);
    return attributeDistance(samples, route.distanceKm, settings.attribution).map(
      (s) => ({ ...s, key: quantizeCoordinate(s.lat, s.lon) })
    );
  }

  /**
   * Geocode every key of the batch that the cache does not know yet
   *
   * Keys are resolved in first-appearance order through the limiter;
   * outcomes are recorded one at a time by record().
   */
  private async resolveMisses(
    plans: ReadonlyArray<PlannedSample[] | null>,
    cache: GeoCache,
    provider: GeocodeProvider,
    limit: Limiter,
    state: RunState
  ): Promise<void> {
    const misses = new Map<string, Coordinate>();
    for (const plan of plans) {
      for (const s of plan ?? []) {
        if (!cache.has(s.key) && !misses.has(s.key)) {
          misses.set(s.key, { lat: s.lat, lon: s.lon });
        }
      }
    }
    if (misses.size === 0) return;

    await Promise.all(
      [...misses].map(([key, point]) =>
        limit(() => provider.lookup(point.lat, point.lon))
          .catch(failureFromError)
          .then((outcome) => this.record(key, outcome, cache, state))
      )
    );
  }

  /**
   * Single write point for lookup outcomes
   */
  private record(
    key: string,
    outcome: GeocodeOutcome,
    cache: GeoCache,
    state: RunState
  ): void {
    if (outcome.ok) {
      cache.set(key, outcome.country, outcome.city);
      state.geocodedCount++;
      return;
    }

    // Left ungeocoded for this run; its share ends up in (Unknown)
    state.diagnostics.geocodeFailures++;
    console.warn(
      `[StatsAggregator] Lookup ${key} failed (${outcome.reason}): ${outcome.message}`
    );
  }

  private tally(plan: PlannedSample[], cache: GeoCache, state: RunState): void {
    for (const s of plan) {
      state.seenKeys.add(s.key);

      const place = cache.get(s.key);
      if (!place) continue;

      const country =
        place.country === GEOCODER.UNKNOWN_LABEL
          ? AGGREGATION.UNKNOWN_BUCKET
          : place.country;
      addTo(state.countryTally, country, s.km);
      addTo(state.cityTally, place.city, s.km);
    }
  }

  // ============================================
  // Publishing
  // ============================================

  private publish(state: RunState, done: boolean): Snapshot {
    const snapshot: Snapshot = Object.freeze({
      generation: state.generation,
      totalKm: state.totalKm,
      countries: Object.freeze(sortTally(state.countryTally)),
      cities: Object.freeze(sortTally(state.cityTally)),
      processed: done ? state.total : state.processed,
      total: state.total,
      uniqueCoords: state.seenKeys.size,
      geocodedCount: state.geocodedCount,
      done,
      diagnostics: Object.freeze({ ...state.diagnostics }),
    });

    this.latestSnapshot = snapshot;
    return snapshot;
  }

  private logSuperseded(generation: number): void {
    console.log(
      `[StatsAggregator] Run ${generation} superseded by run ${this.generation}, stopping`
    );
  }

  private logDiagnostics(state: RunState): void {
    const d = state.diagnostics;
    const discarded =
      d.discardedTooFewPoints +
      d.discardedInvalidDistance +
      d.skippedInvalidCoordinates;

    if (discarded > 0 || d.geocodeFailures > 0) {
      console.warn(
        `[StatsAggregator] Run ${state.generation}: ${d.discardedTooFewPoints} routes with <2 points, ` +
          `${d.discardedInvalidDistance} with invalid distance, ` +
          `${d.skippedInvalidCoordinates} with invalid coordinates, ` +
          `${d.geocodeFailures} failed lookups`
      );
    }

    console.log(
      `[StatsAggregator] Run ${state.generation} done: ${state.totalKm.toFixed(2)} km, ` +
        `${state.total} routes, ${state.seenKeys.size} cells, ${state.geocodedCount} geocoded`
    );
  }
}
