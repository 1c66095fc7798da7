/**
 * Stats Types
 * Aggregation options, progress snapshots and diagnostics
 */

import type { GeocodeProvider } from "./geo.types.js";

export type AttributionMode = "equal" | "spacing";

/** Label with its accumulated distance */
export interface TallyEntry {
  label: string;
  km: number;
}

/** Data-quality counters for one aggregation run */
export interface RunDiagnostics {
  /** Routes with fewer than 2 coordinates */
  discardedTooFewPoints: number;
  /** Routes whose distance was non-finite or negative */
  discardedInvalidDistance: number;
  /** Routes containing an out-of-range or non-finite coordinate */
  skippedInvalidCoordinates: number;
  /** Fallback lookups that timed out, found nothing or failed in transport */
  geocodeFailures: number;
  /** Persisted cache maps thrown away because they failed to decode */
  corruptedCacheMaps: number;
  /** Cached country values rewritten by normalization */
  normalizedCacheEntries: number;
  /** City entries removed because their country entry was missing */
  orphanedCacheEntries: number;
}

/** Immutable point-in-time view of an aggregation run */
export interface Snapshot {
  generation: number;
  totalKm: number;
  countries: readonly TallyEntry[];
  cities: readonly TallyEntry[];
  processed: number;
  total: number;
  uniqueCoords: number;
  geocodedCount: number;
  done: boolean;
  diagnostics: RunDiagnostics;
}

export interface AggregationOptions {
  provider?: GeocodeProvider;
  maxSamples?: number;
  snapshotEvery?: number;
  attribution?: AttributionMode;
}

export type SnapshotListener = (snapshot: Snapshot) => void;
