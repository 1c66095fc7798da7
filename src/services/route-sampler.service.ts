/**
 * Route Sampler
 * Reduces a route to a bounded set of representative points and
 * decides how much of the route's distance each point carries.
 *
 * Geocoding every GPS point would be wasteful: consecutive points are
 * a few meters apart and land in the same cache cell. A route is
 * instead represented by at most maxSamples evenly-strided points,
 * always including its end.
 */

import { AGGREGATION } from "../config/constants.js";
import { distance } from "./geo.service.js";
import type { Coordinate } from "../types/geo.types.js";
import type { AttributionMode } from "../types/stats.types.js";

/** A sample point and the share of route distance it carries */
export interface WeightedSample extends Coordinate {
  km: number;
}

function samePlace(a: Coordinate, b: Coordinate): boolean {
  const tolerance = AGGREGATION.DEDUP_TOLERANCE_DEG;
  return (
    Math.abs(a.lat - b.lat) <= tolerance && Math.abs(a.lon - b.lon) <= tolerance
  );
}

/**
 * Pick at most maxSamples representative points
 *
 * - len <= maxSamples: points are returned unchanged
 * - otherwise every stride-th point, stride = ceil(len / maxSamples)
 * - the final point is added when it is not (within tolerance) the last
 *   sample; if the budget is full it takes the last sample's place
 *
 * @example
 * sample(points25, 10); // indices 0, 3, 6, ..., 24 (9 points)
 */
export function sample<T extends Coordinate>(
  points: readonly T[],
  maxSamples: number = AGGREGATION.MAX_SAMPLES
): T[] {
  const limit = Math.max(1, Math.floor(maxSamples));
  if (points.length <= limit) return [...points];

  const stride = Math.max(1, Math.ceil(points.length / limit));
  const samples: T[] = [];
  for (let i = 0; i < points.length; i += stride) {
    samples.push(points[i]);
  }

  const last = points[points.length - 1];
  if (!samePlace(samples[samples.length - 1], last)) {
    if (samples.length >= limit) {
      samples[samples.length - 1] = last;
    } else {
      samples.push(last);
    }
  }

  return samples;
}

/**
 * Split a route's distance across its sample points
 *
 * - "equal": every sample carries totalKm / count
 * - "spacing": each sample carries half the distance to each neighbour
 *   sample, scaled so the shares still sum to totalKm. Falls back to
 *   equal shares when all samples sit on the same spot.
 */
export function attributeDistance(
  samples: readonly Coordinate[],
  totalKm: number,
  mode: AttributionMode = AGGREGATION.ATTRIBUTION
): WeightedSample[] {
  if (samples.length === 0) return [];

  const equalShare = totalKm / samples.length;
  if (mode === "equal" || samples.length === 1) {
    return samples.map((s) => ({ lat: s.lat, lon: s.lon, km: equalShare }));
  }

  const weights = samples.map((s, i) => {
    const toPrev = i > 0 ? distance(samples[i - 1], s) : 0;
    const toNext = i < samples.length - 1 ? distance(s, samples[i + 1]) : 0;
    return (toPrev + toNext) / 2;
  });
  const weightSum = weights.reduce((sum, w) => sum + w, 0);

  if (weightSum <= 0) {
    return samples.map((s) => ({ lat: s.lat, lon: s.lon, km: equalShare }));
  }

  return samples.map((s, i) => ({
    lat: s.lat,
    lon: s.lon,
    km: (weights[i] / weightSum) * totalKm,
  }));
}
