/**
 * Route Segmenter
 * Splits a raw GPS trace into continuous movement segments
 *
 * GPS traces contain pauses (watch stopped, signal lost) and teleports
 * (first fix after a tunnel). Consecutive points further apart than
 * maxGapMeters end the current segment; the gap itself never counts
 * as distance. A segment needs 2 points to carry any distance, so
 * single-point segments are dropped.
 *
 * @example
 * // Three points, the middle one 500m from both neighbours
 * segment([a, b, c], 20); // [] - every segment had a single point
 */

import { AGGREGATION } from "../config/constants.js";
import { distance } from "./geo.service.js";
import { Route } from "./route.service.js";
import type { Coordinate } from "../types/geo.types.js";

/**
 * Split points into segments with no inter-point gap above maxGapMeters
 *
 * Segments preserve input order and always hold at least 2 points.
 */
export function segment<T extends Coordinate>(
  points: readonly T[],
  maxGapMeters: number = AGGREGATION.SEGMENT_MAX_GAP_METERS
): T[][] {
  const segments: T[][] = [];
  if (points.length === 0) return segments;

  let current: T[] = [points[0]];

  for (let i = 1; i < points.length; i++) {
    const gapMeters = distance(points[i - 1], points[i]) * 1000;

    if (gapMeters <= maxGapMeters) {
      current.push(points[i]);
    } else {
      segments.push(current);
      current = [points[i]];
    }
  }
  segments.push(current);

  return segments.filter((s) => s.length >= 2);
}

/**
 * Split a route into one route per movement segment
 *
 * Segment routes get ids "{id}#{n}" (1-based) and inherit every
 * other field from the source route.
 */
export function splitRoute(
  route: Route,
  maxGapMeters: number = AGGREGATION.SEGMENT_MAX_GAP_METERS
): Route[] {
  return segment(route.coordinates, maxGapMeters).map(
    (points, index) =>
      new Route({
        id: `${route.id}#${index + 1}`,
        coordinates: points,
        timestamp: route.timestamp,
        category: route.category,
        durationSeconds: route.durationSeconds,
      })
  );
}
