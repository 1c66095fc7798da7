/**
 * Route Service
 * Route model with memoized distance, plus validation of raw route payloads
 */

import { routeDistance } from "./geo.service.js";
import { ROUTE_CATEGORIES } from "../types/route.types.js";
import type { Coordinate } from "../types/geo.types.js";
import type { RouteCategory, RouteRecord } from "../types/route.types.js";

// ============================================
// Route Model
// ============================================

/**
 * A recorded route
 *
 * distanceKm is derived from the coordinates on first access and
 * reused afterwards; the coordinates are frozen so it cannot go stale.
 */
export class Route implements RouteRecord {
  readonly id: string;
  readonly coordinates: readonly Coordinate[];
  readonly timestamp: Date;
  readonly category: RouteCategory;
  readonly durationSeconds: number;

  private cachedDistanceKm: number | undefined;

  constructor(record: RouteRecord) {
    this.id = record.id;
    this.coordinates = Object.freeze(
      record.coordinates.map((c) => ({ lat: c.lat, lon: c.lon }))
    );
    this.timestamp = record.timestamp;
    this.category = record.category;
    this.durationSeconds = record.durationSeconds;
  }

  /** Sum of consecutive great-circle distances; 0 for fewer than 2 points */
  get distanceKm(): number {
    if (this.cachedDistanceKm === undefined) {
      this.cachedDistanceKm = routeDistance(this.coordinates);
    }
    return this.cachedDistanceKm;
  }
}

// ============================================
// Payload Parsing
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isRouteCategory(value: unknown): value is RouteCategory {
  return ROUTE_CATEGORIES.some((category) => category === value);
}

/**
 * Read one coordinate from either { lat, lon } / { lat, lng } or [lat, lon]
 *
 * Only the shape is checked here. Out-of-range values are kept so the
 * aggregator can count and skip them like any other bad trace.
 */
function parseCoordinate(value: unknown, routeId: string, index: number): Coordinate {
  if (Array.isArray(value) && value.length >= 2) {
    const [lat, lon] = value;
    if (typeof lat === "number" && typeof lon === "number") {
      return { lat, lon };
    }
  }

  if (isRecord(value)) {
    const lat = value.lat ?? value.latitude;
    const lon = value.lon ?? value.lng ?? value.longitude;
    if (typeof lat === "number" && typeof lon === "number") {
      return { lat, lon };
    }
  }

  throw new RouteValidationError(
    `Route ${routeId}: coordinate ${index} must be { lat, lon } or [lat, lon]`
  );
}

/**
 * Validate an untrusted route payload (e.g. a JSON request body entry)
 *
 * Missing optional fields fall back to: timestamp = epoch,
 * category = "other", durationSeconds = 0.
 *
 * @throws RouteValidationError when the payload has the wrong shape
 *
 * @example
 * parseRouteInput({
 *   id: "morning-run",
 *   coordinates: [[52.52, 13.405], [52.5206, 13.405]],
 *   category: "running",
 * });
 */
export function parseRouteInput(value: unknown, fallbackId = "route"): Route {
  if (!isRecord(value)) {
    throw new RouteValidationError(`Route ${fallbackId} must be an object`);
  }

  const id =
    typeof value.id === "string" || typeof value.id === "number"
      ? String(value.id)
      : fallbackId;

  if (!Array.isArray(value.coordinates)) {
    throw new RouteValidationError(`Route ${id}: coordinates must be an array`);
  }
  const coordinates = value.coordinates.map((c: unknown, i: number) =>
    parseCoordinate(c, id, i)
  );

  let timestamp = new Date(0);
  if (typeof value.timestamp === "string" || typeof value.timestamp === "number") {
    timestamp = new Date(value.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      throw new RouteValidationError(`Route ${id}: timestamp is not a valid date`);
    }
  }

  const category = isRouteCategory(value.category) ? value.category : "other";

  const durationSeconds =
    typeof value.durationSeconds === "number" &&
    Number.isFinite(value.durationSeconds) &&
    value.durationSeconds >= 0
      ? value.durationSeconds
      : 0;

  return new Route({ id, coordinates, timestamp, category, durationSeconds });
}

/**
 * Validate a list of route payloads, assigning "route-{n}" ids where missing
 */
export function parseRouteList(value: unknown): Route[] {
  if (!Array.isArray(value)) {
    throw new RouteValidationError("routes must be an array");
  }
  return value.map((entry: unknown, i: number) =>
    parseRouteInput(entry, `route-${i + 1}`)
  );
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Thrown when a route payload has the wrong shape
 *
 * Caught in route handlers to return a 400 response.
 */
export class RouteValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RouteValidationError";
  }
}
