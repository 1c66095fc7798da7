/**
 * Geo Service
 * Great-circle distance and coordinate helpers
 *
 * This service provides utility functions for:
 * - Calculating distances between coordinates (Haversine formula)
 * - Summing the length of a route
 * - Validating coordinates and computed distances
 * - Building quantized cache keys
 *
 * All distance calculations return values in KILOMETERS.
 */

import { degreesToRadians } from "@turf/turf";
import { GEOCODER, CACHE } from "../config/constants.js";
import type { Coordinate } from "../types/geo.types.js";

// ============================================
// Distance Calculations
// ============================================

/**
 * Calculate the great-circle distance between two coordinates
 *
 * Uses the haversine formula with a 6371 km Earth radius.
 * Symmetric, and zero for identical points.
 *
 * @returns Distance in kilometers
 *
 * @example
 * distance({ lat: 52.52, lon: 13.405 }, { lat: 48.1351, lon: 11.582 });
 * // Returns: ~504.4
 */
export function distance(a: Coordinate, b: Coordinate): number {
  const lat1 = degreesToRadians(a.lat);
  const lat2 = degreesToRadians(b.lat);
  const deltaLat = degreesToRadians(b.lat - a.lat);
  const deltaLon = degreesToRadians(b.lon - a.lon);

  const h =
    Math.sin(deltaLat / 2) * Math.sin(deltaLat / 2) +
    Math.cos(lat1) *
      Math.cos(lat2) *
      Math.sin(deltaLon / 2) *
      Math.sin(deltaLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return GEOCODER.EARTH_RADIUS_KM * c;
}

/**
 * Calculate total length of a route in kilometers
 *
 * Sums the distance between each consecutive pair of points.
 * Callers must reject non-finite or negative results (see isValidDistance).
 *
 * @param points - Coordinates in travel order
 * @returns Total distance in kilometers, 0 for fewer than 2 points
 */
export function routeDistance(points: readonly Coordinate[]): number {
  // Need at least 2 points to calculate distance
  if (points.length < 2) return 0;

  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += distance(points[i - 1], points[i]);
  }
  return total;
}

// ============================================
// Validation
// ============================================

/**
 * Latitude in [-90, 90], longitude in [-180, 180], both finite
 */
export function isValidCoordinate(point: Coordinate): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lon) &&
    point.lat >= -90 &&
    point.lat <= 90 &&
    point.lon >= -180 &&
    point.lon <= 180
  );
}

/**
 * A usable route distance is finite and non-negative
 */
export function isValidDistance(km: number): boolean {
  return Number.isFinite(km) && km >= 0;
}

/**
 * Throw InvalidCoordinateError unless the coordinate is valid.
 * Used at API boundaries; the aggregation pipeline skips instead of throwing.
 */
export function assertValidCoordinate(point: Coordinate): void {
  if (!isValidCoordinate(point)) {
    throw new InvalidCoordinateError(point);
  }
}

// ============================================
// Cache Keys
// ============================================

/**
 * Quantize a coordinate to the cache grid
 *
 * Key format: "{lat},{lon}" with 3 decimal places (~111m cells),
 * so nearby raw points share one key.
 *
 * @example
 * quantizeCoordinate(52.52003, 13.40497); // "52.520,13.405"
 */
export function quantizeCoordinate(lat: number, lon: number): string {
  const precision = CACHE.COORD_PRECISION;
  return `${lat.toFixed(precision)},${lon.toFixed(precision)}`;
}

// ============================================
// Custom Error Classes
// ============================================

/**
 * Latitude/longitude non-finite or out of range
 */
export class InvalidCoordinateError extends Error {
  public coordinate: Coordinate;

  constructor(coordinate: Coordinate) {
    super(`Invalid coordinate: ${coordinate.lat},${coordinate.lon}`);
    this.name = "InvalidCoordinateError";
    this.coordinate = coordinate;
  }
}

/**
 * Computed route distance non-finite or negative
 */
export class InvalidDistanceError extends Error {
  public routeId: string;
  public distanceKm: number;

  constructor(routeId: string, distanceKm: number) {
    super(`Invalid distance for route ${routeId}: ${distanceKm}`);
    this.name = "InvalidDistanceError";
    this.routeId = routeId;
    this.distanceKm = distanceKm;
  }
}
