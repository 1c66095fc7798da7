/**
 * Geo Database Service
 * Offline table of country bounding boxes and major-city coordinates
 *
 * The table ships with the service (data/geo-database.json) and is read
 * once, validated, frozen and then shared for the life of the process.
 * Countries keep their declaration order: lookups return the FIRST
 * country whose box contains a point, so order decides overlaps
 * (e.g. Germany is listed before Poland, Austria and Switzerland).
 */

import { readFileSync } from "node:fs";
import { bboxPolygon, booleanPointInPolygon, point } from "@turf/turf";
import type {
  BoundingBox,
  CityMarker,
  CountryRegion,
} from "../types/geo.types.js";

const TABLE_FILE = new URL("../data/geo-database.json", import.meta.url);

let countries: readonly CountryRegion[] | null = null;

// ============================================
// Loading & Validation
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finite(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new GeoDatabaseError(`Field ${field} must be a finite number`);
  }
  return value;
}

function parseBounds(value: unknown, country: string): BoundingBox {
  if (!isRecord(value)) {
    throw new GeoDatabaseError(`Country ${country} has no bounds`);
  }
  const bounds: BoundingBox = {
    minLat: finite(value.minLat, `${country}.minLat`),
    maxLat: finite(value.maxLat, `${country}.maxLat`),
    minLon: finite(value.minLon, `${country}.minLon`),
    maxLon: finite(value.maxLon, `${country}.maxLon`),
  };
  if (bounds.minLat > bounds.maxLat || bounds.minLon > bounds.maxLon) {
    throw new GeoDatabaseError(`Country ${country} has inverted bounds`);
  }
  return bounds;
}

function parseCity(value: unknown, country: string): CityMarker {
  if (!isRecord(value) || typeof value.name !== "string") {
    throw new GeoDatabaseError(`Country ${country} has a city without a name`);
  }
  const lat = finite(value.lat, `${country}.${value.name}.lat`);
  const lon = finite(value.lon, `${country}.${value.name}.lon`);
  if (lat < -90 || lat > 90 || lon < -180 || lon > 180) {
    throw new GeoDatabaseError(`City ${value.name} is out of range`);
  }
  return Object.freeze({ name: value.name, lat, lon });
}

/**
 * Validate raw table data and freeze it
 *
 * @throws GeoDatabaseError if any country or city is malformed
 */
export function parseGeoDatabase(raw: unknown): readonly CountryRegion[] {
  if (!isRecord(raw) || !Array.isArray(raw.countries)) {
    throw new GeoDatabaseError("Geo database must contain a countries array");
  }

  const parsed = raw.countries.map((entry: unknown): CountryRegion => {
    if (
      !isRecord(entry) ||
      typeof entry.name !== "string" ||
      typeof entry.code !== "string"
    ) {
      throw new GeoDatabaseError("Country entry needs a name and a code");
    }
    const name = entry.name;
    const cities: unknown[] = Array.isArray(entry.cities) ? entry.cities : [];
    return Object.freeze({
      name,
      code: entry.code,
      bounds: Object.freeze(parseBounds(entry.bounds, name)),
      cities: Object.freeze(cities.map((city) => parseCity(city, name))),
    });
  });

  return Object.freeze(parsed);
}

/**
 * Load the bundled table (once per process)
 */
export function loadGeoDatabase(): readonly CountryRegion[] {
  if (countries) return countries;

  const raw: unknown = JSON.parse(readFileSync(TABLE_FILE, "utf-8"));
  countries = parseGeoDatabase(raw);
  console.log(`[GeoDatabase] Loaded ${countries.length} countries`);
  return countries;
}

export function getCountries(): readonly CountryRegion[] {
  return loadGeoDatabase();
}

// ============================================
// Lookups
// ============================================

/**
 * Check whether a bounding box contains a point (edges inclusive)
 */
export function boxContains(
  bounds: BoundingBox,
  lat: number,
  lon: number
): boolean {
  const box = bboxPolygon([
    bounds.minLon,
    bounds.minLat,
    bounds.maxLon,
    bounds.maxLat,
  ]);
  return booleanPointInPolygon(point([lon, lat]), box);
}

/**
 * Find the first country (table order) whose box contains the point
 *
 * @returns The country, or undefined when the point is outside every box
 */
export function findCountryAt(
  lat: number,
  lon: number,
  table: readonly CountryRegion[] = getCountries()
): CountryRegion | undefined {
  return table.find((country) => boxContains(country.bounds, lat, lon));
}

/**
 * Every country whose box contains the point, in table order.
 * More than one result means the first-match rule decided the outcome.
 */
export function findCountriesAt(
  lat: number,
  lon: number,
  table: readonly CountryRegion[] = getCountries()
): CountryRegion[] {
  return table.filter((country) => boxContains(country.bounds, lat, lon));
}

// ============================================
// Custom Error Class
// ============================================

export class GeoDatabaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeoDatabaseError";
  }
}
