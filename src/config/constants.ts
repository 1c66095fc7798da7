/**
 * Application Constants
 * Centralized configuration values
 */

// ============================================
// Environment Variable Helpers
// ============================================

/**
 * Get required environment variable or throw
 */
export function getEnvVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default
 */
export function getEnvVarOptional(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

/**
 * Get optional numeric environment variable with default.
 * Falls back to the default when the value is missing or not a finite number.
 */
export function getEnvNumberOptional(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function getEnvChoice<T extends string>(
  name: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const raw = process.env[name];
  const match = choices.find((choice) => choice === raw);
  return match ?? defaultValue;
}

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api/v1",
} as const;

export const FRONTEND_URL = process.env.FRONTEND_URL ?? "http://localhost:5173";

// ============================================
// Geocoding
// ============================================

export const GEOCODER = {
  /** Earth radius used by the haversine formula */
  EARTH_RADIUS_KM: 6371,

  /** Distance tiers (km) from the nearest known city */
  CITY_TIERS: {
    NEAR: { maxKm: 10, confidence: 0.95 },
    CLOSE: { maxKm: 25, confidence: 0.8 },
    REGIONAL: { maxKm: 50, confidence: 0.7 },
    REMOTE: { confidence: 0.6 },
  },

  /** Label used when no bounding box contains a point */
  UNKNOWN_LABEL: "Unknown",

  /** Provider used by the aggregator: offline table or Nominatim fallback */
  PROVIDER: getEnvChoice(
    "GEOCODE_PROVIDER",
    ["local", "nominatim"] as const,
    "local"
  ),
} as const;

export const NOMINATIM = {
  BASE_URL: getEnvVarOptional(
    "NOMINATIM_URL",
    "https://nominatim.openstreetmap.org"
  ),
  TIMEOUT_MS: getEnvNumberOptional("NOMINATIM_TIMEOUT_MS", 10000),
  /** Upper bound on simultaneously outstanding lookups */
  MAX_CONCURRENT: getEnvNumberOptional("NOMINATIM_MAX_CONCURRENT", 50),
  USER_AGENT: "RouteGeoStats/1.0 (offline route statistics)",
} as const;

// ============================================
// Geo Cache
// ============================================

export const CACHE = {
  /** Decimal places kept in cache keys (~111m grid cells) */
  COORD_PRECISION: 3,

  /** Storage keys of the two persisted maps */
  COUNTRY_KEY: "coordCountryCache",
  CITY_KEY: "coordCityCache",

  DRIVER: getEnvChoice(
    "CACHE_DRIVER",
    ["memory", "file", "postgres"] as const,
    "file"
  ),
  FILE_PATH: getEnvVarOptional("CACHE_FILE_PATH", ".cache/geo-cache.json"),
  PG_TABLE: "key_value_store",
} as const;

// ============================================
// Aggregation
// ============================================

export const AGGREGATION = {
  /** Representative points geocoded per route */
  MAX_SAMPLES: getEnvNumberOptional("MAX_SAMPLES_PER_ROUTE", 10),

  /** Publish a progress snapshot after this many routes */
  SNAPSHOT_EVERY: getEnvNumberOptional("SNAPSHOT_EVERY", 10),

  /** Two samples closer than this (degrees, either axis) are the same point */
  DEDUP_TOLERANCE_DEG: 0.0001,

  /** How route distance is split across sample points */
  ATTRIBUTION: getEnvChoice(
    "DISTANCE_ATTRIBUTION",
    ["equal", "spacing"] as const,
    "equal"
  ),

  /** Largest gap (meters) between consecutive points inside one segment */
  SEGMENT_MAX_GAP_METERS: getEnvNumberOptional("SEGMENT_MAX_GAP_METERS", 20),

  /** Label of the bucket holding distance that could not be attributed */
  UNKNOWN_BUCKET: "(Unknown)",

  /** Remainders below this are float residue, not unattributed distance */
  EPSILON_KM: 1e-9,
} as const;

// ============================================
// GPX Upload Configuration
// ============================================

export const UPLOAD = {
  MAX_FILE_SIZE_BYTES: 10 * 1024 * 1024,
  MAX_FILES: 50,
  FIELD_NAME: "gpx",
  MIN_POINTS: 2,
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // Geocoding errors
  INVALID_COORDINATES: "INVALID_COORDINATES",

  // Route input errors
  ROUTES_REQUIRED: "ROUTES_REQUIRED",
  ROUTE_INVALID: "ROUTE_INVALID",

  // GPX errors
  GPX_PARSE_ERROR: "GPX_PARSE_ERROR",
  GPX_INVALID_FORMAT: "GPX_INVALID_FORMAT",
  GPX_FILE_TOO_LARGE: "GPX_FILE_TOO_LARGE",
  GPX_FILE_REQUIRED: "GPX_FILE_REQUIRED",

  // Stats errors
  STATS_NOT_AVAILABLE: "STATS_NOT_AVAILABLE",
} as const;
