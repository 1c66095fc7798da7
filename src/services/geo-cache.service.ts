/**
 * Geo Cache Service
 * Persistent memo of quantized coordinate -> country / city
 *
 * Two independent string maps are persisted through a KeyValueStorage:
 *
 *   coordCountryCache: { "52.520,13.405": "Germany", ... }
 *   coordCityCache:    { "52.520,13.405": "Berlin",  ... }
 *
 * Keys are coordinates rounded to 3 decimals (~111m cells), so nearby
 * raw points share an entry. Entries never expire: the offline table
 * behind them is static.
 *
 * Lifecycle per aggregation run:
 * 1. load()    - read both maps; a map that fails to decode is dropped whole
 * 2. cleanup() - re-normalize countries, drop entries missing their other half
 * 3. get()/set() in memory while the run geocodes
 * 4. save()    - overwrite both persisted maps with the final state, atomically
 *
 * @example
 * const cache = new GeoCache(new JsonFileStorage(".cache/geo-cache.json"));
 * await cache.load();
 * cache.cleanup();
 * const hit = cache.get("52.520,13.405");
 * if (!hit) cache.set("52.520,13.405", "Germany", "Berlin");
 * await cache.save();
 */

import { CACHE, GEOCODER } from "../config/constants.js";
import { getPool } from "../lib/db.js";
import { PgKeyValueStorage } from "../lib/pg-storage.js";
import {
  JsonFileStorage,
  MemoryStorage,
  type KeyValueStorage,
} from "../lib/storage.js";
import { normalizeCountryName } from "../utils/normalize-country-name.js";

export interface CachedPlace {
  country: string;
  city: string;
}

export interface CacheLoadReport {
  countryEntries: number;
  cityEntries: number;
  /** Storage keys whose content was discarded */
  corruptedMaps: string[];
}

export interface CacheCleanupReport {
  /** Country values rewritten by normalization */
  normalized: number;
  /** Entries removed for lacking a country or a city entry */
  orphansRemoved: number;
}

// ============================================
// Decoding
// ============================================

/**
 * Decode a persisted map; anything but a plain object of strings is corrupt
 *
 * @throws CorruptedCacheError
 */
export function decodeStringMap(
  storageKey: string,
  value: unknown
): Map<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new CorruptedCacheError(storageKey, "expected an object");
  }

  const map = new Map<string, string>();
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new CorruptedCacheError(
        storageKey,
        `entry ${key} is ${typeof entry}, expected string`
      );
    }
    map.set(key, entry);
  }
  return map;
}

// ============================================
// Cache
// ============================================

export class GeoCache {
  private countries = new Map<string, string>();
  private cities = new Map<string, string>();

  constructor(private readonly storage: KeyValueStorage) {}

  /** Number of cached coordinate cells */
  get size(): number {
    return this.countries.size;
  }

  /**
   * Read one persisted map, starting empty for it on any failure
   */
  private async loadMap(
    storageKey: string,
    report: CacheLoadReport
  ): Promise<Map<string, string>> {
    try {
      const read = await this.storage.get(storageKey);

      if (read.status === "missing") return new Map();
      if (read.status === "type-mismatch") {
        throw new CorruptedCacheError(storageKey, read.reason);
      }
      return decodeStringMap(storageKey, read.value);
    } catch (error) {
      report.corruptedMaps.push(storageKey);
      console.warn(
        `[GeoCache] Discarding ${storageKey}:`,
        error instanceof Error ? error.message : error
      );
      return new Map();
    }
  }

  /**
   * Load both maps from storage, replacing the in-memory state
   */
  async load(): Promise<CacheLoadReport> {
    const report: CacheLoadReport = {
      countryEntries: 0,
      cityEntries: 0,
      corruptedMaps: [],
    };

    this.countries = await this.loadMap(CACHE.COUNTRY_KEY, report);
    this.cities = await this.loadMap(CACHE.CITY_KEY, report);

    report.countryEntries = this.countries.size;
    report.cityEntries = this.cities.size;

    console.log(
      `[GeoCache] Loaded ${report.countryEntries} countries, ${report.cityEntries} cities`
    );
    return report;
  }

  /**
   * Repair entries written by older versions
   *
   * - Country values are passed through normalizeCountryName
   *   ("Deutschland" -> "Germany")
   * - City entries without a country entry are removed
   * - Country entries without a city entry are removed (the cell is geocoded again)
   */
  cleanup(): CacheCleanupReport {
    let normalized = 0;
    for (const [key, country] of this.countries) {
      const canonical = normalizeCountryName(country);
      if (canonical !== country) {
        this.countries.set(key, canonical);
        normalized++;
      }
    }

    let orphansRemoved = 0;
    for (const key of [...this.cities.keys()]) {
      if (!this.countries.has(key)) {
        this.cities.delete(key);
        orphansRemoved++;
      }
    }
    for (const key of [...this.countries.keys()]) {
      if (!this.cities.has(key)) {
        this.countries.delete(key);
        orphansRemoved++;
      }
    }

    if (normalized > 0 || orphansRemoved > 0) {
      console.warn(
        `[GeoCache] Cleanup normalized ${normalized} countries, removed ${orphansRemoved} incomplete entries`
      );
    }

    return { normalized, orphansRemoved };
  }

  has(key: string): boolean {
    return this.countries.has(key);
  }

  /**
   * Look up a quantized key
   *
   * @returns Country and city (city "Unknown" if missing), or undefined on a miss
   */
  get(key: string): CachedPlace | undefined {
    const country = this.countries.get(key);
    if (country === undefined) return undefined;

    return {
      country,
      city: this.cities.get(key) ?? GEOCODER.UNKNOWN_LABEL,
    };
  }

  /**
   * Record a freshly geocoded cell (in memory only until save())
   */
  set(key: string, country: string, city: string): void {
    this.countries.set(key, normalizeCountryName(country));
    this.cities.set(key, city);
  }

  /**
   * Overwrite both persisted maps with the in-memory state in one write
   */
  async save(): Promise<void> {
    await this.storage.setMany({
      [CACHE.COUNTRY_KEY]: Object.fromEntries(this.countries),
      [CACHE.CITY_KEY]: Object.fromEntries(this.cities),
    });
    console.log(`[GeoCache] Saved ${this.countries.size} entries`);
  }
}

// ============================================
// Storage Selection
// ============================================

/**
 * Build the storage backend named by CACHE_DRIVER
 */
export async function createCacheStorage(
  driver: (typeof CACHE)["DRIVER"] = CACHE.DRIVER
): Promise<KeyValueStorage> {
  switch (driver) {
    case "memory":
      return new MemoryStorage();
    case "postgres": {
      const pool = getPool();
      const storage = new PgKeyValueStorage({
        query: (text, values) => pool.query(text, values),
      });
      await storage.ensureSchema();
      return storage;
    }
    case "file":
      return new JsonFileStorage(CACHE.FILE_PATH);
  }
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Persisted cache map failed to decode or had the wrong shape
 */
export class CorruptedCacheError extends Error {
  public storageKey: string;

  constructor(storageKey: string, reason: string) {
    super(`Corrupted cache map ${storageKey}: ${reason}`);
    this.name = "CorruptedCacheError";
    this.storageKey = storageKey;
  }
}
