/**
 * Local Geocoder
 * Fast offline geocoding against the compiled-in country table
 *
 * Resolution:
 * 1. First country (table order) whose bounding box contains the point
 * 2. Nearest major city inside that country
 * 3. City label and confidence chosen by distance tier:
 *
 * | Distance to nearest city | City label          | Confidence |
 * |--------------------------|---------------------|------------|
 * | <= 10 km                 | city name           | 0.95       |
 * | <= 25 km                 | city name           | 0.80       |
 * | <= 50 km                 | "Rural {country}"   | 0.70       |
 * | > 50 km                  | "Other {country}"   | 0.60       |
 *
 * Points outside every box resolve to Unknown/Unknown with confidence 0.
 * No network access; the result is a pure function of (lat, lon) and the table.
 */

import { GEOCODER } from "../config/constants.js";
import { normalizeCountryName } from "../utils/normalize-country-name.js";
import { findCountryAt, getCountries } from "./geo-database.service.js";
import { distance } from "./geo.service.js";
import type {
  CityMarker,
  CountryRegion,
  GeocodeOutcome,
  GeocodeProvider,
  GeocodeResult,
} from "../types/geo.types.js";

interface CityDistance {
  city: string;
  /** Kilometers; Infinity when the country lists no cities */
  distanceKm: number;
}

/**
 * Find the closest city marker to a point
 */
export function findClosestCity(
  lat: number,
  lon: number,
  cities: readonly CityMarker[]
): CityDistance {
  let closest: CityDistance = {
    city: GEOCODER.UNKNOWN_LABEL,
    distanceKm: Infinity,
  };

  for (const city of cities) {
    const d = distance({ lat, lon }, city);
    if (d < closest.distanceKm) {
      closest = { city: city.name, distanceKm: d };
    }
  }

  return closest;
}

export class LocalGeocoder implements GeocodeProvider {
  readonly name = "local";
  readonly maxConcurrent = 1;

  constructor(
    private readonly table: readonly CountryRegion[] = getCountries()
  ) {}

  /**
   * Resolve a coordinate to country, city and confidence
   *
   * @example
   * new LocalGeocoder().geocode(52.52, 13.405);
   * // { country: "Germany", city: "Berlin", confidence: 0.95 }
   */
  geocode(lat: number, lon: number): GeocodeResult {
    const country = findCountryAt(lat, lon, this.table);

    if (!country) {
      return {
        country: GEOCODER.UNKNOWN_LABEL,
        city: GEOCODER.UNKNOWN_LABEL,
        confidence: 0,
      };
    }

    const countryName = normalizeCountryName(country.name);
    const closest = findClosestCity(lat, lon, country.cities);
    const tiers = GEOCODER.CITY_TIERS;

    if (closest.distanceKm <= tiers.NEAR.maxKm) {
      return {
        country: countryName,
        city: closest.city,
        confidence: tiers.NEAR.confidence,
      };
    }
    if (closest.distanceKm <= tiers.CLOSE.maxKm) {
      return {
        country: countryName,
        city: closest.city,
        confidence: tiers.CLOSE.confidence,
      };
    }
    if (closest.distanceKm <= tiers.REGIONAL.maxKm) {
      return {
        country: countryName,
        city: `Rural ${countryName}`,
        confidence: tiers.REGIONAL.confidence,
      };
    }
    return {
      country: countryName,
      city: `Other ${countryName}`,
      confidence: tiers.REMOTE.confidence,
    };
  }

  /**
   * Provider form of geocode(); the offline table never fails
   */
  async lookup(lat: number, lon: number): Promise<GeocodeOutcome> {
    return { ok: true, ...this.geocode(lat, lon) };
  }
}
