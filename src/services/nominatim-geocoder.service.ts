/**
 * Nominatim Geocoder
 * Network reverse geocoding fallback (OpenStreetMap Nominatim)
 *
 * Alternate GeocodeProvider for the aggregator. The offline LocalGeocoder
 * is the default; this provider exists for coordinates outside the
 * compiled-in table and is selected with GEOCODE_PROVIDER=nominatim.
 *
 * Failures are returned, not thrown:
 * - timeout:   client timeout (ECONNABORTED / ETIMEDOUT)
 * - no-result: response had no address or no country
 * - transport: any other HTTP or network error
 *
 * Usage policy: https://operations.osmfoundation.org/policies/nominatim/
 */

import axios from "axios";
import { NOMINATIM } from "../config/constants.js";
import { normalizeCountryName } from "../utils/normalize-country-name.js";
import type {
  GeocodeOutcome,
  GeocodeProvider,
} from "../types/geo.types.js";

interface NominatimReverseResponse {
  error?: string;
  address?: {
    city?: string;
    town?: string;
    village?: string;
    municipality?: string;
    country?: string;
    country_code?: string;
  };
}

/** Confidence reported for a city the network service named directly */
const NETWORK_CITY_CONFIDENCE = 0.9;
/** Confidence when the service only knew the country */
const NETWORK_COUNTRY_CONFIDENCE = 0.6;

export interface NominatimOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxConcurrent?: number;
}

export class NominatimGeocoder implements GeocodeProvider {
  readonly name = "nominatim";
  readonly maxConcurrent: number;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: NominatimOptions = {}) {
    this.baseUrl = options.baseUrl ?? NOMINATIM.BASE_URL;
    this.timeoutMs = options.timeoutMs ?? NOMINATIM.TIMEOUT_MS;
    this.maxConcurrent = options.maxConcurrent ?? NOMINATIM.MAX_CONCURRENT;
  }

  async lookup(lat: number, lon: number): Promise<GeocodeOutcome> {
    try {
      const response = await axios.get<NominatimReverseResponse>(
        `${this.baseUrl}/reverse`,
        {
          params: {
            lat,
            lon,
            format: "json",
            addressdetails: 1,
            zoom: 10,
          },
          headers: {
            "User-Agent": NOMINATIM.USER_AGENT,
            Accept: "application/json",
            "Accept-Language": "en",
          },
          timeout: this.timeoutMs,
        }
      );

      const address = response.data?.address;
      if (!address?.country) {
        return {
          ok: false,
          reason: "no-result",
          message: response.data?.error ?? `No address for ${lat},${lon}`,
        };
      }

      const country = normalizeCountryName(address.country);

      // Prioritize city > town > village > municipality
      const city =
        address.city || address.town || address.village || address.municipality;

      return city
        ? { ok: true, country, city, confidence: NETWORK_CITY_CONFIDENCE }
        : {
            ok: true,
            country,
            city: `Other ${country}`,
            confidence: NETWORK_COUNTRY_CONFIDENCE,
          };
    } catch (error) {
      return classifyFailure(error);
    }
  }
}

/**
 * Map a thrown request error onto a failure outcome
 */
export function classifyFailure(error: unknown): GeocodeOutcome {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return { ok: false, reason: "timeout", message: error.message };
    }
    const status = error.response?.status;
    return {
      ok: false,
      reason: "transport",
      message: status ? `Nominatim returned ${status}` : error.message,
    };
  }

  return {
    ok: false,
    reason: "transport",
    message: error instanceof Error ? error.message : String(error),
  };
}
