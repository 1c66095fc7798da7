/**
 * Geo Types
 * Coordinates, the offline country table and geocoding results
 */

/** Single coordinate in degrees */
export interface Coordinate {
  lat: number;
  lon: number;
}

/** Axis-aligned lat/lon rectangle approximating a country's extent */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Named city marker inside a country */
export interface CityMarker extends Coordinate {
  name: string;
}

/** One entry of the compiled-in geocode table */
export interface CountryRegion {
  name: string;
  code: string;
  bounds: BoundingBox;
  cities: readonly CityMarker[];
}

/** Result of resolving a coordinate against the offline table */
export interface GeocodeResult {
  country: string;
  city: string;
  /** 0.0 to 1.0 - how close the point is to a known city marker */
  confidence: number;
}

/** Why a fallback lookup produced nothing */
export type GeocodeFailureReason = "timeout" | "no-result" | "transport";

export type GeocodeOutcome =
  | ({ ok: true } & GeocodeResult)
  | { ok: false; reason: GeocodeFailureReason; message: string };

/**
 * Anything that can turn a coordinate into a country/city pair.
 * The offline table is the default; a network service is the alternate.
 */
export interface GeocodeProvider {
  readonly name: string;
  /** Lookups allowed in flight at once */
  readonly maxConcurrent: number;
  lookup(lat: number, lon: number): Promise<GeocodeOutcome>;
}
