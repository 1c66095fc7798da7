/**
 * Local Geocoder Tests
 * Offline country/city resolution against the bundled table
 */

import { describe, it, expect } from "vitest";
import {
  findCountriesAt,
  findCountryAt,
  getCountries,
  GeoDatabaseError,
  parseGeoDatabase,
} from "../services/geo-database.service.js";
import {
  findClosestCity,
  LocalGeocoder,
} from "../services/local-geocoder.service.js";

const geocoder = new LocalGeocoder();

describe("Geo database", () => {
  it("loads the bundled table in declaration order", () => {
    const countries = getCountries();
    expect(countries).toHaveLength(36);
    expect(countries[0].name).toBe("United States");
    expect(countries[3].name).toBe("Germany");
    expect(Object.isFrozen(countries)).toBe(true);
  });

  it("lists every box containing a point, first match wins", () => {
    // Zurich sits inside the Germany, France and Switzerland boxes
    expect(findCountriesAt(47.3769, 8.5417).map((c) => c.name)).toEqual([
      "Germany",
      "France",
      "Switzerland",
    ]);
    expect(findCountryAt(47.3769, 8.5417)?.name).toBe("Germany");
  });

  it("treats box edges as inside", () => {
    const table = parseGeoDatabase({
      countries: [
        { name: "Edgeland", code: "EL", bounds: { minLat: 0, maxLat: 1, minLon: 0, maxLon: 1 } },
      ],
    });
    expect(findCountryAt(1, 1, table)?.name).toBe("Edgeland");
    expect(findCountryAt(1.01, 1, table)).toBeUndefined();
  });

  it("rejects malformed tables", () => {
    expect(() => parseGeoDatabase({})).toThrow(GeoDatabaseError);
    expect(() =>
      parseGeoDatabase({
        countries: [
          { name: "Flipped", code: "FL", bounds: { minLat: 5, maxLat: 1, minLon: 0, maxLon: 1 } },
        ],
      })
    ).toThrow("Country Flipped has inverted bounds");
  });
});

describe("LocalGeocoder", () => {
  it("resolves a city center with high confidence", () => {
    expect(geocoder.geocode(52.52, 13.405)).toEqual({
      country: "Germany",
      city: "Berlin",
      confidence: 0.95,
    });
    expect(geocoder.geocode(48.8566, 2.3522).city).toBe("Paris");
    expect(geocoder.geocode(51.5074, -0.1278).country).toBe("United Kingdom");
    expect(geocoder.geocode(52.3676, 4.9041).country).toBe("Netherlands");
    expect(geocoder.geocode(-33.8688, 151.2093).country).toBe("Australia");
  });

  it("applies the distance tiers", () => {
    // ~15 km north of Berlin
    expect(geocoder.geocode(52.655, 13.405)).toEqual({
      country: "Germany",
      city: "Berlin",
      confidence: 0.8,
    });
    // ~35 km north of Berlin
    expect(geocoder.geocode(52.835, 13.405)).toEqual({
      country: "Germany",
      city: "Rural Germany",
      confidence: 0.7,
    });
    // ~121 km from Berlin, ~139 km from Hamburg
    expect(geocoder.geocode(53.2, 12.0)).toEqual({
      country: "Germany",
      city: "Other Germany",
      confidence: 0.6,
    });
  });

  it("returns Unknown outside every box", () => {
    expect(geocoder.geocode(0, 0)).toEqual({
      country: "Unknown",
      city: "Unknown",
      confidence: 0,
    });
  });

  it("uses the Other label for a country without cities", () => {
    const table = parseGeoDatabase({
      countries: [
        { name: "Emptyland", code: "EM", bounds: { minLat: 0, maxLat: 10, minLon: 0, maxLon: 10 } },
      ],
    });
    expect(new LocalGeocoder(table).geocode(5, 5)).toEqual({
      country: "Emptyland",
      city: "Other Emptyland",
      confidence: 0.6,
    });
  });

  it("is deterministic", () => {
    expect(geocoder.geocode(50.1109, 8.6821)).toEqual(geocoder.geocode(50.1109, 8.6821));
  });

  it("wraps results as successful outcomes in lookup()", async () => {
    await expect(geocoder.lookup(52.52, 13.405)).resolves.toEqual({
      ok: true,
      country: "Germany",
      city: "Berlin",
      confidence: 0.95,
    });
  });
});

describe("findClosestCity", () => {
  it("returns Unknown at infinite distance for an empty list", () => {
    expect(findClosestCity(0, 0, [])).toEqual({ city: "Unknown", distanceKm: Infinity });
  });

  it("picks the nearest marker", () => {
    const cities = [
      { name: "Far", lat: 10, lon: 10 },
      { name: "Near", lat: 1, lon: 1 },
    ];
    expect(findClosestCity(0, 0, cities).city).toBe("Near");
  });
});
