/**
 * Geo Service Tests
 * Haversine distance, route distance, validation and cache keys
 */

import { describe, it, expect } from "vitest";
import {
  assertValidCoordinate,
  distance,
  InvalidCoordinateError,
  isValidCoordinate,
  isValidDistance,
  quantizeCoordinate,
  routeDistance,
} from "../services/geo.service.js";

const BERLIN = { lat: 52.52, lon: 13.405 };
const MUNICH = { lat: 48.1351, lon: 11.582 };

describe("distance", () => {
  it("is zero for identical points", () => {
    expect(distance(BERLIN, BERLIN)).toBe(0);
  });

  it("is symmetric", () => {
    expect(distance(BERLIN, MUNICH)).toBeCloseTo(distance(MUNICH, BERLIN), 9);
  });

  it("measures Berlin to Munich as ~504 km", () => {
    expect(distance(BERLIN, MUNICH)).toBeCloseTo(504.415, 2);
  });

  it("measures one degree of longitude at the equator as ~111.19 km", () => {
    expect(distance({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(111.195, 2);
  });
});

describe("routeDistance", () => {
  it("returns 0 for fewer than 2 points", () => {
    expect(routeDistance([])).toBe(0);
    expect(routeDistance([BERLIN])).toBe(0);
  });

  it("sums consecutive legs", () => {
    const leg = distance(BERLIN, MUNICH);
    expect(routeDistance([BERLIN, MUNICH, BERLIN])).toBeCloseTo(leg * 2, 9);
  });
});

describe("validation", () => {
  it("accepts the inclusive range boundaries", () => {
    expect(isValidCoordinate({ lat: 90, lon: 180 })).toBe(true);
    expect(isValidCoordinate({ lat: -90, lon: -180 })).toBe(true);
  });

  it("rejects out-of-range and non-finite values", () => {
    expect(isValidCoordinate({ lat: 90.0001, lon: 0 })).toBe(false);
    expect(isValidCoordinate({ lat: 0, lon: -180.5 })).toBe(false);
    expect(isValidCoordinate({ lat: NaN, lon: 0 })).toBe(false);
    expect(isValidCoordinate({ lat: 0, lon: Infinity })).toBe(false);
  });

  it("throws InvalidCoordinateError from assertValidCoordinate", () => {
    expect(() => assertValidCoordinate({ lat: 100, lon: 0 })).toThrow(
      InvalidCoordinateError
    );
    expect(() => assertValidCoordinate(BERLIN)).not.toThrow();
  });

  it("only accepts finite non-negative distances", () => {
    expect(isValidDistance(0)).toBe(true);
    expect(isValidDistance(12.5)).toBe(true);
    expect(isValidDistance(-1)).toBe(false);
    expect(isValidDistance(NaN)).toBe(false);
    expect(isValidDistance(Infinity)).toBe(false);
  });
});

describe("quantizeCoordinate", () => {
  it("rounds to 3 decimals", () => {
    expect(quantizeCoordinate(52.52003, 13.40497)).toBe("52.520,13.405");
    expect(quantizeCoordinate(52.52063, 13.405)).toBe("52.521,13.405");
  });

  it("keeps the sign of negative coordinates", () => {
    expect(quantizeCoordinate(-33.8688, 151.2093)).toBe("-33.869,151.209");
  });
});
