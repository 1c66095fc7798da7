/**
 * Route Sampler Tests
 * Representative points and distance shares
 */

import { describe, it, expect } from "vitest";
import { attributeDistance, sample } from "../services/route-sampler.service.js";
import type { Coordinate } from "../types/geo.types.js";

const line = (count: number): Coordinate[] =>
  Array.from({ length: count }, (_, i) => ({ lat: 52.5 + i * 0.001, lon: 13.4 }));

describe("sample", () => {
  it("returns short routes unchanged", () => {
    const points = line(5);
    expect(sample(points, 10)).toEqual(points);
  });

  it("strides long routes and ends on the last point", () => {
    const points = line(25);
    const result = sample(points, 10);

    // stride = ceil(25 / 10) = 3 -> indices 0, 3, ..., 24
    expect(result).toEqual([0, 3, 6, 9, 12, 15, 18, 21, 24].map((i) => points[i]));
  });

  it("appends the last point when the stride misses it", () => {
    const points = line(12);
    const result = sample(points, 10);

    // stride 2 -> indices 0..10 (6 points), then index 11
    expect(result).toEqual([0, 2, 4, 6, 8, 10, 11].map((i) => points[i]));
  });

  it("replaces the last sample when the budget is already full", () => {
    const points = line(11);
    const result = sample(points, 5);

    // stride 3 -> indices 0, 3, 6, 9 (4 points); 10 appended
    expect(result).toEqual([0, 3, 6, 9, 10].map((i) => points[i]));

    const full = sample(line(10), 5);
    // stride 2 -> indices 0, 2, 4, 6, 8 fills the budget; 9 replaces 8
    expect(full).toEqual([0, 2, 4, 6, 9].map((i) => line(10)[i]));
  });

  it("does not append a last point within tolerance of the last sample", () => {
    const points = [...line(12).slice(0, 11), { lat: 52.51 + 0.00005, lon: 13.4 }];
    // index 10 is 52.510; the final point is within 0.0001°
    expect(sample(points, 10)).toHaveLength(6);
  });

  it("never exceeds maxSamples", () => {
    for (const count of [2, 9, 10, 11, 19, 20, 21, 99, 1000]) {
      expect(sample(line(count), 10).length).toBeLessThanOrEqual(10);
    }
  });
});

describe("attributeDistance", () => {
  it("splits distance equally by default", () => {
    const shares = attributeDistance(line(4), 10, "equal");
    expect(shares.map((s) => s.km)).toEqual([2.5, 2.5, 2.5, 2.5]);
  });

  it("returns nothing for no samples", () => {
    expect(attributeDistance([], 10, "spacing")).toEqual([]);
  });

  it("weights by neighbour spacing and conserves the total", () => {
    // Gaps of 1 and 3 units along one meridian
    const samples = [
      { lat: 10.0, lon: 0 },
      { lat: 10.01, lon: 0 },
      { lat: 10.04, lon: 0 },
    ];
    const shares = attributeDistance(samples, 8, "spacing");

    // weights 0.5, 2, 1.5 (in gap units) -> 1, 4, 3 km
    expect(shares[0].km).toBeCloseTo(1, 6);
    expect(shares[1].km).toBeCloseTo(4, 6);
    expect(shares[2].km).toBeCloseTo(3, 6);
    expect(shares.reduce((sum, s) => sum + s.km, 0)).toBeCloseTo(8, 9);
  });

  it("falls back to equal shares when all samples coincide", () => {
    const spot = { lat: 1, lon: 1 };
    const shares = attributeDistance([spot, spot], 3, "spacing");
    expect(shares.map((s) => s.km)).toEqual([1.5, 1.5]);
  });
});
