/**
 * Route Segmenter Tests
 * Splitting GPS traces at gaps
 */

import { describe, it, expect } from "vitest";
import { segment, splitRoute } from "../services/route-segmenter.service.js";
import { distance } from "../services/geo.service.js";
import { Route } from "../services/route.service.js";
import type { Coordinate } from "../types/geo.types.js";

// 0.0001° of latitude is ~11.1 m
const step = (i: number): Coordinate => ({ lat: 52.52 + i * 0.0001, lon: 13.405 });

describe("segment", () => {
  it("returns no segments for empty input", () => {
    expect(segment([], 20)).toEqual([]);
  });

  it("keeps a continuous trace as one segment", () => {
    const points = [step(0), step(1), step(2), step(3)];
    expect(segment(points, 20)).toEqual([points]);
  });

  it("splits at a gap and drops single-point segments", () => {
    const points = [step(0), step(1), step(2), step(100), step(200), step(201)];
    const result = segment(points, 20);

    expect(result).toEqual([
      [step(0), step(1), step(2)],
      [step(200), step(201)],
    ]);
  });

  it("returns nothing when every point is isolated", () => {
    // Middle point ~500 m from both neighbours
    const points = [
      { lat: 52.52, lon: 13.405 },
      { lat: 52.5245, lon: 13.405 },
      { lat: 52.529, lon: 13.405 },
    ];
    expect(segment(points, 20)).toEqual([]);
  });

  it("never keeps an inter-point gap above the threshold", () => {
    const points = [step(0), step(1), step(5), step(6), step(7), step(40), step(41)];
    for (const s of segment(points, 20)) {
      expect(s.length).toBeGreaterThanOrEqual(2);
      for (let i = 1; i < s.length; i++) {
        expect(distance(s[i - 1], s[i]) * 1000).toBeLessThanOrEqual(20);
      }
    }
  });
});

describe("splitRoute", () => {
  it("numbers segments from 1 and keeps route fields", () => {
    const route = new Route({
      id: "morning",
      coordinates: [step(0), step(1), step(100), step(101)],
      timestamp: new Date("2026-03-14T07:00:00Z"),
      category: "running",
      durationSeconds: 600,
    });

    const parts = splitRoute(route, 20);

    expect(parts.map((p) => p.id)).toEqual(["morning#1", "morning#2"]);
    expect(parts[1].coordinates).toEqual([step(100), step(101)]);
    expect(parts[0].category).toBe("running");
    expect(parts[0].timestamp).toEqual(new Date("2026-03-14T07:00:00Z"));
  });

  it("leaves no usable distance when every point is isolated", () => {
    const route = new Route({
      id: "jumpy",
      coordinates: [
        { lat: 52.52, lon: 13.405 },
        { lat: 52.5245, lon: 13.405 },
        { lat: 52.529, lon: 13.405 },
      ],
      timestamp: new Date(0),
      category: "running",
      durationSeconds: 0,
    });

    const parts = splitRoute(route, 20);
    expect(parts).toEqual([]);
    expect(parts.reduce((sum, p) => sum + p.distanceKm, 0)).toBe(0);
  });
});
