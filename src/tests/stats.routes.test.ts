/**
 * Stats & Geocode API Tests
 * Tests the main user story: upload routes → get distance per country and city
 *
 * User Story: "As a runner, I want to see how far I have run in each
 * country and city, without my routes leaving the machine."
 */

import { describe, it, expect, vi } from "vitest";
import request from "supertest";
import { createApp } from "../app.js";

// ============================================
// Test Setup
// ============================================

// CACHE_DRIVER=memory and GEOCODE_PROVIDER=local come from vitest.config.ts
const app = createApp();

const berlinRoute = {
  id: "berlin",
  coordinates: [
    [52.52, 13.405],
    [52.52063, 13.405],
  ],
};

const createSampleGpx = (points: { lat: number; lon: number }[]) => {
  const trackpoints = points
    .map((p) => `<trkpt lat="${p.lat}" lon="${p.lon}"></trkpt>`)
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="Test">
  <trk>
    <name>Test Run</name>
    <trkseg>
      ${trackpoints}
    </trkseg>
  </trk>
</gpx>`;
};

// ~11 m apart along a meridian in Berlin
const berlinTrack = [0, 1, 2].map((i) => ({ lat: 52.52 + i * 0.0001, lon: 13.405 }));

// ============================================
// Geocode
// ============================================

describe("GET /api/v1/geocode/reverse", () => {
  it("resolves a coordinate offline", async () => {
    const response = await request(app)
      .get("/api/v1/geocode/reverse?lat=52.52&lon=13.405")
      .expect(200);

    expect(response.body).toEqual({
      success: true,
      result: { country: "Germany", city: "Berlin", confidence: 0.95 },
      matches: ["Germany"],
    });
  });

  it("returns 400 for missing or out-of-range coordinates", async () => {
    const missing = await request(app).get("/api/v1/geocode/reverse?lat=abc").expect(400);
    expect(missing.body.code).toBe("INVALID_COORDINATES");

    const outOfRange = await request(app)
      .get("/api/v1/geocode/reverse?lat=91&lon=0")
      .expect(400);
    expect(outOfRange.body.success).toBe(false);
  });
});

// ============================================
// Stats
// ============================================

describe("POST /api/v1/stats", () => {
  it("returns 400 when routes are missing", async () => {
    const response = await request(app).post("/api/v1/stats").send({}).expect(400);

    expect(response.body.success).toBe(false);
    expect(response.body.code).toBe("ROUTES_REQUIRED");
  });

  it("returns 400 for a malformed route", async () => {
    const response = await request(app)
      .post("/api/v1/stats")
      .send({ routes: [{ id: "x", coordinates: [["a", "b"]] }] })
      .expect(400);

    expect(response.body.code).toBe("ROUTE_INVALID");
    expect(response.body.error).toBe("Route x: coordinate 0 must be { lat, lon } or [lat, lon]");
  });

  it("returns 400 for an unknown attribution mode", async () => {
    const response = await request(app)
      .post("/api/v1/stats")
      .send({ routes: [berlinRoute], attribution: "weighted" })
      .expect(400);

    expect(response.body.code).toBe("VALIDATION_ERROR");
  });

  it("returns the final snapshot and a summary", async () => {
    const response = await request(app)
      .post("/api/v1/stats")
      .send({ routes: [berlinRoute] })
      .expect(200);

    const { stats, summary } = response.body;
    expect(stats.done).toBe(true);
    expect(stats.total).toBe(1);
    expect(stats.countries).toEqual([{ label: "Germany", km: stats.totalKm }]);
    expect(stats.cities).toEqual([{ label: "Berlin", km: stats.totalKm }]);
    expect(summary).toBe(
      "You ran 0km in total.\nYour top countries were:\n1) Germany 0km\nYour top cities were:\n1) Berlin 0km"
    );
  });

  it("splits routes at GPS gaps when asked", async () => {
    const response = await request(app)
      .post("/api/v1/stats")
      .send({
        segment: true,
        maxGapMeters: 20,
        routes: [
          {
            id: "paused",
            coordinates: [
              [52.52, 13.405],
              [52.52005, 13.405],
              [52.6, 13.405],
              [52.60005, 13.405],
            ],
          },
        ],
      })
      .expect(200);

    // Two ~5.6 m segments; the ~9 km gap is not distance
    expect(response.body.stats.total).toBe(2);
    expect(response.body.stats.totalKm).toBeCloseTo(0.0111, 3);
  });
});

describe("POST /api/v1/stats/stream", () => {
  it("streams snapshots as NDJSON ending with done", async () => {
    const response = await request(app)
      .post("/api/v1/stats/stream")
      .send({ routes: [berlinRoute] })
      .buffer(true)
      .expect(200);

    expect(response.headers["content-type"]).toContain("application/x-ndjson");

    const lines = response.text.trim().split("\n");
    const last = JSON.parse(lines[lines.length - 1]);
    expect(last.done).toBe(true);
    expect(last.countries[0].label).toBe("Germany");
  });

  it("validates the body before streaming", async () => {
    const response = await request(app).post("/api/v1/stats/stream").send([]).expect(400);
    expect(response.body.code).toBe("ROUTES_REQUIRED");
  });
});

describe("POST /api/v1/stats/gpx", () => {
  it("returns 400 when no file is provided", async () => {
    const response = await request(app).post("/api/v1/stats/gpx").expect(400);

    expect(response.body.success).toBe(false);
    expect(response.body.code).toBe("GPX_FILE_REQUIRED");
  });

  it("returns 400 for invalid file type", async () => {
    const response = await request(app)
      .post("/api/v1/stats/gpx")
      .attach("gpx", Buffer.from("not a gpx file"), "test.txt")
      .expect(400);

    expect(response.body.code).toBe("GPX_INVALID_FORMAT");
  });

  it("returns 400 for malformed GPX", async () => {
    const response = await request(app)
      .post("/api/v1/stats/gpx")
      .attach("gpx", Buffer.from("<invalid>xml</invalid>"), "broken.gpx")
      .expect(400);

    expect(response.body.code).toBe("GPX_PARSE_ERROR");
    expect(response.body.error).toMatch(/^broken\.gpx: /);
  });

  it("aggregates uploaded tracks", async () => {
    const response = await request(app)
      .post("/api/v1/stats/gpx")
      .attach("gpx", Buffer.from(createSampleGpx(berlinTrack)), "berlin.gpx")
      .expect(200);

    expect(response.body.stats.total).toBe(1);
    expect(response.body.stats.countries[0].label).toBe("Germany");
    expect(response.body.stats.cities[0].label).toBe("Berlin");
  });
});

describe("Background runs", () => {
  it("returns 404 before any run has published", async () => {
    const response = await request(app).get("/api/v1/stats/latest").expect(404);
    expect(response.body.code).toBe("STATS_NOT_AVAILABLE");
  });

  it("starts a run and serves its final snapshot", async () => {
    const started = await request(app)
      .post("/api/v1/stats/runs")
      .send({ routes: [berlinRoute] })
      .expect(202);

    expect(started.body.success).toBe(true);
    expect(typeof started.body.generation).toBe("number");

    const latest = await vi.waitFor(async () => {
      const response = await request(app).get("/api/v1/stats/latest");
      expect(response.status).toBe(200);
      expect(response.body.stats.done).toBe(true);
      return response;
    });

    expect(latest.body.stats.generation).toBe(started.body.generation);
    expect(latest.body.summary).toContain("1) Germany 0km");
  });
});

describe("Unknown routes", () => {
  it("returns 404 JSON", async () => {
    const response = await request(app).get("/api/v1/nope").expect(404);
    expect(response.body.code).toBe("NOT_FOUND");
  });
});
