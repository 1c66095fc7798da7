/**
 * Nominatim Geocoder Tests
 * Response mapping and failure classification (HTTP client stubbed)
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosError } from "axios";
import {
  classifyFailure,
  NominatimGeocoder,
} from "../services/nominatim-geocoder.service.js";

const geocoder = new NominatimGeocoder({
  baseUrl: "http://nominatim.test",
  timeoutMs: 50,
  maxConcurrent: 4,
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("NominatimGeocoder", () => {
  it("exposes its concurrency bound", () => {
    expect(geocoder.name).toBe("nominatim");
    expect(geocoder.maxConcurrent).toBe(4);
  });

  it("maps a city address and normalizes the country", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue({
      data: { address: { city: "Berlin", country: "Deutschland" } },
    });

    await expect(geocoder.lookup(52.52, 13.405)).resolves.toEqual({
      ok: true,
      country: "Germany",
      city: "Berlin",
      confidence: 0.9,
    });
    expect(get).toHaveBeenCalledWith(
      "http://nominatim.test/reverse",
      expect.objectContaining({
        params: expect.objectContaining({ lat: 52.52, lon: 13.405, format: "json" }),
        timeout: 50,
      })
    );
  });

  it("falls back from city to town and village", async () => {
    vi.spyOn(axios, "get").mockResolvedValue({
      data: { address: { village: "Kleindorf", country: "Germany" } },
    });

    const outcome = await geocoder.lookup(50, 10);
    expect(outcome).toMatchObject({ ok: true, city: "Kleindorf" });
  });

  it("labels a country-only answer as Other", async () => {
    vi.spyOn(axios, "get").mockResolvedValue({
      data: { address: { country: "France" } },
    });

    await expect(geocoder.lookup(46, 2)).resolves.toEqual({
      ok: true,
      country: "France",
      city: "Other France",
      confidence: 0.6,
    });
  });

  it("reports no-result when the service finds nothing", async () => {
    vi.spyOn(axios, "get").mockResolvedValue({
      data: { error: "Unable to geocode" },
    });

    await expect(geocoder.lookup(0, 0)).resolves.toEqual({
      ok: false,
      reason: "no-result",
      message: "Unable to geocode",
    });
  });

  it("reports a client timeout", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(
      new AxiosError("timeout of 50ms exceeded", "ECONNABORTED")
    );

    await expect(geocoder.lookup(52.52, 13.405)).resolves.toEqual({
      ok: false,
      reason: "timeout",
      message: "timeout of 50ms exceeded",
    });
  });
});

describe("classifyFailure", () => {
  it("treats network errors as transport failures", () => {
    expect(classifyFailure(new AxiosError("Network Error", "ERR_NETWORK"))).toEqual({
      ok: false,
      reason: "transport",
      message: "Network Error",
    });
  });

  it("handles errors that did not come from the HTTP client", () => {
    expect(classifyFailure(new Error("boom"))).toEqual({
      ok: false,
      reason: "transport",
      message: "boom",
    });
    expect(classifyFailure("plain")).toEqual({
      ok: false,
      reason: "transport",
      message: "plain",
    });
  });
});
