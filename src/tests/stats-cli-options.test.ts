/**
 * compute-stats Option Parsing Tests
 */

import { describe, it, expect } from "vitest";
import {
  CliOptionError,
  parseStatsCliArgs,
} from "../scripts/stats-cli-options.js";

describe("parseStatsCliArgs", () => {
  it("uses defaults when only inputs are given", () => {
    expect(parseStatsCliArgs(["routes.json", "runs"])).toEqual({
      inputs: ["routes.json", "runs"],
      segment: undefined,
      maxGapMeters: undefined,
      attribution: undefined,
      top: 3,
    });
  });

  it("reads every flag", () => {
    const options = parseStatsCliArgs([
      "a.gpx",
      "--segment",
      "--max-gap=30",
      "--attribution=spacing",
      "--top=5",
    ]);

    expect(options).toEqual({
      inputs: ["a.gpx"],
      segment: true,
      maxGapMeters: 30,
      attribution: "spacing",
      top: 5,
    });
  });

  it("lets --no-segment win over --segment", () => {
    expect(parseStatsCliArgs(["a.gpx", "--segment", "--no-segment"]).segment).toBe(false);
  });

  it.each(["abc", "0", "-5", "", "Infinity"])("rejects --max-gap=%s", (value) => {
    expect(() => parseStatsCliArgs(["a.gpx", `--max-gap=${value}`])).toThrow(
      new CliOptionError(`--max-gap must be a positive number of meters, got "${value}"`)
    );
  });

  it("rejects an unknown attribution mode", () => {
    expect(() => parseStatsCliArgs(["a.gpx", "--attribution=weighted"])).toThrow(
      CliOptionError
    );
  });
});
