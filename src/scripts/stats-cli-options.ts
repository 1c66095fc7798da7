/**
 * Command-line options of compute-stats
 */

import type { AttributionMode } from "../types/stats.types.js";

export interface StatsCliOptions {
  inputs: string[];
  segment: boolean | undefined;
  maxGapMeters: number | undefined;
  attribution: AttributionMode | undefined;
  top: number;
}

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

export function parseStatsCliArgs(args: string[]): StatsCliOptions {
  const attribution = readFlag(args, "attribution");
  if (attribution !== undefined && attribution !== "equal" && attribution !== "spacing") {
    throw new CliOptionError(`--attribution must be "equal" or "spacing", got "${attribution}"`);
  }

  const maxGap = readFlag(args, "max-gap");
  const maxGapMeters = maxGap === undefined ? undefined : Number(maxGap);
  if (maxGapMeters !== undefined && (!Number.isFinite(maxGapMeters) || maxGapMeters <= 0)) {
    throw new CliOptionError(`--max-gap must be a positive number of meters, got "${maxGap}"`);
  }

  const top = readFlag(args, "top");

  return {
    inputs: args.filter((arg) => !arg.startsWith("--")),
    segment: args.includes("--no-segment")
      ? false
      : args.includes("--segment")
        ? true
        : undefined,
    maxGapMeters,
    attribution,
    top: top === undefined ? 3 : Math.max(1, Number(top) || 3),
  };
}

/**
 * A flag was given a value it does not accept
 */
export class CliOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliOptionError";
  }
}
