/**
 * Route Types
 * Raw route records as they arrive from the acquisition side
 */

import type { Coordinate } from "./geo.types.js";

export const ROUTE_CATEGORIES = [
  "running",
  "walking",
  "cycling",
  "hiking",
  "other",
] as const;

export type RouteCategory = (typeof ROUTE_CATEGORIES)[number];

/** Plain route record, before the distance is derived */
export interface RouteRecord {
  id: string;
  coordinates: readonly Coordinate[];
  timestamp: Date;
  category: RouteCategory;
  durationSeconds: number;
}

/** Single point from a GPX track */
export interface TracePoint extends Coordinate {
  elevation?: number;
  timestamp?: Date;
}

/** Parsed GPX data */
export interface ParsedTrace {
  points: TracePoint[];
  name?: string;
  type?: string;
  startTime?: Date;
  endTime?: Date;
}
