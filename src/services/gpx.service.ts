/**
 * GPX Service
 * Parses GPX files into traces and routes
 *
 * How it works:
 * 1. Parse XML using @xmldom/xmldom
 * 2. Convert to GeoJSON using @tmcw/togeojson
 * 3. Extract coordinates into a TracePoint array, each with the <time>
 *    of its <trkpt>/<rtept>
 * 4. Optionally turn the trace into a Route (category from <type>,
 *    duration from first/last timestamp)
 *
 * GPX Structure (simplified):
 * <gpx>
 *   <trk>
 *     <name>Morning Run</name>
 *     <type>running</type>
 *     <trkseg>
 *       <trkpt lat="52.52" lon="13.405">
 *         <ele>34</ele>
 *         <time>2026-03-14T07:00:00Z</time>
 *       </trkpt>
 *     </trkseg>
 *   </trk>
 * </gpx>
 */

import { DOMParser } from "@xmldom/xmldom";
import * as toGeoJSON from "@tmcw/togeojson";
import { UPLOAD } from "../config/constants.js";
import { Route } from "./route.service.js";
import type { Position } from "geojson";
import type { ParsedTrace, RouteCategory, TracePoint } from "../types/route.types.js";

// ============================================
// Main Parse Function
// ============================================

/**
 * Parse GPX content into a trace
 *
 * @param content - Raw GPX file content (Buffer from Multer, or text)
 * @throws GpxParseError if the file is malformed or has too few points
 *
 * @example
 * const trace = parseGpx(req.file.buffer);
 * console.log(trace.points.length, trace.name);
 */
export function parseGpx(content: Buffer | string): ParsedTrace {
  const gpxContent =
    typeof content === "string" ? content : content.toString("utf-8");

  // Step 1: Parse XML, collecting errors instead of logging them
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });

  let dom: Document;
  try {
    dom = parser.parseFromString(gpxContent, "text/xml");
  } catch (error) {
    throw new GpxParseError(
      `Invalid GPX file: ${error instanceof Error ? error.message : "malformed XML"}`
    );
  }

  if (errors.length > 0 || dom.getElementsByTagName("parsererror").length > 0) {
    throw new GpxParseError("Invalid GPX file: malformed XML");
  }
  if (dom.getElementsByTagName("gpx").length === 0) {
    throw new GpxParseError("Invalid GPX file: missing <gpx> root element");
  }

  // Step 2: Convert tracks/routes to GeoJSON features
  const geoJson = toGeoJSON.gpx(dom);

  // Step 3: Extract points, pairing them with the <time> of their XML point
  const points = extractPoints(geoJson.features, readXmlPoints(dom));

  if (points.length < UPLOAD.MIN_POINTS) {
    throw new GpxParseError(
      `GPX file must contain at least ${UPLOAD.MIN_POINTS} track points`
    );
  }

  const { startTime, endTime } = extractTimeRange(points);

  return {
    points,
    name: extractTrackField(dom, "name"),
    type: extractTrackField(dom, "type"),
    startTime,
    endTime,
  };
}

// ============================================
// Point Extraction
// ============================================

interface LineFeature {
  geometry?: { type: string; coordinates?: unknown } | null;
}

function toPoint(position: Position, timestamp: Date | undefined): TracePoint {
  // GeoJSON order is [lng, lat, elevation?]
  return {
    lon: position[0],
    lat: position[1],
    elevation: position[2],
    timestamp,
  };
}

function isPositionList(value: unknown): value is Position[] {
  return (
    Array.isArray(value) &&
    value.every(
      (p) =>
        Array.isArray(p) &&
        p.length >= 2 &&
        typeof p[0] === "number" &&
        typeof p[1] === "number"
    )
  );
}

/**
 * Flatten LineString / MultiLineString features into points
 *
 * Each position takes the timestamp of the next XML point with the same
 * coordinates. togeojson skips segments and points it cannot use, so a
 * position-by-index pairing would drift.
 *
 * @throws GpxParseError if no tracks were found
 */
function extractPoints(
  features: readonly LineFeature[],
  xmlPoints: readonly XmlPoint[]
): TracePoint[] {
  if (features.length === 0) {
    throw new GpxParseError("No tracks found in GPX file");
  }

  const points: TracePoint[] = [];
  let cursor = 0;
  const timestampFor = (position: Position): Date | undefined => {
    for (let i = cursor; i < xmlPoints.length; i++) {
      if (xmlPoints[i].lon === position[0] && xmlPoints[i].lat === position[1]) {
        cursor = i + 1;
        return xmlPoints[i].timestamp;
      }
    }
    return undefined;
  };
  const append = (line: Position[]): void => {
    for (const position of line) {
      points.push(toPoint(position, timestampFor(position)));
    }
  };

  for (const feature of features) {
    const geometry = feature.geometry;
    if (!geometry) continue;

    if (geometry.type === "LineString" && isPositionList(geometry.coordinates)) {
      append(geometry.coordinates);
    } else if (
      geometry.type === "MultiLineString" &&
      Array.isArray(geometry.coordinates)
    ) {
      for (const line of geometry.coordinates) {
        if (isPositionList(line)) append(line);
      }
    }
  }

  return points;
}

// ============================================
// Timestamp & Metadata Extraction
// ============================================

interface XmlPoint {
  lat: number;
  lon: number;
  timestamp?: Date;
}

/**
 * Every <trkpt>, then every <rtept>, with its <time>
 *
 * Same order as the features togeojson emits (tracks before routes).
 * A missing or invalid time reads as undefined.
 */
function readXmlPoints(dom: Document): XmlPoint[] {
  const points: XmlPoint[] = [];

  for (const tag of ["trkpt", "rtept"]) {
    const elements = dom.getElementsByTagName(tag);
    for (let i = 0; i < elements.length; i++) {
      const element = elements[i];
      const time = element.getElementsByTagName("time")[0]?.textContent?.trim();
      const date = time ? new Date(time) : undefined;

      points.push({
        lat: parseFloat(element.getAttribute("lat") ?? ""),
        lon: parseFloat(element.getAttribute("lon") ?? ""),
        timestamp: date && !Number.isNaN(date.getTime()) ? date : undefined,
      });
    }
  }

  return points;
}

/**
 * Read a child of the first <trk> (e.g. name, type), then <rte>, then <metadata>
 */
function extractTrackField(dom: Document, field: string): string | undefined {
  for (const parentTag of ["trk", "rte", "metadata"]) {
    const parent = dom.getElementsByTagName(parentTag)[0];
    const text = parent?.getElementsByTagName(field)[0]?.textContent?.trim();
    if (text) return text;
  }
  return undefined;
}

function extractTimeRange(points: TracePoint[]): {
  startTime?: Date;
  endTime?: Date;
} {
  const pointsWithTime = points.filter((p) => p.timestamp);

  if (pointsWithTime.length === 0) {
    return { startTime: undefined, endTime: undefined };
  }

  return {
    startTime: pointsWithTime[0].timestamp,
    endTime: pointsWithTime[pointsWithTime.length - 1].timestamp,
  };
}

// ============================================
// Trace -> Route
// ============================================

/**
 * Map a free-form GPX <type> onto a route category
 *
 * @example
 * categoryFromGpxType("Running")  // "running"
 * categoryFromGpxType("road_bike") // "cycling"
 */
export function categoryFromGpxType(type?: string): RouteCategory {
  const value = type?.toLowerCase() ?? "";
  if (value.includes("run")) return "running";
  if (value.includes("walk")) return "walking";
  if (value.includes("hik")) return "hiking";
  if (value.includes("cycl") || value.includes("bik") || value.includes("ride")) {
    return "cycling";
  }
  return "other";
}

/**
 * Build a Route from a parsed trace
 */
export function traceToRoute(trace: ParsedTrace, id: string): Route {
  const { startTime, endTime } = trace;
  const durationSeconds =
    startTime && endTime
      ? Math.max(0, Math.floor((endTime.getTime() - startTime.getTime()) / 1000))
      : 0;

  return new Route({
    id,
    coordinates: trace.points,
    timestamp: startTime ?? new Date(0),
    category: categoryFromGpxType(trace.type),
    durationSeconds,
  });
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Custom error class for GPX parsing errors
 *
 * Thrown when:
 * - XML is malformed
 * - No tracks found in file
 * - Too few track points
 *
 * Caught in route handler to return appropriate error response.
 */
export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GpxParseError";
  }
}
