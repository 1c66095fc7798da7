/**
 * Stats Routes
 * Distance per country and per city for a set of routes
 *
 * Endpoints:
 * - POST /api/v1/stats          - Aggregate routes, return the final snapshot
 * - POST /api/v1/stats/stream   - Same, streaming every snapshot as NDJSON
 * - POST /api/v1/stats/gpx      - Aggregate uploaded GPX files
 * - POST /api/v1/stats/runs     - Start a background run (supersedes the previous one)
 * - GET  /api/v1/stats/latest   - Newest snapshot of the current background run
 *
 * JSON request body (POST /stats, /stats/stream, /stats/runs):
 * {
 *   "routes": [{ "id": "r1", "coordinates": [[52.52, 13.405], ...] }],
 *   "segment": false,          // split at GPS gaps first
 *   "maxGapMeters": 20,
 *   "maxSamples": 10,
 *   "attribution": "equal"     // or "spacing"
 * }
 */

import { Router, Request, Response } from "express";
import {
  uploadGpx,
  handleMulterError,
} from "../middleware/upload.middleware.js";
import { AGGREGATION, ERROR_CODES, UPLOAD } from "../config/constants.js";
import {
  GpxParseError,
  parseGpx,
  traceToRoute,
} from "../services/gpx.service.js";
import {
  parseRouteList,
  RouteValidationError,
  type Route,
} from "../services/route.service.js";
import { formatSummary } from "../services/stats-summary.service.js";
import {
  computeStats,
  getSharedAggregator,
  prepareRoutes,
  startBackgroundStats,
  streamStats,
  type PrepareOptions,
} from "../services/stats.service.js";
import type { AggregationOptions, Snapshot } from "../types/stats.types.js";
import { writeNdjson } from "../utils/ndjson.js";

const router = Router();

// ============================================
// Request Parsing
// ============================================

interface StatsRequest {
  routes: Route[];
  prepare: PrepareOptions;
  options: AggregationOptions;
}

class StatsRequestError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = "StatsRequestError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new StatsRequestError(
      `${field} must be a positive number`,
      ERROR_CODES.VALIDATION_ERROR
    );
  }
  return parsed;
}

function readOptions(source: Record<string, unknown>): AggregationOptions {
  const options: AggregationOptions = {};

  const maxSamples = positiveNumber(source.maxSamples, "maxSamples");
  if (maxSamples !== undefined) options.maxSamples = Math.floor(maxSamples);

  if (source.attribution !== undefined) {
    if (source.attribution !== "equal" && source.attribution !== "spacing") {
      throw new StatsRequestError(
        'attribution must be "equal" or "spacing"',
        ERROR_CODES.VALIDATION_ERROR
      );
    }
    options.attribution = source.attribution;
  }

  return options;
}

function readPrepare(
  source: Record<string, unknown>,
  segmentByDefault: boolean
): PrepareOptions {
  const segment =
    source.segment === undefined
      ? segmentByDefault
      : source.segment === true || source.segment === "true";

  return {
    segment,
    maxGapMeters:
      positiveNumber(source.maxGapMeters, "maxGapMeters") ??
      AGGREGATION.SEGMENT_MAX_GAP_METERS,
  };
}

/**
 * Validate a JSON stats request body
 *
 * @throws StatsRequestError for a missing routes array or bad options
 */
function parseStatsRequest(body: unknown): StatsRequest {
  if (!isRecord(body) || body.routes === undefined) {
    throw new StatsRequestError(
      "Request body must contain a 'routes' array",
      ERROR_CODES.ROUTES_REQUIRED
    );
  }

  let routes: Route[];
  try {
    routes = parseRouteList(body.routes);
  } catch (error) {
    if (error instanceof RouteValidationError) {
      throw new StatsRequestError(error.message, ERROR_CODES.ROUTE_INVALID);
    }
    throw error;
  }

  return {
    routes,
    prepare: readPrepare(body, false),
    options: readOptions(body),
  };
}

function sendError(res: Response, error: unknown, context: string): Response {
  if (error instanceof StatsRequestError) {
    return res.status(400).json({
      success: false,
      error: error.message,
      code: error.code,
    });
  }

  console.error(`[Stats] ${context} failed:`, error);
  return res.status(500).json({
    success: false,
    error: "Failed to compute stats",
    code: ERROR_CODES.INTERNAL_ERROR,
  });
}

function statsResponse(snapshot: Snapshot) {
  return {
    success: true,
    stats: snapshot,
    summary: formatSummary(snapshot),
  };
}

// ============================================
// POST /api/v1/stats
// ============================================

/**
 * Aggregate routes and return the final snapshot
 *
 * Success Response (200): { success, stats: Snapshot, summary: string }
 *
 * Error Responses:
 * - 400: ROUTES_REQUIRED, ROUTE_INVALID, VALIDATION_ERROR
 * - 500: Internal server error
 */
router.post("/", async (req: Request, res: Response) => {
  try {
    const { routes, prepare, options } = parseStatsRequest(req.body);
    const snapshot = await computeStats(prepareRoutes(routes, prepare), options);
    return res.json(statsResponse(snapshot));
  } catch (error) {
    return sendError(res, error, "Aggregation");
  }
});

// ============================================
// POST /api/v1/stats/stream
// ============================================

/**
 * Aggregate routes, writing every snapshot as one JSON line
 *
 * The last line is the done=true snapshot. If the run fails after
 * streaming has begun, the last line is { success: false, error }.
 * The run stops when the client disconnects.
 */
router.post("/stream", async (req: Request, res: Response) => {
  let request: StatsRequest;
  try {
    request = parseStatsRequest(req.body);
  } catch (error) {
    return sendError(res, error, "Stream");
  }

  res.status(200).type("application/x-ndjson");

  try {
    const completed = await writeNdjson(
      streamStats(prepareRoutes(request.routes, request.prepare), request.options),
      res
    );
    if (!completed) {
      console.log("[Stats] Stream client disconnected, run stopped");
      return;
    }
  } catch (error) {
    console.error("[Stats] Stream failed:", error);
    res.write(
      `${JSON.stringify({ success: false, error: "Failed to compute stats" })}\n`
    );
  }

  return res.end();
});

// ============================================
// POST /api/v1/stats/gpx
// ============================================

/**
 * Aggregate one or more uploaded GPX files
 *
 * Request:
 * - Content-Type: multipart/form-data
 * - Files in the "gpx" field (up to UPLOAD.MAX_FILES)
 * - Optional fields: segment (default true), maxGapMeters, maxSamples, attribution
 *
 * Each file becomes one route named after the file; with segmentation
 * on it is split at GPS gaps into "{file}#1", "{file}#2", ...
 */
router.post(
  "/gpx",
  uploadGpx.array(UPLOAD.FIELD_NAME, UPLOAD.MAX_FILES),
  handleMulterError,
  async (req: Request, res: Response) => {
    const files = Array.isArray(req.files) ? req.files : [];

    if (files.length === 0) {
      return res.status(400).json({
        success: false,
        error: `No GPX file provided. Upload files in the '${UPLOAD.FIELD_NAME}' field.`,
        code: ERROR_CODES.GPX_FILE_REQUIRED,
      });
    }

    const routes: Route[] = [];
    for (const file of files) {
      try {
        const trace = parseGpx(file.buffer);
        console.log(
          `[GPX] Parsed ${trace.points.length} points from "${file.originalname}"`
        );
        routes.push(traceToRoute(trace, file.originalname));
      } catch (error) {
        if (error instanceof GpxParseError) {
          return res.status(400).json({
            success: false,
            error: `${file.originalname}: ${error.message}`,
            code: ERROR_CODES.GPX_PARSE_ERROR,
          });
        }
        return sendError(res, error, "GPX parsing");
      }
    }

    try {
      const fields: Record<string, unknown> = isRecord(req.body) ? req.body : {};
      const snapshot = await computeStats(
        prepareRoutes(routes, readPrepare(fields, true)),
        readOptions(fields)
      );
      return res.json(statsResponse(snapshot));
    } catch (error) {
      return sendError(res, error, "GPX aggregation");
    }
  }
);

// ============================================
// Background Runs
// ============================================

/**
 * POST /api/v1/stats/runs
 * Start a background run. Any run still in progress is superseded.
 *
 * Success Response (202): { success, generation }
 */
router.post("/runs", async (req: Request, res: Response) => {
  try {
    const { routes, prepare, options } = parseStatsRequest(req.body);
    const generation = await startBackgroundStats(
      prepareRoutes(routes, prepare),
      options
    );
    return res.status(202).json({ success: true, generation });
  } catch (error) {
    return sendError(res, error, "Background run");
  }
});

/**
 * GET /api/v1/stats/latest
 * Newest snapshot of the current background run (done may still be false)
 *
 * Error Responses:
 * - 404: STATS_NOT_AVAILABLE (no run started, or nothing published yet)
 */
router.get("/latest", async (req: Request, res: Response) => {
  try {
    const aggregator = await getSharedAggregator();
    const snapshot = aggregator.latest();

    if (!snapshot) {
      return res.status(404).json({
        success: false,
        error: "No stats available yet",
        code: ERROR_CODES.STATS_NOT_AVAILABLE,
        generation: aggregator.currentGeneration,
      });
    }

    return res.json(statsResponse(snapshot));
  } catch (error) {
    return sendError(res, error, "Latest snapshot");
  }
});

export default router;
