/**
 * Geocode API
 * Offline reverse geocoding against the bundled country/city table.
 * No network access; answers come straight from the local geocoder.
 */

import { Router, Request, Response } from "express";
import { ERROR_CODES } from "../config/constants.js";
import { findCountriesAt } from "../services/geo-database.service.js";
import {
  assertValidCoordinate,
  InvalidCoordinateError,
} from "../services/geo.service.js";
import { LocalGeocoder } from "../services/local-geocoder.service.js";

const router = Router();
const geocoder = new LocalGeocoder();

function readNumber(value: unknown): number {
  return typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
}

/**
 * GET /geocode/reverse?lat=52.52&lon=13.405
 * Country and city for a point. `matches` lists every country box that
 * contains the point, in table order (the first one wins).
 */
router.get("/reverse", (req: Request, res: Response) => {
  const lat = readNumber(req.query.lat);
  const lon = readNumber(req.query.lon);

  try {
    assertValidCoordinate({ lat, lon });
  } catch (error) {
    if (error instanceof InvalidCoordinateError) {
      return res.status(400).json({
        success: false,
        error: "Query parameters 'lat' (-90..90) and 'lon' (-180..180) are required",
        code: ERROR_CODES.INVALID_COORDINATES,
      });
    }
    throw error;
  }

  return res.json({
    success: true,
    result: geocoder.geocode(lat, lon),
    matches: findCountriesAt(lat, lon).map((country) => country.name),
  });
});

export default router;
