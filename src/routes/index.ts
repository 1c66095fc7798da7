/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api/v1
 *
 * ROUTE MODULES:
 * --------------
 * | Module  | Path     | Description                                  |
 * |---------|----------|----------------------------------------------|
 * | stats   | /stats   | Distance per country/city (JSON, NDJSON, GPX) |
 * | geocode | /geocode | Offline reverse geocoding                    |
 */

import { Router } from "express";
import statsRoutes from "./stats.routes.js";
import geocodeRoutes from "./geocode.routes.js";

const router = Router();

// Mount route modules
router.use("/stats", statsRoutes);
router.use("/geocode", geocodeRoutes);

export default router;
