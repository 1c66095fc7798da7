import express, { Application, Request, Response } from "express";
import cors from "cors";
import routes from "./routes/index.js";
import { API, ERROR_CODES, FRONTEND_URL } from "./config/constants.js";

/**
 * Build the Express app (without listening), so tests can mount it directly
 */
export function createApp(): Application {
  const app: Application = express();

  // Middleware
  app.use(
    cors({
      origin: FRONTEND_URL,
      credentials: true,
    })
  );
  // Route sets can be large
  app.use(express.json({ limit: "20mb" }));
  app.use(express.urlencoded({ extended: true }));

  // API Routes
  app.use(API.PREFIX, routes);

  // Health check route
  app.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV,
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: "Route not found",
      code: ERROR_CODES.NOT_FOUND,
      path: req.path,
    });
  });

  return app;
}
