import express, { type Express } from "express";
import { log } from "./logger";
import { registerMonitorRoutes } from "./monitor/routes";
import { apiErrorHandler } from "./middleware/apiValidation";

/**
 * Builds the HTTP app without listening, so tests can drive it with supertest.
 */
export function createApp(serviceName: string = "radio-contest-monitor"): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  // Health and readiness endpoints (no logging)
  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: serviceName });
  });

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`, "api");
      }
    });

    next();
  });

  registerMonitorRoutes(app);

  // Return JSON 404 for unmatched API routes
  app.use("/api", (req, res) => {
    res.status(404).json({
      error: "Not Found",
      message: "API endpoint not found",
      path: req.originalUrl,
    });
  });

  app.use(apiErrorHandler);

  return app;
}
