import type { Express, Request, Response } from "express";
import {
  setMaxConcurrentRequestSchema,
  startMonitoringRequestSchema,
  type SetMaxConcurrentRequest,
  type StartMonitoringRequest,
} from "@shared/schema";
import { validateBody } from "../middleware/apiValidation";
import { logError, errorMessage } from "../logger";
import {
  getMonitorStatus,
  getRecentTranscripts,
  getSupervisor,
  isMonitorInitialized,
  setMaxConcurrent,
  startMonitoring,
  startStations,
  stopMonitoring,
  stopStation,
} from "./index";

function requireMonitor(res: Response): boolean {
  if (!isMonitorInitialized()) {
    res.status(503).json({ success: false, error: "Monitor is not initialized" });
    return false;
  }
  return true;
}

export function registerMonitorRoutes(app: Express): void {
  app.get("/api/monitor/status", (_req: Request, res: Response) => {
    res.json(getMonitorStatus());
  });

  app.get("/api/monitor/transcripts", (_req: Request, res: Response) => {
    res.json({ transcripts: getRecentTranscripts() });
  });

  app.post(
    "/api/monitor/start",
    validateBody(startMonitoringRequestSchema),
    async (req: Request, res: Response) => {
      if (!requireMonitor(res)) return;

      try {
        const { maxConcurrent, filter, stations }: StartMonitoringRequest = req.body;
        const result = stations
          ? startStations(stations, maxConcurrent)
          : await startMonitoring(maxConcurrent, filter);

        res.status(result.started.length > 0 ? 202 : 200).json({ success: true, ...result });
      } catch (error) {
        logError(`Start monitoring failed: ${errorMessage(error)}`, "api");
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    }
  );

  app.post("/api/monitor/stop", async (_req: Request, res: Response) => {
    if (!requireMonitor(res)) return;

    stopMonitoring();
    const report = await getSupervisor().waitForShutdown();
    res.json({ success: true, ...report });
  });

  app.put(
    "/api/monitor/max-concurrent",
    validateBody(setMaxConcurrentRequestSchema),
    (req: Request, res: Response) => {
      if (!requireMonitor(res)) return;

      const { maxConcurrent }: SetMaxConcurrentRequest = req.body;
      setMaxConcurrent(maxConcurrent);
      res.json({ success: true, maxConcurrent });
    }
  );

  app.delete("/api/monitor/stations/:id", async (req: Request, res: Response) => {
    if (!requireMonitor(res)) return;

    const stopped = await stopStation(req.params.id);
    if (!stopped) {
      res.status(404).json({ success: false, error: `Station ${req.params.id} is not being monitored` });
      return;
    }
    res.json({ success: true, stationId: req.params.id });
  });
}
