/**
 * Monitor Status Report Job
 *
 * Periodically logs a one-line summary per station: state, reconnects,
 * segments transcribed or dropped, and contest matches.
 * Runs every five minutes by default.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { SessionStatus } from "@shared/schema";
import { log, logError, errorMessage } from "../logger";
import { getMonitorStatus } from "../monitor";

let reportTask: ScheduledTask | null = null;

export function formatSessionLine(session: SessionStatus): string {
  const { stats } = session;
  return (
    `${session.displayName} [${session.state}] ` +
    `segments=${stats.segmentsEmitted} transcripts=${stats.transcripts} ` +
    `dropped=${stats.segmentsDropped} matches=${stats.matches} reconnects=${stats.reconnectCount}`
  );
}

/**
 * Run a single report pass.
 * Can be called manually or by the scheduled task.
 */
export function runStatusReport(): string[] {
  const status = getMonitorStatus();
  if (!status.initialized) {
    return [];
  }

  const lines = status.sessions.map(formatSessionLine);
  log(`Status: ${status.activeSessions}/${status.maxConcurrent} sessions active`, "jobs");
  for (const line of lines) {
    log(line, "jobs");
  }
  return lines;
}

/**
 * Start the scheduled report job.
 */
export function startMonitorStatusReport(cronExpression: string = "*/5 * * * *"): void {
  if (reportTask) {
    log("Status report job already running", "jobs");
    return;
  }

  if (!cron.validate(cronExpression)) {
    logError(`Invalid status report schedule "${cronExpression}"; job not started`, "jobs");
    return;
  }

  reportTask = cron.schedule(cronExpression, () => {
    try {
      runStatusReport();
    } catch (error) {
      logError(`Status report failed: ${errorMessage(error)}`, "jobs");
    }
  });

  log(`Status report job started (${cronExpression})`, "jobs");
}

/**
 * Stop the scheduled report job.
 */
export function stopMonitorStatusReport(): void {
  if (reportTask) {
    reportTask.stop();
    reportTask = null;
    log("Status report job stopped", "jobs");
  }
}

export function isMonitorStatusReportRunning(): boolean {
  return reportTask !== null;
}
