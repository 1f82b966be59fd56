/**
 * Radio Monitor - Main Entry Point
 *
 * Control surface for the station pipeline:
 *   StationDirectory → Supervisor → StationSession × N → sinks
 *
 * Provides a small API for starting/stopping monitoring, changing the
 * concurrency cap and reading per-station status. The HTTP routes and the
 * bootstrap call into these functions; tests can initialize the monitor
 * with fakes and reset it afterwards.
 */

import type { StationFilter, StationIdentity } from "@shared/schema";
import { log } from "../logger";
import type { MonitorConfig } from "../config/monitor";
import type { StationDirectory } from "../directory/stationDirectory";
import { Supervisor, type StartResult, type SupervisorSessionDeps, type SupervisorStatus } from "./supervisor";
import { RecentEventsSink, type MonitorSink } from "./sinks";

export interface MonitorDependencies extends SupervisorSessionDeps {
  config: MonitorConfig;
  directory: StationDirectory;
  sinks?: MonitorSink[];
}

export interface StartMonitoringResult extends StartResult {
  stationsFound: number;
}

export interface MonitorStatus extends SupervisorStatus {
  initialized: boolean;
  directory: string | null;
  recentMatches: ReturnType<RecentEventsSink["getRecentMatches"]>;
}

// Monitor state
let supervisor: Supervisor | null = null;
let directory: StationDirectory | null = null;
let recentEvents: RecentEventsSink | null = null;

export function initializeMonitor(deps: MonitorDependencies): Supervisor {
  if (supervisor) {
    log("Monitor already initialized", "monitor");
    return supervisor;
  }

  const { config, directory: stationDirectory, sinks = [], ...sessionDeps } = deps;
  recentEvents = new RecentEventsSink();
  directory = stationDirectory;
  supervisor = new Supervisor(
    config,
    { ...sessionDeps, directory: stationDirectory },
    [...sinks, recentEvents]
  );

  log(`Monitor initialized (directory: ${stationDirectory.name}, max concurrent: ${config.maxConcurrent})`, "monitor");
  return supervisor;
}

export function isMonitorInitialized(): boolean {
  return supervisor !== null;
}

export function getSupervisor(): Supervisor {
  if (!supervisor) {
    throw new Error("Monitor has not been initialized");
  }
  return supervisor;
}

/**
 * Resolve stations through the directory and start up to `maxConcurrent`
 * of them.
 */
export async function startMonitoring(
  maxConcurrent: number,
  filter: StationFilter = {}
): Promise<StartMonitoringResult> {
  const active = getSupervisor();
  if (!directory) {
    throw new Error("Monitor has no station directory");
  }

  const stations = await directory.resolveStations(filter);
  if (stations.length === 0) {
    log("No stations available from the directory", "monitor");
    active.setMaxConcurrent(maxConcurrent);
    return { stationsFound: 0, started: [], rejected: [] };
  }

  return { stationsFound: stations.length, ...active.start(stations, maxConcurrent) };
}

/**
 * Start an explicit list of stations, bypassing the directory search.
 */
export function startStations(stations: StationIdentity[], maxConcurrent?: number): StartMonitoringResult {
  return { stationsFound: stations.length, ...getSupervisor().start(stations, maxConcurrent) };
}

/**
 * Signal every session to stop and return immediately.
 */
export function stopMonitoring(): void {
  getSupervisor().stopAll();
}

export function stopStation(stationId: string): Promise<boolean> {
  return getSupervisor().stop(stationId);
}

export function setMaxConcurrent(maxConcurrent: number): void {
  getSupervisor().setMaxConcurrent(maxConcurrent);
}

export function getMonitorStatus(): MonitorStatus {
  if (!supervisor) {
    return {
      initialized: false,
      directory: null,
      maxConcurrent: 0,
      activeSessions: 0,
      shuttingDown: false,
      sessions: [],
      recentMatches: [],
    };
  }

  return {
    initialized: true,
    directory: directory?.name ?? null,
    ...supervisor.getStatus(),
    recentMatches: recentEvents?.getRecentMatches() ?? [],
  };
}

export function getRecentTranscripts(): ReturnType<RecentEventsSink["getRecentTranscripts"]> {
  return recentEvents?.getRecentTranscripts() ?? [];
}

/**
 * Stop everything and forget the monitor (for tests or a fresh start)
 */
export async function resetMonitor(): Promise<void> {
  if (supervisor) {
    supervisor.stopAll();
    await supervisor.waitForShutdown();
  }
  supervisor = null;
  directory = null;
  recentEvents = null;
  log("Monitor state reset", "monitor");
}

export { Supervisor } from "./supervisor";
export type { StartResult, StartRejection, ShutdownReport, SupervisorStatus } from "./supervisor";
export { StationSession, backoffFromConfig } from "./stationSession";
export type { StationSessionDeps } from "./stationSession";
export { detectContest, tokenize, loadContestRules, DEFAULT_CONTEST_RULES } from "./contestDetector";
export type { ContestRule, ContestDetection } from "./contestDetector";
export { LogSink, RecentEventsSink, dispatchEvent } from "./sinks";
export type { MonitorSink } from "./sinks";
export * from "./errors";
