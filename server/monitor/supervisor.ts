/**
 * Session Supervisor
 *
 * Owns the map of live StationSessions and the max-concurrency cap. All
 * adds and removes go through this class on the event loop, which is the
 * only state shared between stations.
 *
 * - start(): starts sessions up to the cap; the rest are rejected, not queued
 * - stopAll(): signals every session and returns at once; completion is
 *   observed through waitForShutdown() and a monitor_stopped event
 */

import type { MonitorEvent, SessionStatus, StationIdentity } from "@shared/schema";
import { log, logError, errorMessage } from "../logger";
import type { MonitorConfig } from "../config/monitor";
import { settleWithin, systemClock, type Clock } from "../../lib/reliability";
import { dispatchEvent, type MonitorSink } from "./sinks";
import { StationSession, type StationSessionDeps } from "./stationSession";

export type SupervisorSessionDeps = Omit<StationSessionDeps, "emit">;

export interface StartRejection {
  stationId: string;
  reason: "max_concurrent_reached" | "already_running" | "invalid_station";
}

export interface StartResult {
  started: string[];
  rejected: StartRejection[];
}

export interface ShutdownReport {
  stoppedStations: string[];
  timedOutStations: string[];
}

export interface SupervisorStatus {
  maxConcurrent: number;
  activeSessions: number;
  shuttingDown: boolean;
  sessions: SessionStatus[];
}

export class Supervisor {
  private readonly sessions = new Map<string, StationSession>();
  private readonly sinks: MonitorSink[];
  private maxConcurrent: number;
  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private readonly stopping = new Set<StationSession>();
  private readonly clock: Clock;

  constructor(
    private readonly config: MonitorConfig,
    private readonly sessionDeps: SupervisorSessionDeps,
    sinks: MonitorSink[] = []
  ) {
    this.maxConcurrent = validateMaxConcurrent(config.maxConcurrent);
    this.sinks = [...sinks];
    this.clock = sessionDeps.clock ?? systemClock;
  }

  addSink(sink: MonitorSink): void {
    if (!this.sinks.includes(sink)) {
      this.sinks.push(sink);
    }
  }

  removeSink(sink: MonitorSink): void {
    const index = this.sinks.indexOf(sink);
    if (index >= 0) {
      this.sinks.splice(index, 1);
    }
  }

  getMaxConcurrent(): number {
    return this.maxConcurrent;
  }

  /**
   * Changes the cap for future starts. Lowering it below the number of
   * running sessions does not stop any of them.
   */
  setMaxConcurrent(maxConcurrent: number): void {
    this.maxConcurrent = validateMaxConcurrent(maxConcurrent);
    log(`Max concurrent sessions set to ${this.maxConcurrent} (${this.sessions.size} active)`, "monitor");
  }

  start(stations: StationIdentity[], maxConcurrent?: number): StartResult {
    if (maxConcurrent !== undefined) {
      this.setMaxConcurrent(maxConcurrent);
    }

    const result: StartResult = { started: [], rejected: [] };

    for (const station of stations) {
      const stationId = station.id.trim();
      if (!stationId) {
        result.rejected.push({ stationId: station.id, reason: "invalid_station" });
        continue;
      }
      if (this.sessions.has(stationId)) {
        result.rejected.push({ stationId, reason: "already_running" });
        continue;
      }
      if (this.sessions.size >= this.maxConcurrent) {
        result.rejected.push({ stationId, reason: "max_concurrent_reached" });
        continue;
      }

      const session = new StationSession({ ...station, id: stationId }, this.config, {
        ...this.sessionDeps,
        emit: (event) => this.emit(event),
      });
      this.sessions.set(stationId, session);
      session.done.then(() => this.handleSessionDone(session)).catch((error: unknown) => {
        logError(`Session cleanup for ${stationId} failed: ${errorMessage(error)}`, "monitor");
      });
      session.start();
      result.started.push(stationId);
    }

    if (result.rejected.length > 0) {
      log(
        `Started ${result.started.length} sessions, rejected ${result.rejected.length} (${this.sessions.size}/${this.maxConcurrent} active)`,
        "monitor"
      );
    } else {
      log(`Started ${result.started.length} sessions (${this.sessions.size}/${this.maxConcurrent} active)`, "monitor");
    }

    return result;
  }

  /**
   * Stops one station. Resolves false for an unknown station, otherwise true
   * once it has stopped or its join timeout has passed.
   */
  async stop(stationId: string): Promise<boolean> {
    const session = this.sessions.get(stationId);
    if (!session) {
      return false;
    }
    await this.joinSession(session, "stopped by operator");
    return true;
  }

  stopAll(): void {
    const sessions = [...this.sessions.values()];
    log(`Stopping all sessions (${sessions.length} active)`, "monitor");

    const joins = sessions.map(async (session) => ({
      stationId: session.stationId,
      joined: await this.joinSession(session, "monitoring stopped"),
    }));

    const previous = this.shutdownPromise ?? Promise.resolve<ShutdownReport>({ stoppedStations: [], timedOutStations: [] });
    this.shutdownPromise = Promise.all([previous, Promise.all(joins)]).then(([earlier, outcomes]) => {
      const report: ShutdownReport = {
        stoppedStations: [...earlier.stoppedStations, ...outcomes.filter((o) => o.joined).map((o) => o.stationId)],
        timedOutStations: [...earlier.timedOutStations, ...outcomes.filter((o) => !o.joined).map((o) => o.stationId)],
      };
      this.emit({ type: "monitor_stopped", ...report, at: this.clock.now() });
      return report;
    });
  }

  /** Settles after the most recent stopAll() has joined every session. */
  waitForShutdown(): Promise<ShutdownReport> {
    return this.shutdownPromise ?? Promise.resolve({ stoppedStations: [], timedOutStations: [] });
  }

  isShuttingDown(): boolean {
    return this.stopping.size > 0;
  }

  getSession(stationId: string): StationSession | undefined {
    return this.sessions.get(stationId);
  }

  getActiveCount(): number {
    return this.sessions.size;
  }

  getStatus(): SupervisorStatus {
    return {
      maxConcurrent: this.maxConcurrent,
      activeSessions: this.sessions.size,
      shuttingDown: this.isShuttingDown(),
      sessions: [...this.sessions.values()].map((session) => session.getStatus()),
    };
  }

  private async joinSession(session: StationSession, reason: string): Promise<boolean> {
    this.stopping.add(session);
    try {
      // The session bounds its own join; the extra margin covers a session that never settles.
      const joined = await settleWithin(session.stop(reason), this.config.joinTimeoutMs + 1000);
      if (!joined) {
        log(`Session ${session.stationId} did not stop in time; removing it`, "monitor");
        this.handleSessionDone(session);
      }
      return joined;
    } finally {
      this.stopping.delete(session);
    }
  }

  private handleSessionDone(session: StationSession): void {
    if (this.sessions.get(session.stationId) === session) {
      this.sessions.delete(session.stationId);
      log(`Session ${session.stationId} removed (${this.sessions.size}/${this.maxConcurrent} active)`, "monitor");
    }
  }

  private emit(event: MonitorEvent): void {
    dispatchEvent(this.sinks, event);
  }
}

function validateMaxConcurrent(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`maxConcurrent must be a positive integer, got ${value}`);
  }
  return value;
}
