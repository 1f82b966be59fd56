import type { ContestMatch, MonitorEvent, TranscriptResult } from "@shared/schema";
import { log, logError, errorMessage } from "../logger";

/**
 * Receives pipeline output (UI, log, alerting). Delivery is fire-and-forget:
 * a slow or failing sink never blocks a station.
 */
export interface MonitorSink {
  readonly name: string;
  publish(event: MonitorEvent): void | Promise<void>;
}

/**
 * Hands `event` to every sink on a later tick. setImmediate callbacks run in
 * FIFO order, so each station's events keep their order.
 */
export function dispatchEvent(sinks: readonly MonitorSink[], event: MonitorEvent): void {
  for (const sink of sinks) {
    setImmediate(() => {
      Promise.resolve()
        .then(() => sink.publish(event))
        .catch((error: unknown) => {
          logError(`[Sinks] ${sink.name} failed on ${event.type}: ${errorMessage(error)}`, "monitor");
        });
    });
  }
}

function preview(text: string, max: number = 80): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

export class LogSink implements MonitorSink {
  readonly name = "log";

  constructor(private readonly options: { includeTranscripts?: boolean } = {}) {}

  publish(event: MonitorEvent): void {
    switch (event.type) {
      case "contest_match":
        log(
          `CONTEST on ${event.match.displayName} (#${event.match.sequenceNumber}) "${event.match.matchedKeyword}": ${preview(event.match.text)}`,
          "detector"
        );
        break;
      case "transcript":
        if (this.options.includeTranscripts) {
          log(`${event.result.stationId}#${event.result.sequenceNumber}: ${preview(event.result.text)}`, "monitor");
        }
        break;
      case "session_state":
        log(
          `${event.displayName}: ${event.previousState} -> ${event.state}${event.reason ? ` (${event.reason})` : ""}`,
          "session"
        );
        break;
      case "segment_dropped":
        log(`${event.stationId}: dropped segment #${event.sequenceNumber} (${event.reason})`, "session");
        break;
      case "pipeline_error":
        log(
          `${event.stationId}: ${event.errorType}${event.sequenceNumber !== null ? ` on #${event.sequenceNumber}` : ""}: ${event.message}`,
          "session"
        );
        break;
      case "monitor_stopped":
        log(
          `Monitoring stopped: ${event.stoppedStations.length} sessions joined, ${event.timedOutStations.length} timed out`,
          "monitor"
        );
        break;
    }
  }
}

/**
 * Keeps the most recent transcripts and matches in memory for the status API.
 */
export class RecentEventsSink implements MonitorSink {
  readonly name = "recent";
  private transcripts: TranscriptResult[] = [];
  private matches: ContestMatch[] = [];

  constructor(private readonly limit: number = 50) {}

  publish(event: MonitorEvent): void {
    if (event.type === "transcript") {
      this.transcripts = [event.result, ...this.transcripts].slice(0, this.limit);
    } else if (event.type === "contest_match") {
      this.matches = [event.match, ...this.matches].slice(0, this.limit);
    }
  }

  getRecentTranscripts(): TranscriptResult[] {
    return [...this.transcripts];
  }

  getRecentMatches(): ContestMatch[] {
    return [...this.matches];
  }

  clear(): void {
    this.transcripts = [];
    this.matches = [];
  }
}
