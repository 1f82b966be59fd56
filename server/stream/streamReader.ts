/**
 * Station Stream Reader
 *
 * Holds one HTTP(S) connection to one station and turns the response body
 * into fixed-size RawChunks. Every failed attempt (bad status, network error,
 * read timeout, end of stream) is reported and retried after the backoff
 * interval, without limit, until stop() is called.
 *
 * The reader knows nothing about audio formats or transcription.
 */

import type { RawChunk, StationIdentity } from "@shared/schema";
import { log, logDebug, errorMessage } from "../logger";
import { ConnectionError } from "../monitor/errors";
import { systemClock, type BackoffStrategy, type Clock } from "../../lib/reliability";

const ACCEPTED_STATUSES = new Set([200, 206]);

export interface StreamReaderConfig {
  chunkSizeBytes: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  backoff: BackoffStrategy;
  userAgent?: string;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

export interface StreamReaderEvents {
  onConnected: (attempt: number) => void;
  onChunk: (chunk: RawChunk) => void;
  onDisconnected: (error: ConnectionError, attempt: number) => void;
}

export interface StreamReaderStatus {
  running: boolean;
  connected: boolean;
  attempts: number;
  consecutiveFailures: number;
  disconnects: number;
  bytesRead: number;
}

export class StreamReader {
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;
  private running = false;
  private stopRequested = false;
  private connected = false;
  private attempts = 0;
  private consecutiveFailures = 0;
  private disconnects = 0;
  private bytesRead = 0;
  private runPromise: Promise<void> | null = null;
  private attemptController: AbortController | null = null;
  private readonly stopController = new AbortController();
  private readonly stopped: Promise<{ stopped: true }>;
  private resolveStopped: () => void = () => undefined;

  constructor(
    private readonly station: StationIdentity,
    private readonly events: StreamReaderEvents,
    private readonly config: StreamReaderConfig
  ) {
    if (!Number.isInteger(config.chunkSizeBytes) || config.chunkSizeBytes <= 0) {
      throw new RangeError(`chunkSizeBytes must be a positive integer, got ${config.chunkSizeBytes}`);
    }
    this.clock = config.clock ?? systemClock;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = () => resolve({ stopped: true });
    });
  }

  /**
   * Starts the read loop. The returned promise settles once the reader has
   * been stopped and its connection released.
   */
  start(): Promise<void> {
    if (!this.runPromise && !this.stopRequested) {
      this.running = true;
      this.runPromise = this.run();
    }
    return this.runPromise ?? Promise.resolve();
  }

  stop(): Promise<void> {
    this.stopRequested = true;
    if (this.running) {
      this.running = false;
      this.stopController.abort();
      this.attemptController?.abort();
      this.resolveStopped();
    }
    return this.runPromise ?? Promise.resolve();
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): StreamReaderStatus {
    return {
      running: this.running,
      connected: this.connected,
      attempts: this.attempts,
      consecutiveFailures: this.consecutiveFailures,
      disconnects: this.disconnects,
      bytesRead: this.bytesRead,
    };
  }

  private async run(): Promise<void> {
    while (this.running) {
      this.attempts++;
      const attempt = this.attempts;
      const failure = await this.connectAndRead(attempt);
      this.connected = false;

      if (!this.running || !failure) {
        break;
      }

      this.disconnects++;
      this.consecutiveFailures++;
      this.events.onDisconnected(failure, attempt);

      const delayMs = this.config.backoff(this.consecutiveFailures - 1);
      log(
        `[StreamReader:${this.station.displayName}] ${failure.message}; reconnecting in ${delayMs}ms (attempt ${attempt})`,
        "stream"
      );
      await this.clock.sleep(delayMs, this.stopController.signal);
    }

    logDebug(`[StreamReader:${this.station.displayName}] read loop exited`, "stream");
  }

  /**
   * One connection attempt. Returns the failure that ended it, or null when
   * the reader was stopped.
   */
  private async connectAndRead(attempt: number): Promise<ConnectionError | null> {
    const controller = new AbortController();
    this.attemptController = controller;
    const context = { stationId: this.station.id };

    let response: Response;
    try {
      const outcome = await this.withTimeout(
        this.fetchImpl(this.station.streamURL, {
          method: "GET",
          headers: {
            "User-Agent": this.config.userAgent ?? "radio-contest-monitor/1.0",
            Accept: "audio/*",
          },
          signal: controller.signal,
        }),
        this.config.connectTimeoutMs,
        () => new ConnectionError(`connect timed out after ${this.config.connectTimeoutMs}ms`, "timeout", context),
        controller
      );
      if (outcome === null) {
        return null;
      }
      response = outcome;
    } catch (error) {
      controller.abort();
      return this.running ? toConnectionError(error, this.station.id) : null;
    }

    if (!ACCEPTED_STATUSES.has(response.status)) {
      controller.abort();
      return new ConnectionError(`unexpected HTTP status ${response.status}`, "status", {
        ...context,
        status: response.status,
      });
    }

    if (!response.body) {
      controller.abort();
      return new ConnectionError("response has no body", "no_body", context);
    }

    this.connected = true;
    this.consecutiveFailures = 0;
    this.events.onConnected(attempt);

    const reader = response.body.getReader();
    let pending: Buffer = Buffer.alloc(0);

    try {
      for (;;) {
        const outcome = await this.withTimeout(
          reader.read(),
          this.config.readTimeoutMs,
          () => new ConnectionError(`read timed out after ${this.config.readTimeoutMs}ms`, "timeout", context),
          controller
        );

        if (outcome === null || !this.running) {
          return null;
        }

        if (outcome.done) {
          this.flushTail(pending);
          return new ConnectionError("stream ended", "ended", context);
        }

        if (outcome.value.length === 0) {
          continue;
        }

        this.bytesRead += outcome.value.length;
        pending = pending.length === 0 ? Buffer.from(outcome.value) : Buffer.concat([pending, outcome.value]);

        while (pending.length >= this.config.chunkSizeBytes && this.running) {
          this.emitChunk(Buffer.from(pending.subarray(0, this.config.chunkSizeBytes)));
          pending = pending.subarray(this.config.chunkSizeBytes);
        }
      }
    } catch (error) {
      if (!this.running) {
        return null;
      }
      this.flushTail(pending);
      return toConnectionError(error, this.station.id);
    } finally {
      controller.abort();
      reader.cancel().catch((error: unknown) => {
        logDebug(`[StreamReader:${this.station.displayName}] cancel failed: ${errorMessage(error)}`, "stream");
      });
      if (this.attemptController === controller) {
        this.attemptController = null;
      }
    }
  }

  /**
   * Races `operation` against the timeout and the stop signal. Resolves null
   * when the reader is stopped first; rejects with `onTimeout()` when the
   * timeout wins (aborting the attempt).
   */
  private async withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    onTimeout: () => ConnectionError,
    controller: AbortController
  ): Promise<T | null> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(onTimeout());
      }, timeoutMs);
    });

    try {
      const outcome: T | { stopped: true } = await Promise.race([operation, timeout, this.stopped]);
      return isStopped(outcome) ? null : outcome;
    } finally {
      clearTimeout(timer);
    }
  }

  private flushTail(pending: Buffer): void {
    if (pending.length > 0 && this.running) {
      this.emitChunk(Buffer.from(pending));
    }
  }

  private emitChunk(bytes: Buffer): void {
    this.events.onChunk({
      stationId: this.station.id,
      bytes,
      receivedAt: this.clock.now(),
    });
  }
}

function isStopped(outcome: unknown): outcome is { stopped: true } {
  return typeof outcome === "object" && outcome !== null && "stopped" in outcome && outcome.stopped === true;
}

function toConnectionError(error: unknown, stationId: string): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  return new ConnectionError(`network error: ${errorMessage(error)}`, "network", { stationId, cause: error });
}
