/**
 * Station Session
 *
 * Per-station state machine that wires the pipeline together:
 *
 *   StreamReader -> SegmentAccumulator -> BoundedQueue -> worker
 *   worker: AudioDecoder -> TranscriptionStage -> ContestDetector -> emit
 *
 * States: connecting -> streaming <-> reconnecting, and stopped from anywhere.
 * The reader and the worker run as separate async loops, so a slow
 * transcription never holds up the socket; when the queue fills, the oldest
 * waiting segment is dropped and reported.
 *
 * stopped is terminal: once stop() is called nothing else is emitted except
 * the final state change.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  AudioSegment,
  ContestMatch,
  MonitorEvent,
  RawChunk,
  SessionState,
  SessionStats,
  SessionStatus,
  StationIdentity,
  TranscriptResult,
} from "@shared/schema";
import { log, logDebug, errorMessage } from "../logger";
import type { MonitorConfig } from "../config/monitor";
import { isStreamUrl, type StationDirectory } from "../directory/stationDirectory";
import { StreamReader } from "../stream/streamReader";
import { SegmentAccumulator } from "../stream/segmentAccumulator";
import { BoundedQueue } from "../stream/segmentQueue";
import type { PcmAudio, SegmentDecoder } from "../stt/audio_decoder";
import type { SegmentTranscriber } from "../stt/transcription_stage";
import { DEFAULT_CONTEST_RULES, detectContest, type ContestRule } from "./contestDetector";
import {
  ConfigurationError,
  DecodeError,
  TranscriptionError,
  type ConnectionError,
  type PipelineError,
} from "./errors";
import {
  exponentialBackoff,
  fixedBackoff,
  settleWithin,
  systemClock,
  type BackoffStrategy,
  type Clock,
} from "../../lib/reliability";

export interface StationSessionDeps {
  decoder: SegmentDecoder;
  transcription: SegmentTranscriber;
  emit: (event: MonitorEvent) => void;
  rules?: readonly ContestRule[];
  directory?: StationDirectory;
  clock?: Clock;
  fetchImpl?: typeof fetch;
  backoff?: BackoffStrategy;
}

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  connecting: ["streaming", "reconnecting", "stopped"],
  streaming: ["reconnecting", "stopped"],
  reconnecting: ["streaming", "stopped"],
  stopped: [],
};

export function backoffFromConfig(config: MonitorConfig): BackoffStrategy {
  if (config.reconnectBackoffMaxMs > config.reconnectBackoffMs) {
    return exponentialBackoff({
      baseDelayMs: config.reconnectBackoffMs,
      maxDelayMs: config.reconnectBackoffMaxMs,
      jitterFactor: 0.1,
    });
  }
  return fixedBackoff(config.reconnectBackoffMs);
}

export class StationSession {
  readonly done: Promise<void>;
  private state: SessionState = "connecting";
  private reader: StreamReader | null = null;
  private readonly accumulator: SegmentAccumulator;
  private readonly queue: BoundedQueue<AudioSegment>;
  private readonly abortController = new AbortController();
  private readonly clock: Clock;
  private readonly rules: readonly ContestRule[];
  private readonly stats: SessionStats;
  private started = false;
  private stopRequested = false;
  private workerPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private resolveDone: () => void = () => undefined;

  constructor(
    readonly station: StationIdentity,
    private readonly config: MonitorConfig,
    private readonly deps: StationSessionDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.rules = deps.rules ?? DEFAULT_CONTEST_RULES;
    this.accumulator = new SegmentAccumulator(
      station.id,
      {
        targetBytes: config.segmentTargetBytes,
        maxWaitMs: config.segmentMaxWaitMs,
        hardCapBytes: config.segmentHardCapBytes,
        assumedBytesPerSecond: config.assumedBytesPerSecond,
      },
      this.clock
    );
    this.queue = new BoundedQueue<AudioSegment>(config.segmentQueueSize);
    this.stats = {
      reconnectCount: 0,
      bytesReceived: 0,
      segmentsEmitted: 0,
      segmentsDropped: 0,
      decodeFailures: 0,
      transcriptionFailures: 0,
      transcripts: 0,
      matches: 0,
      lastError: null,
      stateChangedAt: this.clock.now(),
    };
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get stationId(): string {
    return this.station.id;
  }

  get currentState(): SessionState {
    return this.state;
  }

  getStatus(): SessionStatus {
    return {
      stationId: this.station.id,
      displayName: this.station.displayName,
      state: this.state,
      bufferedBytes: this.accumulator.bufferedBytes,
      queuedSegments: this.queue.size,
      nextSequenceNumber: this.accumulator.nextSequenceNumber,
      stats: { ...this.stats },
    };
  }

  start(): void {
    if (this.started || this.stopRequested) {
      return;
    }
    this.started = true;
    log(`Starting session for ${this.station.displayName}`, "session");
    this.run().catch((error: unknown) => {
      log(`[Session:${this.station.displayName}] Unexpected failure: ${errorMessage(error)}`, "session");
      return this.stop(`unexpected failure: ${errorMessage(error)}`);
    });
  }

  /**
   * Stops the session. Resolves once the reader and worker have exited, or
   * once the join timeout passes, whichever comes first; the state is
   * `stopped` either way.
   */
  stop(reason: string = "stop requested"): Promise<void> {
    if (!this.stopPromise) {
      this.stopRequested = true;
      this.abortController.abort();
      const discarded = this.queue.close();
      if (discarded.length > 0) {
        logDebug(
          `[Session:${this.station.displayName}] Discarding ${discarded.length} queued segments on stop`,
          "session"
        );
      }
      this.stopPromise = this.shutdown(reason);
    }
    return this.stopPromise;
  }

  private async shutdown(reason: string): Promise<void> {
    const pending = Promise.allSettled([
      this.reader ? this.reader.stop() : Promise.resolve(),
      this.workerPromise ?? Promise.resolve(),
    ]);

    const joined = await settleWithin(pending, this.config.joinTimeoutMs);
    if (!joined) {
      log(
        `[Session:${this.station.displayName}] Pipeline did not finish within ${this.config.joinTimeoutMs}ms; releasing anyway`,
        "session"
      );
    }

    this.transition("stopped", reason);
    this.resolveDone();
  }

  private async run(): Promise<void> {
    let station: StationIdentity;
    try {
      station = await this.resolveStation();
    } catch (error) {
      if (this.stopRequested) {
        logDebug(`[Session:${this.station.displayName}] Station lookup ended after stop: ${errorMessage(error)}`, "session");
        return;
      }
      const configError =
        error instanceof ConfigurationError
          ? error
          : new ConfigurationError(`station lookup failed: ${errorMessage(error)}`, {
              stationId: this.station.id,
              cause: error,
            });
      this.reportError(configError);
      await this.stop(configError.message);
      return;
    }

    if (this.stopRequested) {
      return;
    }

    this.workerPromise = this.processSegments();
    this.reader = new StreamReader(
      station,
      {
        onConnected: (attempt) => this.handleConnected(attempt),
        onChunk: (chunk) => this.handleChunk(chunk),
        onDisconnected: (error, attempt) => this.handleDisconnected(error, attempt),
      },
      {
        chunkSizeBytes: this.config.chunkSizeBytes,
        connectTimeoutMs: this.config.connectTimeoutMs,
        readTimeoutMs: this.config.readTimeoutMs,
        backoff: this.deps.backoff ?? backoffFromConfig(this.config),
        userAgent: this.config.userAgent,
        clock: this.clock,
        fetchImpl: this.deps.fetchImpl,
      }
    );
    await this.reader.start();
  }

  private async resolveStation(): Promise<StationIdentity> {
    const context = { stationId: this.station.id };

    if (!this.station.id.trim()) {
      throw new ConfigurationError("station id is empty", context);
    }
    if (isStreamUrl(this.station.streamURL)) {
      return this.station;
    }
    if (!this.deps.directory) {
      throw new ConfigurationError(
        `station ${this.station.displayName} has no valid stream URL (${this.station.streamURL || "empty"})`,
        context
      );
    }

    const resolved = await this.deps.directory.resolveStreamURL(this.station.id);
    if (!resolved || !isStreamUrl(resolved)) {
      throw new ConfigurationError(
        `could not resolve a stream URL for ${this.station.displayName} via ${this.deps.directory.name}`,
        context
      );
    }

    log(`Resolved stream URL for ${this.station.displayName} via ${this.deps.directory.name}`, "session");
    return { ...this.station, streamURL: resolved };
  }

  private handleConnected(attempt: number): void {
    if (this.stopRequested) return;
    this.transition("streaming", attempt === 1 ? "connected" : `connected on attempt ${attempt}`);
  }

  private handleDisconnected(error: ConnectionError, attempt: number): void {
    if (this.stopRequested) return;
    this.stats.reconnectCount++;
    this.reportError(error);
    logDebug(`[Session:${this.station.displayName}] attempt ${attempt} failed (${error.kind})`, "session");
    this.transition("reconnecting", error.message);
  }

  private handleChunk(chunk: RawChunk): void {
    if (this.stopRequested) return;
    this.stats.bytesReceived += chunk.bytes.length;

    for (const segment of this.accumulator.addChunk(chunk.bytes, chunk.receivedAt)) {
      this.enqueueSegment(segment);
    }
  }

  private enqueueSegment(segment: AudioSegment): void {
    this.stats.segmentsEmitted++;
    logDebug(
      `[Session:${this.station.displayName}] segment #${segment.sequenceNumber} ready (${segment.payload.length} bytes, ${segment.flushReason})`,
      "session"
    );

    const evicted = this.queue.push(segment);
    if (evicted) {
      this.stats.segmentsDropped++;
      log(
        `[Session:${this.station.displayName}] Segment queue full, dropped oldest segment #${evicted.sequenceNumber}`,
        "session"
      );
      this.deps.emit({
        type: "segment_dropped",
        stationId: this.station.id,
        sequenceNumber: evicted.sequenceNumber,
        reason: "queue_full",
        at: this.clock.now(),
      });
    }
  }

  private async processSegments(): Promise<void> {
    for (;;) {
      const segment = await this.queue.next();
      if (!segment || this.stopRequested) {
        return;
      }
      await this.processSegment(segment);
    }
  }

  private async processSegment(segment: AudioSegment): Promise<void> {
    const signal = this.abortController.signal;
    const context = { stationId: segment.stationId, sequenceNumber: segment.sequenceNumber };

    let pcm: PcmAudio;
    try {
      pcm = await this.deps.decoder.decode(segment, signal);
    } catch (error) {
      if (this.stopRequested) {
        logDebug(`[Session:${this.station.displayName}] decode interrupted by stop`, "session");
        return;
      }
      this.stats.decodeFailures++;
      this.reportError(
        error instanceof DecodeError
          ? error
          : new DecodeError(`decode failed: ${errorMessage(error)}`, { ...context, cause: error })
      );
      return;
    }

    if (this.stopRequested) return;

    let text: string;
    try {
      text = await this.deps.transcription.transcribe(pcm, context, signal);
    } catch (error) {
      if (this.stopRequested) {
        logDebug(`[Session:${this.station.displayName}] transcription interrupted by stop`, "session");
        return;
      }
      this.stats.transcriptionFailures++;
      this.reportError(
        error instanceof TranscriptionError
          ? error
          : new TranscriptionError(`transcription failed: ${errorMessage(error)}`, { ...context, cause: error })
      );
      return;
    }

    if (this.stopRequested) return;

    const producedAt = this.clock.now();
    const result: TranscriptResult = {
      stationId: this.station.id,
      sequenceNumber: segment.sequenceNumber,
      text,
      producedAt,
    };
    this.stats.transcripts++;
    this.deps.emit({ type: "transcript", result });

    const detection = detectContest(text, this.rules);
    if (!detection) {
      return;
    }

    const match: ContestMatch = {
      id: uuidv4(),
      stationId: this.station.id,
      displayName: this.station.displayName,
      sequenceNumber: segment.sequenceNumber,
      matchedKeyword: detection.matchedKeyword,
      text,
      detectedAt: producedAt,
    };
    this.stats.matches++;
    this.deps.emit({ type: "contest_match", match });
  }

  private reportError(error: PipelineError): void {
    this.stats.lastError = error.message;
    this.deps.emit({
      type: "pipeline_error",
      stationId: this.station.id,
      sequenceNumber: error.sequenceNumber,
      errorType: error.type,
      message: error.message,
      at: this.clock.now(),
    });
  }

  private transition(next: SessionState, reason: string | null): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    if (!TRANSITIONS[previous].includes(next)) {
      log(`[Session:${this.station.displayName}] Ignoring invalid transition ${previous} -> ${next}`, "session");
      return;
    }

    this.state = next;
    this.stats.stateChangedAt = this.clock.now();
    this.deps.emit({
      type: "session_state",
      stationId: this.station.id,
      displayName: this.station.displayName,
      state: next,
      previousState: previous,
      reason,
      at: this.stats.stateChangedAt,
    });
  }
}
