/**
 * Segment Accumulator
 *
 * Buffers a station's raw stream bytes and cuts them into AudioSegments.
 * A segment is flushed when the buffer reaches the target size or when the
 * max wait has elapsed since the last flush, whichever comes first. A hard
 * cap bounds the buffer if both triggers stall.
 *
 * Sequence numbers start at 0 and grow by exactly one per emitted segment.
 * The accumulator outlives reconnects, so numbering never restarts.
 */

import type { AudioSegment, FlushReason } from "@shared/schema";
import { systemClock, type Clock } from "../../lib/reliability";

export interface SegmentAccumulatorConfig {
  targetBytes: number;
  maxWaitMs: number;
  hardCapBytes: number;
  /** Used only to estimate segment duration. */
  assumedBytesPerSecond: number;
}

// 960,000 bytes at 32,000 B/s (256 kbps) is about 30 seconds of audio.
export const DEFAULT_ACCUMULATOR_CONFIG: SegmentAccumulatorConfig = {
  targetBytes: 960_000,
  maxWaitMs: 30_000,
  hardCapBytes: 3_840_000,
  assumedBytesPerSecond: 32_000,
};

export class SegmentAccumulator {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private lastFlushAt: number;
  private nextSequence = 0;

  constructor(
    readonly stationId: string,
    private readonly config: SegmentAccumulatorConfig = DEFAULT_ACCUMULATOR_CONFIG,
    private readonly clock: Clock = systemClock
  ) {
    if (config.targetBytes <= 0 || config.maxWaitMs <= 0 || config.assumedBytesPerSecond <= 0) {
      throw new RangeError("targetBytes, maxWaitMs and assumedBytesPerSecond must be positive");
    }
    if (config.hardCapBytes < config.targetBytes) {
      throw new RangeError(
        `hardCapBytes (${config.hardCapBytes}) must be at least targetBytes (${config.targetBytes})`
      );
    }
    this.lastFlushAt = clock.now();
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  get nextSequenceNumber(): number {
    return this.nextSequence;
  }

  get lastFlushTime(): number {
    return this.lastFlushAt;
  }

  /**
   * Appends a chunk and returns the segments it completes, oldest first.
   * That is at most one, except when a forced flush is followed by a chunk
   * that reaches the target on its own.
   */
  addChunk(bytes: Uint8Array, receivedAt: number = this.clock.now()): AudioSegment[] {
    const segments: AudioSegment[] = [];

    if (this.buffered + bytes.length > this.config.hardCapBytes) {
      if (this.buffered === 0 || bytes.length > this.config.hardCapBytes) {
        // Oversized chunk: it goes straight out with whatever was buffered.
        this.append(bytes);
        pushSegment(segments, this.flush("hard_cap", receivedAt));
        return segments;
      }
      pushSegment(segments, this.flush("hard_cap", receivedAt));
    }

    this.append(bytes);

    if (this.buffered >= this.config.targetBytes) {
      pushSegment(segments, this.flush("size", receivedAt));
    } else if (receivedAt - this.lastFlushAt >= this.config.maxWaitMs) {
      pushSegment(segments, this.flush("time", receivedAt));
    }
    return segments;
  }

  private append(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return;
    }
    this.chunks.push(Buffer.from(bytes));
    this.buffered += bytes.length;
  }

  private flush(reason: FlushReason, now: number): AudioSegment | null {
    if (this.buffered === 0) {
      return null;
    }

    const payload = Buffer.concat(this.chunks, this.buffered);
    const segment: AudioSegment = Object.freeze({
      stationId: this.stationId,
      payload,
      approxDurationSeconds: payload.length / this.config.assumedBytesPerSecond,
      sequenceNumber: this.nextSequence,
      flushReason: reason,
      createdAt: now,
    });

    this.nextSequence++;
    this.chunks = [];
    this.buffered = 0;
    this.lastFlushAt = now;
    return segment;
  }
}

function pushSegment(segments: AudioSegment[], segment: AudioSegment | null): void {
  if (segment) {
    segments.push(segment);
  }
}
