/**
 * Transcription Stage
 *
 * Wraps a Transcriber call for one decoded segment. Engine exceptions and
 * empty output are both turned into TranscriptionError so the session can
 * drop the segment instead of raising an alert on garbage text.
 *
 * The stage holds no per-call state, so any number of stations can
 * transcribe through one instance at the same time.
 */

import { errorMessage, logDebug } from "../logger";
import { TranscriptionError } from "../monitor/errors";
import { withCircuitBreaker, type CircuitBreaker } from "../../lib/reliability";
import type { PcmAudio } from "./audio_decoder";
import type { Transcriber } from "./transcriber";

export interface SegmentContext {
  stationId: string;
  sequenceNumber: number;
}

export interface SegmentTranscriber {
  transcribe(pcm: PcmAudio, context: SegmentContext, signal?: AbortSignal): Promise<string>;
}

export interface TranscriptionStageConfig {
  language: string;
  breaker?: CircuitBreaker;
}

export function normalizeTranscript(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export class TranscriptionStage implements SegmentTranscriber {
  constructor(
    private readonly transcriber: Transcriber,
    private readonly config: TranscriptionStageConfig
  ) {}

  get language(): string {
    return this.config.language;
  }

  async transcribe(pcm: PcmAudio, context: SegmentContext, signal?: AbortSignal): Promise<string> {
    const call = () => this.transcriber.transcribe(pcm, { language: this.config.language, signal });

    let raw: string;
    try {
      raw = this.config.breaker ? await withCircuitBreaker(call, this.config.breaker) : await call();
    } catch (error) {
      throw new TranscriptionError(`${this.transcriber.name} failed: ${errorMessage(error)}`, {
        ...context,
        cause: error,
      });
    }

    const text = normalizeTranscript(raw);
    if (!text) {
      throw new TranscriptionError(`${this.transcriber.name} returned no text`, context);
    }

    logDebug(
      `[Transcription] ${context.stationId}#${context.sequenceNumber}: ${text.length} chars from ${pcm.durationSeconds.toFixed(1)}s`,
      "stt"
    );
    return text;
  }
}
