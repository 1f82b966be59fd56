/**
 * Audio Decoder for the transcription pipeline
 *
 * Converts a compressed stream segment (MP3/AAC/OGG, whatever the station
 * serves) into PCM16LE mono at one fixed sample rate, so every station
 * hands the transcription stage the same input format.
 *
 * The codec work is delegated to ffmpeg. This module owns the temp
 * directory each decode uses and removes it on every exit path.
 */

import { spawn } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { AudioSegment } from "@shared/schema";
import { log, logDebug, errorMessage } from "../logger";
import { DecodeError } from "../monitor/errors";
import { pcmDurationSeconds } from "./wav";

export const TARGET_SAMPLE_RATE = 16000;
const CHANNELS = 1;
const STDERR_TAIL_BYTES = 2000;

export interface PcmAudio {
  data: Buffer;
  sampleRate: number;
  channels: 1;
  durationSeconds: number;
}

export interface CodecJob {
  inputPath: string;
  outputPath: string;
  sampleRate: number;
  signal?: AbortSignal;
}

/** Reads `inputPath` and writes raw PCM16LE mono to `outputPath`. */
export type CodecRunner = (job: CodecJob) => Promise<void>;

export interface SegmentDecoder {
  decode(segment: AudioSegment, signal?: AbortSignal): Promise<PcmAudio>;
}

export interface AudioDecoderConfig {
  sampleRate?: number;
  tmpRoot?: string;
  ffmpegPath?: string;
  runner?: CodecRunner;
}

export function buildFfmpegArgs(job: CodecJob): string[] {
  return [
    "-hide_banner",
    "-loglevel", "error",
    "-nostdin",
    "-y",
    "-i", job.inputPath,
    "-vn",
    "-ac", String(CHANNELS),
    "-ar", String(job.sampleRate),
    "-f", "s16le",
    "-acodec", "pcm_s16le",
    job.outputPath,
  ];
}

export function createFfmpegRunner(ffmpegPath: string = "ffmpeg"): CodecRunner {
  return (job) =>
    new Promise<void>((resolve, reject) => {
      let settled = false;
      let stderr = "";

      const settle = (error: DecodeError | null) => {
        if (settled) return;
        settled = true;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const child = spawn(ffmpegPath, buildFfmpegArgs(job), {
        stdio: ["ignore", "ignore", "pipe"],
        signal: job.signal,
      });

      child.stderr?.on("data", (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-STDERR_TAIL_BYTES);
      });

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          settle(new DecodeError(`ffmpeg not found at "${ffmpegPath}"`, { cause: error }));
        } else if (error.name === "AbortError") {
          settle(new DecodeError("decode aborted", { cause: error }));
        } else {
          settle(new DecodeError(`failed to run ffmpeg: ${error.message}`, { cause: error }));
        }
      });

      child.on("close", (code, signal) => {
        if (code === 0) {
          settle(null);
          return;
        }
        const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
        settle(new DecodeError(`ffmpeg exited with ${code !== null ? `code ${code}` : `signal ${signal}`}${detail}`));
      });
    });
}

export class AudioDecoder implements SegmentDecoder {
  private readonly sampleRate: number;
  private readonly tmpRoot: string;
  private readonly runner: CodecRunner;

  constructor(config: AudioDecoderConfig = {}) {
    this.sampleRate = config.sampleRate || TARGET_SAMPLE_RATE;
    this.tmpRoot = config.tmpRoot || os.tmpdir();
    this.runner = config.runner || createFfmpegRunner(config.ffmpegPath);
  }

  async decode(segment: AudioSegment, signal?: AbortSignal): Promise<PcmAudio> {
    const context = { stationId: segment.stationId, sequenceNumber: segment.sequenceNumber };

    if (segment.payload.length === 0) {
      throw new DecodeError("segment is empty", context);
    }

    let workDir: string | null = null;
    try {
      workDir = await fs.mkdtemp(path.join(this.tmpRoot, `segment-${safeName(segment.stationId)}-`));
      const inputPath = path.join(workDir, "input.audio");
      const outputPath = path.join(workDir, "output.pcm");

      await fs.writeFile(inputPath, segment.payload);
      await this.runner({ inputPath, outputPath, sampleRate: this.sampleRate, signal });

      const data = await fs.readFile(outputPath);
      if (data.length < 2) {
        throw new DecodeError("codec produced no audio", context);
      }

      logDebug(
        `[AudioDecoder] ${segment.stationId}#${segment.sequenceNumber}: ${segment.payload.length} bytes -> ${data.length} PCM bytes`,
        "stt"
      );

      return {
        data,
        sampleRate: this.sampleRate,
        channels: CHANNELS,
        durationSeconds: pcmDurationSeconds(data, this.sampleRate),
      };
    } catch (error) {
      throw toDecodeError(error, context);
    } finally {
      if (workDir) {
        await removeWorkDir(workDir);
      }
    }
  }
}

async function removeWorkDir(workDir: string): Promise<void> {
  try {
    await fs.rm(workDir, { recursive: true, force: true });
  } catch (error) {
    log(`[AudioDecoder] Failed to remove ${workDir}: ${errorMessage(error)}`, "stt");
  }
}

function toDecodeError(error: unknown, context: { stationId: string; sequenceNumber: number }): DecodeError {
  if (error instanceof DecodeError) {
    return error.stationId === null
      ? new DecodeError(error.message, { ...context, cause: error.cause ?? error })
      : error;
  }
  return new DecodeError(`decode failed: ${errorMessage(error)}`, { ...context, cause: error });
}

function safeName(stationId: string): string {
  return stationId.replace(/[^a-zA-Z0-9-]/g, "_").slice(0, 48) || "station";
}
