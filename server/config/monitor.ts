/**
 * Monitor Configuration
 *
 * Tunables for ingestion, segmentation and shutdown. Core classes take this
 * plain object; only the bootstrap maps it from the environment.
 */

import type { Env } from "../src/config/env";

export interface MonitorConfig {
  maxConcurrent: number;
  chunkSizeBytes: number;
  connectTimeoutMs: number;
  /** Upper bound on one body read; also the cancellation granularity. */
  readTimeoutMs: number;
  reconnectBackoffMs: number;
  /** 0 keeps the backoff fixed; otherwise the delay doubles up to this cap. */
  reconnectBackoffMaxMs: number;
  segmentTargetBytes: number;
  segmentMaxWaitMs: number;
  segmentHardCapBytes: number;
  assumedBytesPerSecond: number;
  segmentQueueSize: number;
  sampleRate: number;
  language: string;
  joinTimeoutMs: number;
  userAgent: string;
}

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  maxConcurrent: 5,
  chunkSizeBytes: 32 * 1024,
  connectTimeoutMs: 10000,
  readTimeoutMs: 10000,
  reconnectBackoffMs: 5000,
  reconnectBackoffMaxMs: 0,
  segmentTargetBytes: 960_000,
  segmentMaxWaitMs: 30000,
  segmentHardCapBytes: 3_840_000,
  assumedBytesPerSecond: 32_000,
  segmentQueueSize: 3,
  sampleRate: 16000,
  language: "en",
  joinTimeoutMs: 15000,
  userAgent: "radio-contest-monitor/1.0",
};

export function monitorConfigFromEnv(env: Env): MonitorConfig {
  return {
    maxConcurrent: env.MAX_CONCURRENT_STATIONS,
    chunkSizeBytes: env.STREAM_CHUNK_BYTES,
    connectTimeoutMs: env.STREAM_CONNECT_TIMEOUT_MS,
    readTimeoutMs: env.STREAM_READ_TIMEOUT_MS,
    reconnectBackoffMs: env.RECONNECT_BACKOFF_MS,
    reconnectBackoffMaxMs: env.RECONNECT_BACKOFF_MAX_MS,
    segmentTargetBytes: env.SEGMENT_TARGET_BYTES,
    segmentMaxWaitMs: env.SEGMENT_MAX_WAIT_MS,
    segmentHardCapBytes: env.SEGMENT_HARD_CAP_BYTES ?? env.SEGMENT_TARGET_BYTES * 4,
    assumedBytesPerSecond: env.ASSUMED_BYTES_PER_SECOND,
    segmentQueueSize: env.SEGMENT_QUEUE_SIZE,
    sampleRate: env.DECODE_SAMPLE_RATE,
    language: env.TRANSCRIPTION_LANGUAGE,
    joinTimeoutMs: env.SESSION_JOIN_TIMEOUT_MS,
    userAgent: `${env.APP_NAME}/1.0`,
  };
}
