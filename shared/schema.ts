import { z } from "zod";

// ============================================
// STATIONS
// ============================================

export const stationIdentitySchema = z.object({
  id: z.string().trim().min(1, "Station id is required"),
  displayName: z.string().trim().min(1, "Station name is required"),
  streamURL: z.string(),
});

export type StationIdentity = z.infer<typeof stationIdentitySchema>;

export const stationFilterSchema = z.object({
  countryCode: z.string().length(2).optional(),
  tag: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
  limit: z.number().int().positive().max(500).optional(),
});

export type StationFilter = z.infer<typeof stationFilterSchema>;

// ============================================
// SESSION STATE
// ============================================

export const SESSION_STATES = ["connecting", "streaming", "reconnecting", "stopped"] as const;
export const sessionStateSchema = z.enum(SESSION_STATES);
export type SessionState = z.infer<typeof sessionStateSchema>;

export const PIPELINE_ERROR_TYPES = [
  "ConnectionError",
  "DecodeError",
  "TranscriptionError",
  "ConfigurationError",
] as const;
export type PipelineErrorType = (typeof PIPELINE_ERROR_TYPES)[number];

// ============================================
// PIPELINE PAYLOADS
// ============================================

export interface RawChunk {
  stationId: string;
  bytes: Buffer;
  receivedAt: number;
}

export type FlushReason = "size" | "time" | "hard_cap";

export interface AudioSegment {
  readonly stationId: string;
  readonly payload: Buffer;
  readonly approxDurationSeconds: number;
  readonly sequenceNumber: number;
  readonly flushReason: FlushReason;
  readonly createdAt: number;
}

export interface TranscriptResult {
  stationId: string;
  sequenceNumber: number;
  text: string;
  producedAt: number;
}

export interface ContestMatch {
  id: string;
  stationId: string;
  displayName: string;
  sequenceNumber: number;
  matchedKeyword: string;
  text: string;
  detectedAt: number;
}

export interface SessionStats {
  reconnectCount: number;
  bytesReceived: number;
  segmentsEmitted: number;
  segmentsDropped: number;
  decodeFailures: number;
  transcriptionFailures: number;
  transcripts: number;
  matches: number;
  lastError: string | null;
  stateChangedAt: number;
}

export interface SessionStatus {
  stationId: string;
  displayName: string;
  state: SessionState;
  bufferedBytes: number;
  queuedSegments: number;
  nextSequenceNumber: number;
  stats: SessionStats;
}

// ============================================
// MONITOR EVENTS (delivered to result sinks)
// ============================================

export interface TranscriptEvent {
  type: "transcript";
  result: TranscriptResult;
}

export interface ContestMatchEvent {
  type: "contest_match";
  match: ContestMatch;
}

export interface SessionStateEvent {
  type: "session_state";
  stationId: string;
  displayName: string;
  state: SessionState;
  previousState: SessionState;
  reason: string | null;
  at: number;
}

export interface SegmentDroppedEvent {
  type: "segment_dropped";
  stationId: string;
  sequenceNumber: number;
  reason: "queue_full";
  at: number;
}

export interface PipelineErrorEvent {
  type: "pipeline_error";
  stationId: string;
  sequenceNumber: number | null;
  errorType: PipelineErrorType;
  message: string;
  at: number;
}

export interface MonitorStoppedEvent {
  type: "monitor_stopped";
  stoppedStations: string[];
  timedOutStations: string[];
  at: number;
}

export type MonitorEvent =
  | TranscriptEvent
  | ContestMatchEvent
  | SessionStateEvent
  | SegmentDroppedEvent
  | PipelineErrorEvent
  | MonitorStoppedEvent;

export type MonitorEventType = MonitorEvent["type"];

export const MONITOR_EVENT_TYPES = [
  "transcript",
  "contest_match",
  "session_state",
  "segment_dropped",
  "pipeline_error",
  "monitor_stopped",
] as const satisfies readonly MonitorEventType[];

// ============================================
// CONTROL SURFACE REQUESTS
// ============================================

export const startMonitoringRequestSchema = z.object({
  maxConcurrent: z.number().int().positive().max(100),
  filter: stationFilterSchema.optional(),
  stations: z.array(stationIdentitySchema).min(1).optional(),
});

export type StartMonitoringRequest = z.infer<typeof startMonitoringRequestSchema>;

export const setMaxConcurrentRequestSchema = z.object({
  maxConcurrent: z.number().int().positive().max(100),
});

export type SetMaxConcurrentRequest = z.infer<typeof setMaxConcurrentRequestSchema>;
