import type { PipelineErrorType } from "@shared/schema";

export interface PipelineErrorContext {
  stationId?: string;
  sequenceNumber?: number;
  cause?: unknown;
}

/**
 * Base class for everything a station pipeline reports. Subclasses decide
 * whether the session retries, drops a segment, or stops.
 */
export abstract class PipelineError extends Error {
  abstract readonly type: PipelineErrorType;
  readonly stationId: string | null;
  readonly sequenceNumber: number | null;

  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.stationId = context.stationId ?? null;
    this.sequenceNumber = context.sequenceNumber ?? null;
  }
}

export type ConnectionFailureKind = "status" | "timeout" | "ended" | "network" | "no_body";

/** Network-level failure. Retried with backoff for as long as the session runs. */
export class ConnectionError extends PipelineError {
  readonly type = "ConnectionError" as const;
  readonly kind: ConnectionFailureKind;
  readonly status: number | null;

  constructor(
    message: string,
    kind: ConnectionFailureKind,
    context: PipelineErrorContext & { status?: number } = {}
  ) {
    super(message, context);
    this.name = "ConnectionError";
    this.kind = kind;
    this.status = context.status ?? null;
  }
}

/** The codec could not turn a segment into PCM. The segment is dropped. */
export class DecodeError extends PipelineError {
  readonly type = "DecodeError" as const;

  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context);
    this.name = "DecodeError";
  }
}

/** The engine threw or returned nothing usable. The segment is dropped. */
export class TranscriptionError extends PipelineError {
  readonly type = "TranscriptionError" as const;

  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context);
    this.name = "TranscriptionError";
  }
}

/** Invalid station identity or unresolvable stream URL. Terminates the session. */
export class ConfigurationError extends PipelineError {
  readonly type = "ConfigurationError" as const;

  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context);
    this.name = "ConfigurationError";
  }
}
