export type LogSource =
  | "express"
  | "api"
  | "monitor"
  | "session"
  | "stream"
  | "stt"
  | "detector"
  | "directory"
  | "realtime"
  | "reliability"
  | "jobs"
  | "startup";

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source: LogSource = "express"): void {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, source: LogSource = "express"): void {
  console.error(`${timestamp()} [${source}] ${message}`);
}

/**
 * Chatty per-chunk output. Only printed with LOG_LEVEL=debug.
 */
export function logDebug(message: string, source: LogSource = "express"): void {
  if (process.env.LOG_LEVEL === "debug") {
    log(message, source);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
