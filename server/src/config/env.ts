/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for all environment variables.
 * Import this module early to catch bad config before app startup.
 */

import { z } from "zod";

const AppEnvSchema = z.enum(["development", "staging", "production"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default("radio-contest-monitor"),
  APP_ENV: AppEnvSchema.default("development"),
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  LOG_LEVEL: LogLevelSchema.default("info"),

  OPENAI_API_KEY: z.string().optional(),
  TRANSCRIPTION_MODEL: z.string().min(1).default("whisper-1"),
  TRANSCRIPTION_LANGUAGE: z.string().min(2).default("en"),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  DECODE_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),

  RADIO_BROWSER_URL: z.string().url().default("https://de1.api.radio-browser.info"),
  STATIONS_FILE: z.string().optional(),
  STATION_COUNTRY: z.string().length(2).optional(),
  STATION_TAG: z.string().optional(),
  STATION_LANGUAGE: z.string().optional(),
  CONTEST_RULES_FILE: z.string().optional(),

  MAX_CONCURRENT_STATIONS: z.coerce.number().int().positive().default(5),
  STREAM_CHUNK_BYTES: z.coerce.number().int().positive().default(32768),
  STREAM_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  STREAM_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RECONNECT_BACKOFF_MS: z.coerce.number().int().nonnegative().default(5000),
  RECONNECT_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(0),
  SEGMENT_TARGET_BYTES: z.coerce.number().int().positive().default(960000),
  SEGMENT_MAX_WAIT_MS: z.coerce.number().int().positive().default(30000),
  SEGMENT_HARD_CAP_BYTES: z.coerce.number().int().positive().optional(),
  ASSUMED_BYTES_PER_SECOND: z.coerce.number().int().positive().default(32000),
  SEGMENT_QUEUE_SIZE: z.coerce.number().int().positive().default(3),
  SESSION_JOIN_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  STATUS_REPORT_CRON: z.string().default("*/5 * * * *"),
  AUTO_START: z.enum(["true", "false"]).default("false"),
}).superRefine((env, ctx) => {
  if (env.SEGMENT_HARD_CAP_BYTES !== undefined && env.SEGMENT_HARD_CAP_BYTES < env.SEGMENT_TARGET_BYTES) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["SEGMENT_HARD_CAP_BYTES"],
      message: `Must be at least SEGMENT_TARGET_BYTES (${env.SEGMENT_TARGET_BYTES})`,
    });
  }
});

export type Env = z.infer<typeof EnvSchema>;
export type AppEnv = z.infer<typeof AppEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

let _env: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): ReturnType<typeof EnvSchema.safeParse> {
  return EnvSchema.safeParse(source);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    const missingVars: string[] = [];
    const invalidVars: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missingVars.push(path);
      } else {
        invalidVars.push(`${path}: ${issue.message}`);
      }
    }

    const errorMessages: string[] = [];

    if (missingVars.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${missingVars.join("\n  - ")}`);
    }

    if (invalidVars.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${invalidVars.join("\n  - ")}`);
    }

    console.error(
      `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\n${errorMessages.join("\n\n")}\n\nRefer to .env.example for supported variables.\n${"=".repeat(60)}\n`
    );
    process.exit(1);
  }

  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}
