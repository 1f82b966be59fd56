import { createServer } from "http";
import { getEnv } from "./src/config/env";
import { log, logError, errorMessage } from "./logger";
import { createApp } from "./app";
import { createMonitorStream } from "./realtimeMessaging";
import { monitorConfigFromEnv } from "./config/monitor";
import { RadioBrowserDirectory } from "./directory/radioBrowser";
import { StaticStationDirectory, type StationDirectory } from "./directory/stationDirectory";
import { AudioDecoder, TranscriptionStage, WhisperTranscriber, isWhisperConfigured } from "./stt";
import {
  DEFAULT_CONTEST_RULES,
  LogSink,
  getSupervisor,
  initializeMonitor,
  loadContestRules,
  startMonitoring,
  stopMonitoring,
} from "./monitor";
import { startMonitorStatusReport, stopMonitorStatusReport } from "./jobs/monitorStatusReport";
import { transcriptionBreaker } from "../lib/reliability";

export { log };

const env = getEnv();
const config = monitorConfigFromEnv(env);

const app = createApp(env.APP_NAME);
const httpServer = createServer(app);
const monitorStream = createMonitorStream(httpServer);

httpServer.on("upgrade", (request, socket, head) => {
  monitorStream.handleUpgrade(request, socket, head);
});

function buildDirectory(): StationDirectory {
  if (env.STATIONS_FILE) {
    log(`Using static station list from ${env.STATIONS_FILE}`, "startup");
    return StaticStationDirectory.fromFile(env.STATIONS_FILE);
  }
  return new RadioBrowserDirectory({
    apiBaseUrl: env.RADIO_BROWSER_URL,
    userAgent: config.userAgent,
  });
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log(`${signal} received, stopping all stations`, "startup");

  stopMonitorStatusReport();
  stopMonitoring();
  const report = await getSupervisor().waitForShutdown();
  log(
    `Shutdown complete: ${report.stoppedStations.length} stopped, ${report.timedOutStations.length} timed out`,
    "startup"
  );

  monitorStream.close();
  httpServer.close();
}

(async () => {
  const rules = env.CONTEST_RULES_FILE ? loadContestRules(env.CONTEST_RULES_FILE) : DEFAULT_CONTEST_RULES;
  log(`Loaded ${rules.length} contest rules`, "startup");

  initializeMonitor({
    config,
    directory: buildDirectory(),
    decoder: new AudioDecoder({ sampleRate: config.sampleRate, ffmpegPath: env.FFMPEG_PATH }),
    transcription: new TranscriptionStage(
      new WhisperTranscriber({ apiKey: env.OPENAI_API_KEY, model: env.TRANSCRIPTION_MODEL }),
      { language: config.language, breaker: transcriptionBreaker }
    ),
    rules,
    sinks: [new LogSink({ includeTranscripts: env.LOG_LEVEL === "debug" }), monitorStream],
  });

  startMonitorStatusReport(env.STATUS_REPORT_CRON);

  process.once("SIGINT", () => {
    shutdown("SIGINT").catch((error: unknown) => {
      logError(`Shutdown failed: ${errorMessage(error)}`, "startup");
      process.exit(1);
    });
  });
  process.once("SIGTERM", () => {
    shutdown("SIGTERM").catch((error: unknown) => {
      logError(`Shutdown failed: ${errorMessage(error)}`, "startup");
      process.exit(1);
    });
  });

  httpServer.listen(env.PORT, "0.0.0.0", () => {
    log(`serving on port ${env.PORT} (websocket: ${monitorStream.path})`, "startup");
  });

  if (env.AUTO_START === "true") {
    if (!isWhisperConfigured()) {
      log("AUTO_START ignored: OPENAI_API_KEY is not configured", "startup");
      return;
    }
    const result = await startMonitoring(config.maxConcurrent, {
      countryCode: env.STATION_COUNTRY,
      tag: env.STATION_TAG,
      language: env.STATION_LANGUAGE,
    });
    log(
      `Auto-start: ${result.stationsFound} stations found, ${result.started.length} started, ${result.rejected.length} rejected`,
      "startup"
    );
  }
})().catch((error: unknown) => {
  logError(`Startup failed: ${errorMessage(error)}`, "startup");
  process.exit(1);
});
