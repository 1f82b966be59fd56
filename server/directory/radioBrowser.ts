/**
 * Radio Browser Station Directory
 *
 * Looks up stations and their stream URLs in the public Radio Browser
 * directory (https://www.radio-browser.info).
 *
 * API:
 *   GET /json/stations/search?countrycode=..&tag=..&language=..&limit=..
 *   GET /json/stations/byuuid/{uuid}
 *
 * Transient failures (timeouts, 429, 5xx) are retried with jittered backoff
 * behind the directory circuit breaker; anything left over is logged and
 * reported as "no stations" / "no URL".
 */

import { z } from "zod";
import type { StationFilter, StationIdentity } from "@shared/schema";
import { log, errorMessage } from "../logger";
import {
  directoryBreaker,
  isRetryableError,
  withReliability,
  type CircuitBreaker,
  type RetryConfig,
} from "../../lib/reliability";
import { isStreamUrl, type StationDirectory } from "./stationDirectory";

const DEFAULT_API_BASE_URL = "https://de1.api.radio-browser.info";
const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_LIMIT = 25;

const radioBrowserStationSchema = z.object({
  stationuuid: z.string().min(1),
  name: z.string(),
  url: z.string(),
  url_resolved: z.string().optional(),
  codec: z.string().optional(),
  bitrate: z.number().optional(),
  lastcheckok: z.number().optional(),
});

const radioBrowserStationListSchema = z.array(radioBrowserStationSchema);

export type RadioBrowserStation = z.infer<typeof radioBrowserStationSchema>;

export class DirectoryHttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "DirectoryHttpError";
  }
}

export interface RadioBrowserConfig {
  apiBaseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  breaker?: CircuitBreaker;
  retry?: Partial<RetryConfig>;
}

export function pickStreamUrl(station: RadioBrowserStation): string | null {
  const candidates = [station.url_resolved, station.url];
  for (const candidate of candidates) {
    if (candidate && isStreamUrl(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function toStationIdentity(station: RadioBrowserStation): StationIdentity | null {
  const streamURL = pickStreamUrl(station);
  if (!streamURL) {
    return null;
  }
  return {
    id: station.stationuuid,
    displayName: station.name.trim() || station.stationuuid,
    streamURL,
  };
}

export class RadioBrowserDirectory implements StationDirectory {
  readonly name = "radio-browser";
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly breaker: CircuitBreaker;
  private readonly retry: Partial<RetryConfig>;

  constructor(config: RadioBrowserConfig = {}) {
    this.apiBaseUrl = (config.apiBaseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs || DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent || "radio-contest-monitor/1.0";
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.breaker = config.breaker ?? directoryBreaker;
    this.retry = {
      maxRetries: 2,
      baseDelayMs: 1000,
      maxDelayMs: 10000,
      retryOn: isRetryableError,
      label: "RadioBrowser",
      ...config.retry,
    };
  }

  /**
   * Build the search URL for a filter (useful for testing)
   */
  static buildSearchUrl(baseUrl: string, filter: StationFilter): string {
    const url = new URL(`${baseUrl}/json/stations/search`);
    if (filter.countryCode) url.searchParams.set("countrycode", filter.countryCode.toUpperCase());
    if (filter.tag) url.searchParams.set("tag", filter.tag);
    if (filter.language) url.searchParams.set("language", filter.language);
    url.searchParams.set("limit", String(filter.limit ?? DEFAULT_LIMIT));
    url.searchParams.set("hidebroken", "true");
    url.searchParams.set("order", "clickcount");
    url.searchParams.set("reverse", "true");
    return url.toString();
  }

  async resolveStations(filter: StationFilter): Promise<StationIdentity[]> {
    try {
      const rows = await this.getStations(RadioBrowserDirectory.buildSearchUrl(this.apiBaseUrl, filter));
      const stations = rows
        .filter((row) => row.lastcheckok !== 0)
        .map(toStationIdentity)
        .filter((station): station is StationIdentity => station !== null);
      log(`Resolved ${stations.length} stations from Radio Browser`, "directory");
      return stations;
    } catch (error) {
      log(`Station lookup failed: ${errorMessage(error)}`, "directory");
      return [];
    }
  }

  async resolveStreamURL(stationId: string): Promise<string | null> {
    try {
      const rows = await this.getStations(
        `${this.apiBaseUrl}/json/stations/byuuid/${encodeURIComponent(stationId)}`
      );
      const first = rows[0];
      return first ? pickStreamUrl(first) : null;
    } catch (error) {
      log(`Stream URL lookup for ${stationId} failed: ${errorMessage(error)}`, "directory");
      return null;
    }
  }

  private async getStations(url: string): Promise<RadioBrowserStation[]> {
    return withReliability(
      async () => {
        const response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            "User-Agent": this.userAgent,
            Accept: "application/json",
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
          throw new DirectoryHttpError(response.status, `Radio Browser error: ${response.status} ${response.statusText}`);
        }

        const parsed = radioBrowserStationListSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new Error(`Unexpected Radio Browser response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        }
        return parsed.data;
      },
      this.breaker,
      this.retry
    );
  }
}
