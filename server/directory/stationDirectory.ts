import { readFileSync } from "fs";
import { z } from "zod";
import { stationIdentitySchema, type StationFilter, type StationIdentity } from "@shared/schema";
import { ConfigurationError } from "../monitor/errors";

/**
 * Resolves which stations to monitor and where their streams live.
 * Implementations report lookup failures as "nothing found" (`[]` / `null`)
 * rather than throwing.
 */
export interface StationDirectory {
  readonly name: string;
  resolveStations(filter: StationFilter): Promise<StationIdentity[]>;
  resolveStreamURL(stationId: string): Promise<string | null>;
}

export function isStreamUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Fixed station list, from configuration or a JSON file.
 * `countryCode`, `tag` and `language` are ignored; `limit` is honored.
 */
export class StaticStationDirectory implements StationDirectory {
  readonly name = "static";
  private readonly stations: StationIdentity[];

  constructor(stations: StationIdentity[]) {
    this.stations = stations.map((station) => ({ ...station }));
  }

  static fromFile(filePath: string): StaticStationDirectory {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(`Cannot read station list from ${filePath}`, { cause: error });
    }

    const parsed = z.array(stationIdentitySchema).safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigurationError(`Invalid station list in ${filePath}: ${issues.join("; ")}`);
    }
    return new StaticStationDirectory(parsed.data);
  }

  async resolveStations(filter: StationFilter): Promise<StationIdentity[]> {
    const stations = this.stations.map((station) => ({ ...station }));
    return filter.limit !== undefined ? stations.slice(0, filter.limit) : stations;
  }

  async resolveStreamURL(stationId: string): Promise<string | null> {
    const station = this.stations.find((candidate) => candidate.id === stationId);
    return station && isStreamUrl(station.streamURL) ? station.streamURL : null;
  }
}
