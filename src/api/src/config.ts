import { readFileSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";
import {
  DEFAULT_ALERT_SAMPLE_MINUTES,
  DEFAULT_ALERT_SYNC_MINUTES,
  DEFAULT_QUERY_RADIUS_METERS,
  SNAPSHOT_FILE_NAME,
} from "@radnote/shared";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// Alert values as written in <dataDirectory>/config.json
const fileConfigSchema = z.object({
  radnote_alert_at_usv: z.number().min(0).optional(),
  radnote_alert_region_meters: z.number().min(0).optional(),
  radnote_alert_sample_minutes: z.number().int().min(1).optional(),
  radnote_alert_sync_minutes: z.number().int().min(1).optional(),
});

const envSchema = z.object({
  API_PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  DATA_DIRECTORY: z.string().min(1).default("./data"),
  CORS_ORIGIN: z.string().default("*"),
  FEED_BASE_URL: z.string().url().default("https://geofeeds.net/radnote"),
  RADNOTE_ALERT_AT_USV: z.coerce.number().min(0).optional(),
  RADNOTE_ALERT_REGION_METERS: z.coerce.number().min(0).optional(),
  RADNOTE_ALERT_SAMPLE_MINUTES: z.coerce.number().int().min(1).optional(),
  RADNOTE_ALERT_SYNC_MINUTES: z.coerce.number().int().min(1).optional(),
  DEFAULT_QUERY_RADIUS_METERS: z.coerce.number().positive().default(DEFAULT_QUERY_RADIUS_METERS),
});

export interface AlertConfig {
  /** Dose rate (µSv/h) at or above which a device raises a warning region. */
  alertLevelUsv: number;
  /** Distance in meters around such a device that counts as inside the region. */
  alertRegionMeters: number;
  sampleMinutes: number;
  syncMinutes: number;
}

export interface AppConfig {
  port: number;
  dataDirectory: string;
  snapshotFile: string;
  corsOrigin: string;
  feedBaseUrl: string;
  defaultQueryRadiusMeters: number;
  alert: AlertConfig;
}

const DEFAULT_ALERT_LEVEL_USV = 1.0;
const DEFAULT_ALERT_REGION_METERS = 1000;

function readFileConfig(path: string): z.infer<typeof fileConfigSchema> {
  let contents: string;
  try {
    contents = readFileSync(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`can't load ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (err) {
    throw new ConfigError(`can't parse JSON in ${path}`, { cause: err });
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`invalid settings in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Resolve configuration from the environment, with alert values optionally
 * supplied by config.json in the data directory. Environment variables win.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`invalid environment: ${parsed.error.message}`);
  }
  const vars = parsed.data;

  const dataDirectory = resolve(vars.DATA_DIRECTORY);
  const file = readFileConfig(join(dataDirectory, "config.json"));

  return {
    port: vars.API_PORT,
    dataDirectory,
    snapshotFile: join(dataDirectory, SNAPSHOT_FILE_NAME),
    corsOrigin: vars.CORS_ORIGIN,
    feedBaseUrl: vars.FEED_BASE_URL.replace(/\/+$/, ""),
    defaultQueryRadiusMeters: vars.DEFAULT_QUERY_RADIUS_METERS,
    alert: {
      alertLevelUsv:
        vars.RADNOTE_ALERT_AT_USV ?? file.radnote_alert_at_usv ?? DEFAULT_ALERT_LEVEL_USV,
      alertRegionMeters:
        vars.RADNOTE_ALERT_REGION_METERS ??
        file.radnote_alert_region_meters ??
        DEFAULT_ALERT_REGION_METERS,
      sampleMinutes:
        vars.RADNOTE_ALERT_SAMPLE_MINUTES ??
        file.radnote_alert_sample_minutes ??
        DEFAULT_ALERT_SAMPLE_MINUTES,
      syncMinutes:
        vars.RADNOTE_ALERT_SYNC_MINUTES ??
        file.radnote_alert_sync_minutes ??
        DEFAULT_ALERT_SYNC_MINUTES,
    },
  };
}
