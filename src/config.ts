import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const ConfigSchema = z.object({
  CALDAV_SERVER_URL: z.string().url(),
  CALDAV_USERNAME: z.string().min(1).optional(),
  CALDAV_PASSWORD: z.string().optional(),
  CALDAV_CALENDARS: z.string().optional(),

  SYNC_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  SYNC_LOOKBACK_DAYS: z.coerce.number().int().nonnegative().default(30),
  SYNC_PAGE_LIMIT: z.coerce.number().int().nonnegative().default(0),
  RANGE_WINDOW_DAYS: z.coerce.number().int().positive().default(90),
  RANGE_MIN_WINDOW_HOURS: z.coerce.number().int().positive().default(24),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  SQLITE_PATH: z.string().min(1).default("./data/mirror.db"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface RuntimeConfig {
  serverUrl: string;
  username?: string;
  password?: string;
  /** Explicit calendar paths; empty means discover them. */
  calendarPaths: string[];
  syncIntervalSeconds: number;
  syncLookbackDays: number;
  syncPageLimit: number;
  rangeWindowDays: number;
  rangeMinWindowHours: number;
  requestTimeoutMs: number;
  sqlitePath: string;
  logLevel: string;
}

export function parseCsvList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = ConfigSchema.parse({
    CALDAV_SERVER_URL: env.CALDAV_SERVER_URL,
    CALDAV_USERNAME: emptyToUndefined(env.CALDAV_USERNAME),
    CALDAV_PASSWORD: env.CALDAV_PASSWORD,
    CALDAV_CALENDARS: env.CALDAV_CALENDARS,

    SYNC_INTERVAL_SECONDS: emptyToUndefined(env.SYNC_INTERVAL_SECONDS),
    SYNC_LOOKBACK_DAYS: emptyToUndefined(env.SYNC_LOOKBACK_DAYS),
    SYNC_PAGE_LIMIT: emptyToUndefined(env.SYNC_PAGE_LIMIT),
    RANGE_WINDOW_DAYS: emptyToUndefined(env.RANGE_WINDOW_DAYS),
    RANGE_MIN_WINDOW_HOURS: emptyToUndefined(env.RANGE_MIN_WINDOW_HOURS),
    REQUEST_TIMEOUT_MS: emptyToUndefined(env.REQUEST_TIMEOUT_MS),
    SQLITE_PATH: emptyToUndefined(env.SQLITE_PATH),
    LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL),
  });

  if (parsed.CALDAV_PASSWORD && parsed.CALDAV_USERNAME === undefined) {
    throw new Error("CALDAV_PASSWORD is set but CALDAV_USERNAME is missing.");
  }

  if (parsed.RANGE_MIN_WINDOW_HOURS > parsed.RANGE_WINDOW_DAYS * 24) {
    throw new Error("RANGE_MIN_WINDOW_HOURS must not exceed RANGE_WINDOW_DAYS.");
  }

  return {
    serverUrl: parsed.CALDAV_SERVER_URL,
    username: parsed.CALDAV_USERNAME,
    password: parsed.CALDAV_PASSWORD,
    calendarPaths: parseCsvList(parsed.CALDAV_CALENDARS),
    syncIntervalSeconds: parsed.SYNC_INTERVAL_SECONDS,
    syncLookbackDays: parsed.SYNC_LOOKBACK_DAYS,
    syncPageLimit: parsed.SYNC_PAGE_LIMIT,
    rangeWindowDays: parsed.RANGE_WINDOW_DAYS,
    rangeMinWindowHours: parsed.RANGE_MIN_WINDOW_HOURS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    sqlitePath: parsed.SQLITE_PATH === ":memory:" ? parsed.SQLITE_PATH : path.resolve(parsed.SQLITE_PATH),
    logLevel: parsed.LOG_LEVEL,
  };
}
