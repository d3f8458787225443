import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, parseCsvList } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ CALDAV_SERVER_URL: "https://dav.example.com/" });

    expect(config).toEqual({
      serverUrl: "https://dav.example.com/",
      username: undefined,
      password: undefined,
      calendarPaths: [],
      syncIntervalSeconds: 300,
      syncLookbackDays: 30,
      syncPageLimit: 0,
      rangeWindowDays: 90,
      rangeMinWindowHours: 24,
      requestTimeoutMs: 20_000,
      sqlitePath: path.resolve("./data/mirror.db"),
      logLevel: "info",
    });
  });

  it("reads credentials, calendar paths and numeric settings", () => {
    const config = loadConfig({
      CALDAV_SERVER_URL: "https://dav.example.com/",
      CALDAV_USERNAME: "alice",
      CALDAV_PASSWORD: "test-secret",
      CALDAV_CALENDARS: " /cal/work/ ,,/cal/home/",
      SYNC_LOOKBACK_DAYS: "0",
      SYNC_PAGE_LIMIT: "200",
      SQLITE_PATH: ":memory:",
      LOG_LEVEL: "debug",
    });

    expect(config.username).toBe("alice");
    expect(config.password).toBe("test-secret");
    expect(config.calendarPaths).toEqual(["/cal/work/", "/cal/home/"]);
    expect(config.syncLookbackDays).toBe(0);
    expect(config.syncPageLimit).toBe(200);
    expect(config.sqlitePath).toBe(":memory:");
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ CALDAV_SERVER_URL: "https://dav.example.com/", SYNC_INTERVAL_SECONDS: "" });

    expect(config.syncIntervalSeconds).toBe(300);
  });

  it("requires a server URL", () => {
    expect(() => loadConfig({})).toThrow();
  });

  it("rejects a password without a username", () => {
    expect(() => loadConfig({ CALDAV_SERVER_URL: "https://dav.example.com/", CALDAV_PASSWORD: "test-secret" })).toThrow(
      "CALDAV_PASSWORD is set but CALDAV_USERNAME is missing.",
    );
  });

  it("rejects a bisection floor wider than the window", () => {
    expect(() =>
      loadConfig({
        CALDAV_SERVER_URL: "https://dav.example.com/",
        RANGE_WINDOW_DAYS: "1",
        RANGE_MIN_WINDOW_HOURS: "48",
      }),
    ).toThrow("RANGE_MIN_WINDOW_HOURS must not exceed RANGE_WINDOW_DAYS.");
  });
});

describe("parseCsvList", () => {
  it("returns an empty list for unset values", () => {
    expect(parseCsvList(undefined)).toEqual([]);
  });
});
