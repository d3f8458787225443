import { describe, expect, it, vi } from "vitest";
import { InvalidTimeRangeError } from "../src/caldav/errors.js";
import {
  buildRangeQuery,
  queryCalendarRange,
  splitRange,
  type CalendarQueryExecutor,
} from "../src/caldav/range-query.js";
import type { CalendarObject, CalendarQueryRequest } from "../src/caldav/types.js";
import { HttpError } from "../src/http.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function object(path: string, etag = "1"): CalendarObject {
  return { path, modTime: null, contentLength: 0, etag, data: null };
}

function windowOf(query: CalendarQueryRequest): { start: string; end: string } {
  const filter = query.filter.comps?.[0];
  return {
    start: filter?.start?.toISOString() ?? "",
    end: filter?.end?.toISOString() ?? "",
  };
}

function insufficientStorage(): HttpError {
  return new HttpError("REPORT failed with status 507", 507, undefined, new Headers());
}

class RecordingExecutor implements CalendarQueryExecutor {
  readonly windows: Array<{ start: string; end: string }> = [];

  constructor(
    private readonly answer: (window: { start: string; end: string }) => CalendarObject[] | HttpError,
  ) {}

  async calendarQuery(_path: string, query: CalendarQueryRequest): Promise<CalendarObject[]> {
    const window = windowOf(query);
    this.windows.push(window);
    const result = this.answer(window);
    if (result instanceof HttpError) {
      throw result;
    }
    return result;
  }
}

describe("splitRange", () => {
  it("produces contiguous windows with a truncated tail", () => {
    const start = new Date("2023-01-01T00:00:00Z");
    const end = new Date(start.getTime() + 200 * DAY_MS);

    const windows = splitRange(start, end, 90 * DAY_MS);

    expect(windows).toHaveLength(3);
    expect(windows[0]?.start).toEqual(start);
    expect(windows[2]?.end).toEqual(end);
    for (let i = 1; i < windows.length; i += 1) {
      expect(windows[i]?.start).toEqual(windows[i - 1]?.end);
    }
    expect(windows.map((window) => (window.end.getTime() - window.start.getTime()) / DAY_MS)).toEqual([
      90, 90, 20,
    ]);
  });

  it("returns no windows for an empty range", () => {
    const instant = new Date("2023-01-01T00:00:00Z");
    expect(splitRange(instant, instant)).toEqual([]);
  });
});

describe("buildRangeQuery", () => {
  it("expands recurrences only when both bounds are known", () => {
    const start = new Date("2023-01-01T00:00:00Z");
    const end = new Date("2023-02-01T00:00:00Z");

    expect(buildRangeQuery(start, end).compRequest.expand).toEqual({ start, end });
    expect(buildRangeQuery(start, undefined).compRequest.expand).toBeUndefined();
  });
});

describe("queryCalendarRange", () => {
  it("rejects an unbounded range before any request", async () => {
    const executor = new RecordingExecutor(() => []);

    await expect(queryCalendarRange(executor, "/cal/", undefined, undefined)).rejects.toBeInstanceOf(
      InvalidTimeRangeError,
    );
    expect(executor.windows).toEqual([]);
  });

  it("rejects a start that is not before the end", async () => {
    const executor = new RecordingExecutor(() => []);
    const instant = new Date("2023-01-01T00:00:00Z");

    await expect(queryCalendarRange(executor, "/cal/", instant, instant)).rejects.toThrow(
      "Time range query start must be before end",
    );
  });

  it("runs a single query when only one bound is given", async () => {
    const executor = new RecordingExecutor(() => [object("/cal/a.ics")]);

    const result = await queryCalendarRange(executor, "/cal/", new Date("2023-01-01T00:00:00Z"), undefined);

    expect(result.map((item) => item.path)).toEqual(["/cal/a.ics"]);
    expect(executor.windows).toEqual([{ start: "2023-01-01T00:00:00.000Z", end: "" }]);
  });

  it("deduplicates by path with the later window winning", async () => {
    const executor = new RecordingExecutor((window) =>
      window.start === "2023-01-01T00:00:00.000Z"
        ? [object("/cal/a.ics", "early"), object("/cal/b.ics")]
        : [object("/cal/a.ics", "late"), object("/cal/c.ics")],
    );

    const result = await queryCalendarRange(
      executor,
      "/cal/",
      new Date("2023-01-01T00:00:00Z"),
      new Date("2023-01-21T00:00:00Z"),
      { windowMs: 10 * DAY_MS },
    );

    expect(result.map((item) => [item.path, item.etag])).toEqual([
      ["/cal/a.ics", "late"],
      ["/cal/b.ics", "1"],
      ["/cal/c.ics", "1"],
    ]);
  });

  it("bisects a window the server refuses and keeps going depth-first", async () => {
    const executor = new RecordingExecutor((window) =>
      window.start === "2023-01-01T00:00:00.000Z" && window.end === "2023-01-05T00:00:00.000Z"
        ? insufficientStorage()
        : [object(`/cal/${window.start.slice(0, 10)}.ics`)],
    );

    const result = await queryCalendarRange(
      executor,
      "/cal/",
      new Date("2023-01-01T00:00:00Z"),
      new Date("2023-01-05T00:00:00Z"),
      { windowMs: 4 * DAY_MS },
    );

    expect(executor.windows).toEqual([
      { start: "2023-01-01T00:00:00.000Z", end: "2023-01-05T00:00:00.000Z" },
      { start: "2023-01-01T00:00:00.000Z", end: "2023-01-03T00:00:00.000Z" },
      { start: "2023-01-03T00:00:00.000Z", end: "2023-01-05T00:00:00.000Z" },
    ]);
    expect(result.map((item) => item.path)).toEqual(["/cal/2023-01-01.ics", "/cal/2023-01-03.ics"]);
  });

  it("stops bisecting at the minimum width and surfaces the server error", async () => {
    const failure = insufficientStorage();
    const executor = new RecordingExecutor(() => failure);

    const promise = queryCalendarRange(
      executor,
      "/cal/",
      new Date("2023-01-01T00:00:00Z"),
      new Date("2023-01-03T00:00:00Z"),
    );

    await expect(promise).rejects.toBe(failure);
    // 2-day window, then the 1-day left half, which is at the floor.
    expect(executor.windows).toEqual([
      { start: "2023-01-01T00:00:00.000Z", end: "2023-01-03T00:00:00.000Z" },
      { start: "2023-01-01T00:00:00.000Z", end: "2023-01-02T00:00:00.000Z" },
    ]);
  });

  it("does not bisect on other failures", async () => {
    const failure = new HttpError("REPORT failed with status 500", 500, undefined, new Headers());
    const executor = new RecordingExecutor(() => failure);

    await expect(
      queryCalendarRange(executor, "/cal/", new Date("2023-01-01T00:00:00Z"), new Date("2023-03-01T00:00:00Z")),
    ).rejects.toBe(failure);
    expect(executor.windows).toHaveLength(1);
  });

  it("stops when cancelled", async () => {
    const controller = new AbortController();
    const calendarQuery = vi.fn(async () => {
      controller.abort();
      return [object("/cal/a.ics")];
    });

    const error = await queryCalendarRange(
      { calendarQuery },
      "/cal/",
      new Date("2023-01-01T00:00:00Z"),
      new Date("2023-01-21T00:00:00Z"),
      { windowMs: 10 * DAY_MS, signal: controller.signal },
    ).catch((caught: unknown) => caught);

    expect(error).toBe(controller.signal.reason);
    expect(calendarQuery).toHaveBeenCalledTimes(1);
  });
});
