import type pino from "pino";
import { HttpError } from "../http.js";
import { InvalidTimeRangeError } from "./errors.js";
import type { CalendarObject, CalendarQueryRequest, OperationOptions } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RANGE_WINDOW_MS = 90 * DAY_MS;
export const MIN_RANGE_WINDOW_MS = DAY_MS;

const INSUFFICIENT_STORAGE = 507;

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface CalendarQueryExecutor {
  calendarQuery(
    path: string,
    query: CalendarQueryRequest,
    options?: OperationOptions,
  ): Promise<CalendarObject[]>;
}

export interface RangeQueryOptions extends OperationOptions {
  windowMs?: number;
  minWindowMs?: number;
  logger?: pino.Logger;
}

/**
 * Splits `[start, end)` into contiguous windows of at most `windowMs`; the
 * last window is truncated to `end`.
 */
export function splitRange(start: Date, end: Date, windowMs = DEFAULT_RANGE_WINDOW_MS): TimeWindow[] {
  if (windowMs <= 0) {
    throw new InvalidTimeRangeError("Window width must be positive");
  }

  const windows: TimeWindow[] = [];
  const endMs = end.getTime();
  let cursorMs = start.getTime();

  while (cursorMs < endMs) {
    const windowEndMs = Math.min(cursorMs + windowMs, endMs);
    windows.push({ start: new Date(cursorMs), end: new Date(windowEndMs) });
    cursorMs = windowEndMs;
  }

  return windows;
}

/**
 * calendar-query for VEVENTs intersecting the window. Recurring events are
 * expanded only when both bounds are known.
 */
export function buildRangeQuery(start: Date | undefined, end: Date | undefined): CalendarQueryRequest {
  const query: CalendarQueryRequest = {
    compRequest: {
      name: "VCALENDAR",
      allProps: true,
      comps: [{ name: "VEVENT", allProps: true }],
    },
    filter: {
      name: "VCALENDAR",
      comps: [{ name: "VEVENT", start, end }],
    },
  };

  if (start && end) {
    query.compRequest.expand = { start, end };
  }
  return query;
}

function isCapacityFailure(error: unknown): error is HttpError {
  return error instanceof HttpError && error.status === INSUFFICIENT_STORAGE;
}

async function queryWindow(
  executor: CalendarQueryExecutor,
  path: string,
  window: TimeWindow,
  options: RangeQueryOptions,
): Promise<CalendarObject[]> {
  const minWindowMs = options.minWindowMs ?? MIN_RANGE_WINDOW_MS;
  options.signal?.throwIfAborted();

  try {
    return await executor.calendarQuery(path, buildRangeQuery(window.start, window.end), {
      signal: options.signal,
    });
  } catch (error) {
    const widthMs = window.end.getTime() - window.start.getTime();
    if (!isCapacityFailure(error) || widthMs <= minWindowMs) {
      throw error;
    }

    const midMs = window.start.getTime() + Math.floor(widthMs / 2);
    if (midMs <= window.start.getTime()) {
      throw error;
    }

    options.logger?.debug(
      {
        path,
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        status: error.status,
      },
      "Calendar query hit a server result limit, bisecting window",
    );

    const mid = new Date(midMs);
    const left = await queryWindow(executor, path, { start: window.start, end: mid }, options);
    const right = await queryWindow(executor, path, { start: mid, end: window.end }, options);
    return [...left, ...right];
  }
}

/**
 * Fetches every calendar object with events in `[start, end)`. A bounded
 * range is walked in fixed windows, each bisected when the server answers
 * 507 Insufficient Storage. Results are deduplicated by path; a repeated
 * path replaces the earlier entry.
 */
export async function queryCalendarRange(
  executor: CalendarQueryExecutor,
  path: string,
  start: Date | undefined,
  end: Date | undefined,
  options: RangeQueryOptions = {},
): Promise<CalendarObject[]> {
  if (!start && !end) {
    throw new InvalidTimeRangeError("Time range query requires a start or an end");
  }
  if (start && end && start.getTime() >= end.getTime()) {
    throw new InvalidTimeRangeError("Time range query start must be before end");
  }

  if (!start || !end) {
    options.signal?.throwIfAborted();
    return executor.calendarQuery(path, buildRangeQuery(start, end), { signal: options.signal });
  }

  const results: CalendarObject[] = [];
  const indexByPath = new Map<string, number>();

  for (const window of splitRange(start, end, options.windowMs)) {
    const chunk = await queryWindow(executor, path, window, options);

    for (const object of chunk) {
      const existing = indexByPath.get(object.path);
      if (existing === undefined) {
        indexByPath.set(object.path, results.length);
        results.push(object);
      } else {
        results[existing] = object;
      }
    }
  }

  return results;
}
