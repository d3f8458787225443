import type pino from "pino";
import { responseError } from "../clients/multistatus.js";
import type { DavTransport } from "../clients/webdav.js";
import { decodeCalendarObject, parseCalendarFromResponse } from "./decode.js";
import { encodeCalendarDataRequest } from "./filter.js";
import { extractEventMetadata } from "./ics-metadata.js";
import { sameCollectionPath } from "./paths.js";
import { toCalDavError } from "./errors.js";
import type {
  Calendar,
  CalendarCompRequest,
  CalendarObject,
  OperationOptions,
  SyncQuery,
  SyncResponse,
} from "./types.js";

const INSUFFICIENT_STORAGE = 507;

/** VCALENDAR and VEVENT with every property. */
export const STANDARD_COMP_REQUEST: CalendarCompRequest = {
  name: "VCALENDAR",
  allProps: true,
  comps: [{ name: "VEVENT", allProps: true }],
};

export type MultigetFetcher = (
  paths: string[],
  compRequest: CalendarCompRequest,
  options?: OperationOptions,
) => Promise<CalendarObject[]>;

export interface SyncOptions extends OperationOptions {
  logger?: pino.Logger;
}

/**
 * Whether an object is still relevant at `cutoff`. Open-ended recurrences
 * always are; otherwise the recurrence end, the event end, or the event
 * start is compared. Without usable metadata the modification time decides,
 * and with neither the object is kept.
 */
export function shouldIncludeForStartCutoff(object: CalendarObject, cutoff: Date): boolean {
  const cutoffMs = cutoff.getTime();
  const meta = extractEventMetadata(object.data);

  if (meta) {
    if (meta.recurring) {
      if (!meta.recurrenceEnd) {
        return true;
      }
      return meta.recurrenceEnd.getTime() >= cutoffMs;
    }
    if (meta.end) {
      return meta.end.getTime() >= cutoffMs;
    }
    if (meta.start) {
      return meta.start.getTime() >= cutoffMs;
    }
  }

  if (object.modTime) {
    return object.modTime.getTime() >= cutoffMs;
  }
  return true;
}

function mergeFetched(pending: CalendarObject, fetched: CalendarObject | undefined): CalendarObject {
  if (!fetched) {
    return pending;
  }
  return {
    ...pending,
    data: fetched.data,
    modTime: fetched.modTime ?? pending.modTime,
    contentLength: fetched.contentLength !== 0 ? fetched.contentLength : pending.contentLength,
    etag: fetched.etag !== "" ? fetched.etag : pending.etag,
  };
}

async function fetchPending(
  multiget: MultigetFetcher,
  path: string,
  pendingPaths: string[],
  options: SyncOptions,
): Promise<Map<string, CalendarObject>> {
  try {
    options.signal?.throwIfAborted();
    const fetched = await multiget(pendingPaths, STANDARD_COMP_REQUEST, { signal: options.signal });
    return new Map(fetched.map((object) => [object.path, object]));
  } catch (error) {
    throw toCalDavError("backfill", `Fetching ${pendingPaths.length} object(s) from ${path} failed`, error);
  }
}

/**
 * Runs an RFC 6578 sync-collection REPORT on a calendar and classifies the
 * entries. On a full sync (empty token, or `query.initialSync` for its
 * continuation pages) with `query.startTime`, objects that ended before
 * the cutoff are dropped; objects sent without calendar-data are fetched in
 * one multiget before deciding.
 */
export async function syncCalendar(
  transport: Pick<DavTransport, "syncCollection">,
  multiget: MultigetFetcher,
  path: string,
  query: SyncQuery = {},
  options: SyncOptions = {},
): Promise<SyncResponse> {
  const syncToken = query.syncToken ?? "";
  const limit = query.limit !== undefined && query.limit > 0 ? query.limit : undefined;
  const fullSync = syncToken === "" || query.initialSync === true;
  const cutoff = fullSync && query.startTime ? query.startTime : null;

  let calendar: Calendar | null = null;
  let truncated = false;
  let nextToken = "";
  const updated: CalendarObject[] = [];
  const deleted: string[] = [];
  const pendingPaths: string[] = [];
  const pendingObjects = new Map<string, CalendarObject>();

  try {
    options.signal?.throwIfAborted();
    const multistatus = await transport.syncCollection(
      path,
      syncToken,
      "1",
      limit,
      encodeCalendarDataRequest(STANDARD_COMP_REQUEST),
      { signal: options.signal },
    );
    nextToken = multistatus.syncToken ?? "";

    for (const entry of multistatus.responses) {
      const failure = responseError(entry);
      const isCollection = sameCollectionPath(entry.path, path);

      if (failure) {
        if (failure.status === 404) {
          deleted.push(entry.path);
          continue;
        }
        if (failure.status === INSUFFICIENT_STORAGE && isCollection) {
          truncated = true;
          continue;
        }
        throw failure;
      }

      if (isCollection) {
        calendar = parseCalendarFromResponse(entry) ?? calendar;
        continue;
      }

      const object = decodeCalendarObject(entry, entry.path);
      if (cutoff) {
        if (!object.data) {
          if (!pendingObjects.has(entry.path)) {
            pendingPaths.push(entry.path);
          }
          pendingObjects.set(entry.path, object);
          continue;
        }
        if (!shouldIncludeForStartCutoff(object, cutoff)) {
          continue;
        }
      }

      updated.push(object);
    }
  } catch (error) {
    throw toCalDavError("sync", `Sync of ${path} failed`, error);
  }

  if (cutoff && pendingPaths.length > 0) {
    options.logger?.debug(
      { path, pending: pendingPaths.length },
      "Fetching calendar-data withheld from sync response",
    );

    const fetchedByPath = await fetchPending(multiget, path, pendingPaths, options);
    for (const pendingPath of pendingPaths) {
      const pending = pendingObjects.get(pendingPath);
      if (!pending) {
        continue;
      }
      const merged = mergeFetched(pending, fetchedByPath.get(pendingPath));
      if (shouldIncludeForStartCutoff(merged, cutoff)) {
        updated.push(merged);
      }
    }
  }

  return {
    syncToken: nextToken,
    calendar,
    updated,
    deleted,
    truncated,
  };
}
