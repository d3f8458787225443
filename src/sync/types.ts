import type { CalDavClient } from "../caldav/client.js";

/** The slice of the CalDAV client the mirror service drives. */
export type MirrorSourceClient = Pick<
  CalDavClient,
  "findCurrentUserPrincipal" | "findCalendarHomeSet" | "findCalendars" | "getCalendar" | "syncCalendar"
>;

export interface SyncMetrics {
  pages: number;
  updated: number;
  deleted: number;
  fullResync: boolean;
}

export interface CalendarSyncResult {
  calendarPath: string;
  syncToken: string;
  metrics: SyncMetrics;
}

export interface CalendarSyncFailure {
  calendarPath: string;
  error: string;
}

export interface SyncCycleResult {
  ranAt: string;
  calendarCount: number;
  successes: CalendarSyncResult[];
  failures: CalendarSyncFailure[];
}
