import type pino from "pino";
import type { RuntimeConfig } from "../config.js";
import type { DbClient } from "../db.js";
import { HttpError, isAbortError } from "../http.js";
import { withRetry } from "../retry.js";
import { CalDavError } from "../caldav/errors.js";
import type { Calendar, OperationOptions } from "../caldav/types.js";
import type {
  CalendarSyncResult,
  MirrorSourceClient,
  SyncCycleResult,
  SyncMetrics,
} from "./types.js";

export type MirrorSyncConfig = Pick<
  RuntimeConfig,
  "calendarPaths" | "syncLookbackDays" | "syncPageLimit"
>;

const SYNC_TOKEN_KEY = "sync_token";
const MAX_PAGES_PER_CYCLE = 1_000;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * True when the server rejected the stored sync token (RFC 6578
 * DAV:valid-sync-token precondition).
 */
export function isInvalidSyncTokenError(error: unknown): boolean {
  const cause = error instanceof CalDavError ? error.cause : error;
  if (!(cause instanceof HttpError)) {
    return false;
  }
  if (cause.status !== 403 && cause.status !== 409) {
    return false;
  }
  return typeof cause.body === "string" && cause.body.includes("valid-sync-token");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MirrorSyncService {
  constructor(
    private readonly config: MirrorSyncConfig,
    private readonly db: DbClient,
    private readonly client: MirrorSourceClient,
    private readonly logger: pino.Logger,
  ) {}

  /** Calendars to mirror: the configured paths, or every VEVENT calendar found. */
  async resolveCalendars(options: OperationOptions = {}): Promise<Calendar[]> {
    if (this.config.calendarPaths.length > 0) {
      const calendars: Calendar[] = [];
      for (const calendarPath of this.config.calendarPaths) {
        calendars.push(
          await withRetry(
            this.logger,
            "getCalendar",
            () => this.client.getCalendar(calendarPath, options),
            5,
            options.signal,
          ),
        );
      }
      return calendars;
    }

    const principal = await withRetry(
      this.logger,
      "findCurrentUserPrincipal",
      () => this.client.findCurrentUserPrincipal(options),
      5,
      options.signal,
    );
    const homeSet = await withRetry(
      this.logger,
      "findCalendarHomeSet",
      () => this.client.findCalendarHomeSet(principal, options),
      5,
      options.signal,
    );
    const calendars = await withRetry(
      this.logger,
      "findCalendars",
      () => this.client.findCalendars(homeSet, options),
      5,
      options.signal,
    );

    // An empty component set means the server did not restrict it.
    return calendars.filter(
      (calendar) =>
        calendar.supportedComponentSet.length === 0 || calendar.supportedComponentSet.includes("VEVENT"),
    );
  }

  async runCycle(now = new Date(), options: OperationOptions = {}): Promise<SyncCycleResult> {
    const calendars = await this.resolveCalendars(options);
    const successes: CalendarSyncResult[] = [];
    const failures: SyncCycleResult["failures"] = [];

    for (const calendar of calendars) {
      this.db.upsertCalendar(calendar);
      try {
        successes.push(await this.syncOneCalendar(calendar.path, now, options));
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        failures.push({ calendarPath: calendar.path, error: describe(error) });
      }
    }

    return {
      ranAt: now.toISOString(),
      calendarCount: calendars.length,
      successes,
      failures,
    };
  }

  async syncOneCalendar(
    calendarPath: string,
    now = new Date(),
    options: OperationOptions = {},
  ): Promise<CalendarSyncResult> {
    try {
      let result: CalendarSyncResult;
      try {
        result = await this.pullChanges(calendarPath, now, false, options);
      } catch (error) {
        if (!isInvalidSyncTokenError(error)) {
          throw error;
        }
        this.logger.warn({ calendarPath }, "Sync token rejected by server, running full resync");
        this.resetCalendar(calendarPath);
        result = await this.pullChanges(calendarPath, now, true, options);
      }

      this.db.setState(calendarPath, "last_successful_sync_ts", new Date().toISOString());
      this.db.setState(calendarPath, "last_run_status", "success");
      this.logger.info({ calendarPath, ...result.metrics }, "Calendar sync completed");
      return result;
    } catch (error) {
      this.db.setState(calendarPath, "last_run_status", `failed:${new Date().toISOString()}`);
      this.logger.error({ calendarPath, err: error }, "Calendar sync failed");
      throw error;
    }
  }

  /** Drops every mirrored object and the stored state of one calendar. */
  resetCalendar(calendarPath: string): { objects: number; stateKeys: number } {
    return this.db.transaction(() => ({
      objects: this.db.deleteAllObjects(calendarPath),
      stateKeys: this.db.deleteAllState(calendarPath),
    }));
  }

  private async pullChanges(
    calendarPath: string,
    now: Date,
    fullResync: boolean,
    options: OperationOptions,
  ): Promise<CalendarSyncResult> {
    const metrics: SyncMetrics = { pages: 0, updated: 0, deleted: 0, fullResync };
    let syncToken = this.db.getState(calendarPath, SYNC_TOKEN_KEY) ?? "";
    // Continuation pages of a truncated initial sync keep its cutoff.
    const initialSync = syncToken === "";
    const startTime =
      initialSync && this.config.syncLookbackDays > 0
        ? new Date(now.getTime() - this.config.syncLookbackDays * DAY_MS)
        : undefined;

    while (metrics.pages < MAX_PAGES_PER_CYCLE) {
      const response = await this.client.syncCalendar(
        calendarPath,
        { syncToken, limit: this.config.syncPageLimit, startTime, initialSync },
        options,
      );
      metrics.pages += 1;

      this.db.transaction(() => {
        if (response.calendar) {
          this.db.upsertCalendar(response.calendar);
        }
        for (const object of response.updated) {
          this.db.upsertObject(calendarPath, object);
        }
        for (const deletedPath of response.deleted) {
          this.db.deleteObject(calendarPath, deletedPath);
        }
        if (response.syncToken) {
          this.db.setState(calendarPath, SYNC_TOKEN_KEY, response.syncToken);
        }
      });
      metrics.updated += response.updated.length;
      metrics.deleted += response.deleted.length;

      const previousToken = syncToken;
      syncToken = response.syncToken || syncToken;
      if (!response.truncated) {
        break;
      }
      if (syncToken === previousToken) {
        this.logger.warn({ calendarPath }, "Truncated sync response did not advance the token");
        break;
      }
      this.logger.debug({ calendarPath, page: metrics.pages }, "Sync response truncated, fetching next page");
    }

    return { calendarPath, syncToken, metrics };
  }
}
