#!/usr/bin/env node

import { Command } from "commander";
import type pino from "pino";
import { CalDavClient } from "./caldav/client.js";
import { CalDavError } from "./caldav/errors.js";
import { extractEventMetadata } from "./caldav/ics-metadata.js";
import { WebDavClient } from "./clients/webdav.js";
import { loadConfig, parseCsvList, type RuntimeConfig } from "./config.js";
import { DbClient } from "./db.js";
import { HttpError } from "./http.js";
import { createLogger } from "./logger.js";
import { MirrorSyncService } from "./sync/service.js";

const HOUR_MS = 60 * 60 * 1000;

interface Runtime {
  config: RuntimeConfig;
  db: DbClient;
  logger: pino.Logger;
  client: CalDavClient;
  syncService: MirrorSyncService;
}

async function withRuntime<T>(fn: (runtime: Runtime) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const db = new DbClient(config.sqlitePath);

  const credentials = config.username
    ? { username: config.username, password: config.password ?? "" }
    : undefined;
  const transport = new WebDavClient(config.serverUrl, credentials, logger, config.requestTimeoutMs);
  const client = new CalDavClient(transport, logger, {
    rangeWindowMs: config.rangeWindowDays * 24 * HOUR_MS,
    rangeMinWindowMs: config.rangeMinWindowHours * HOUR_MS,
  });
  const syncService = new MirrorSyncService(config, db, client, logger);

  try {
    return await fn({ config, db, logger, client, syncService });
  } finally {
    db.close();
  }
}

function parseDateOption(value: string | undefined, name: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`--${name} must be an ISO 8601 date, got '${value}'`);
  }
  return parsed;
}

const program = new Command();
program.name("caldav-mirror").description("CalDAV calendar mirror and range query tool").version("0.1.0");

program
  .command("discover")
  .description("List the calendars of the authenticated principal")
  .action(async () => {
    await withRuntime(async ({ client }) => {
      const principal = await client.findCurrentUserPrincipal();
      const homeSet = await client.findCalendarHomeSet(principal);
      const calendars = await client.findCalendars(homeSet);
      console.log(
        JSON.stringify(
          {
            principal,
            homeSet,
            calendars: calendars.map((calendar) => ({
              path: calendar.path,
              name: calendar.name,
              components: calendar.supportedComponentSet,
              syncToken: calendar.syncToken,
            })),
          },
          null,
          2,
        ),
      );
    });
  });

program
  .command("once")
  .description("Run exactly one mirror sync cycle")
  .action(async () => {
    await withRuntime(async ({ syncService }) => {
      const summary = await syncService.runCycle();
      console.log(JSON.stringify(summary, null, 2));

      if (summary.failures.length > 0) {
        throw new Error(`Sync failed for ${summary.failures.length} calendar(s).`);
      }
    });
  });

program
  .command("start")
  .description("Start the long-running mirror sync loop")
  .action(async () => {
    await withRuntime(async ({ config, logger, syncService }) => {
      const controller = new AbortController();
      let cycleRunning = false;

      const runCycle = async () => {
        if (cycleRunning) {
          logger.warn("Previous cycle still running; skipping this interval");
          return;
        }

        cycleRunning = true;
        try {
          const summary = await syncService.runCycle(new Date(), { signal: controller.signal });
          logger.info(
            {
              calendarCount: summary.calendarCount,
              successCount: summary.successes.length,
              failureCount: summary.failures.length,
            },
            "Sync cycle completed",
          );
          if (summary.failures.length > 0) {
            logger.error({ failures: summary.failures }, "One or more calendars failed");
          }
        } catch (error) {
          if (controller.signal.aborted) {
            logger.info("Sync cycle cancelled");
          } else {
            logger.error({ err: error }, "Unexpected sync cycle failure");
          }
        } finally {
          cycleRunning = false;
        }
      };

      await runCycle();

      const timer = setInterval(() => {
        void runCycle();
      }, config.syncIntervalSeconds * 1000);

      await new Promise<void>((resolve) => {
        const onSignal = () => {
          if (controller.signal.aborted) {
            return;
          }
          clearInterval(timer);
          logger.info("Shutdown signal received");
          controller.abort();

          const waitForCycle = () => {
            if (!cycleRunning) {
              process.off("SIGINT", onSignal);
              process.off("SIGTERM", onSignal);
              resolve();
              return;
            }
            setTimeout(waitForCycle, 250);
          };

          waitForCycle();
        };

        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);
      });
    });
  });

program
  .command("events")
  .description("Query a calendar for events in a time range")
  .requiredOption("-c, --calendar <path>", "calendar collection path")
  .option("--from <iso>", "range start (inclusive)")
  .option("--to <iso>", "range end (exclusive)")
  .option("--data", "include the raw iCalendar text", false)
  .action(async (options: { calendar: string; from?: string; to?: string; data: boolean }) => {
    await withRuntime(async ({ client }) => {
      const start = parseDateOption(options.from, "from");
      const end = parseDateOption(options.to, "to");
      const objects = await client.calendarQueryRange(options.calendar, start, end);

      console.log(
        JSON.stringify(
          objects.map((object) => {
            const meta = extractEventMetadata(object.data);
            return {
              path: object.path,
              etag: object.etag,
              start: meta?.start?.toISOString() ?? null,
              end: meta?.end?.toISOString() ?? null,
              recurring: meta?.recurring ?? false,
              ...(options.data ? { data: object.data } : {}),
            };
          }),
          null,
          2,
        ),
      );
    });
  });

program
  .command("health")
  .description("Verify database and server access with current credentials")
  .action(async () => {
    await withRuntime(async ({ db, syncService }) => {
      const calendars = await syncService.resolveCalendars();
      console.log(
        JSON.stringify(
          {
            database: "ok",
            server: "ok",
            calendars: calendars.map((calendar) => ({
              path: calendar.path,
              name: calendar.name,
              mirroredObjects: db.countObjects(calendar.path),
              lastRunStatus: db.getState(calendar.path, "last_run_status") ?? null,
              lastSuccessfulSync: db.getState(calendar.path, "last_successful_sync_ts") ?? null,
            })),
          },
          null,
          2,
        ),
      );
    });
  });

program
  .command("reset")
  .description("Delete mirrored objects and sync state so the next cycle runs a full sync")
  .option("-c, --calendar <paths...>", "calendar path(s); defaults to every tracked calendar")
  .option("--dry-run", "show what would be deleted without mutating data", false)
  .option("--yes", "confirm destructive reset", false)
  .action(async (options: { calendar?: string[]; dryRun: boolean; yes: boolean }) => {
    await withRuntime(async ({ db, syncService }) => {
      const requested = (options.calendar ?? []).flatMap((value) => parseCsvList(value));
      const calendarPaths = requested.length > 0 ? requested : db.listTrackedCalendarPaths();

      if (calendarPaths.length === 0) {
        throw new Error("No calendars selected for reset.");
      }

      const summary = {
        dryRun: options.dryRun,
        calendars: Object.fromEntries(
          calendarPaths.map((calendarPath) => [calendarPath, db.countObjects(calendarPath)]),
        ),
      };

      if (options.dryRun) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      if (!options.yes) {
        throw new Error("Refusing destructive reset without --yes. Re-run with --dry-run to preview.");
      }

      const deleted = Object.fromEntries(
        calendarPaths.map((calendarPath) => [calendarPath, syncService.resetCalendar(calendarPath)]),
      );
      console.log(JSON.stringify({ ...summary, dryRun: false, deleted }, null, 2));
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  let httpError: HttpError | null = null;
  if (error instanceof HttpError) {
    httpError = error;
  } else if (error instanceof CalDavError && error.cause instanceof HttpError) {
    httpError = error.cause;
  }

  console.error(error instanceof Error ? error.message : String(error));
  if (httpError) {
    console.error(`HTTP ${httpError.status}`);
    if (httpError.body !== undefined) {
      console.error(
        typeof httpError.body === "string" ? httpError.body : JSON.stringify(httpError.body, null, 2),
      );
    }
  }

  process.exitCode = 1;
});
