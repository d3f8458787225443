import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Calendar, CalendarObject } from "./caldav/types.js";

interface CalendarRow {
  path: string;
  display_name: string;
  description: string;
  max_resource_size: number;
  components: string;
  color: string;
  timezone: string;
  privileges: string;
  updated_at: string;
}

interface CalendarObjectRow {
  calendar_path: string;
  path: string;
  etag: string;
  last_modified: string | null;
  content_length: number;
  data: string | null;
  synced_at: string;
}

export interface StoredCalendarObject extends CalendarObject {
  calendarPath: string;
  syncedAt: string;
}

function parseStringList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

function ensureCalendarsSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS calendars (
      path TEXT PRIMARY KEY,
      display_name TEXT NOT NULL DEFAULT '',
      description TEXT NOT NULL DEFAULT '',
      max_resource_size INTEGER NOT NULL DEFAULT 0,
      components TEXT NOT NULL DEFAULT '[]',
      color TEXT NOT NULL DEFAULT '',
      timezone TEXT NOT NULL DEFAULT '',
      privileges TEXT NOT NULL DEFAULT '[]',
      updated_at TEXT NOT NULL
    );
  `);
}

function ensureCalendarObjectsSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS calendar_objects (
      calendar_path TEXT NOT NULL,
      path TEXT NOT NULL,
      etag TEXT NOT NULL DEFAULT '',
      last_modified TEXT,
      content_length INTEGER NOT NULL DEFAULT 0,
      data TEXT,
      synced_at TEXT NOT NULL,
      PRIMARY KEY (calendar_path, path)
    );

    CREATE INDEX IF NOT EXISTS idx_calendar_objects_calendar_path
      ON calendar_objects(calendar_path);
  `);
}

function ensureSyncStateSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sync_state (
      calendar_path TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      PRIMARY KEY (calendar_path, key)
    );
  `);
}

export class DbClient {
  private readonly db: Database.Database;

  constructor(sqlitePath: string) {
    if (sqlitePath !== ":memory:") {
      fs.mkdirSync(path.dirname(sqlitePath), { recursive: true });
    }
    this.db = new Database(sqlitePath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec("BEGIN");
    try {
      ensureCalendarsSchema(this.db);
      ensureCalendarObjectsSchema(this.db);
      ensureSyncStateSchema(this.db);
      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  close() {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  upsertCalendar(calendar: Calendar) {
    const stmt = this.db.prepare(`
      INSERT INTO calendars (
        path,
        display_name,
        description,
        max_resource_size,
        components,
        color,
        timezone,
        privileges,
        updated_at
      )
      VALUES (
        @path,
        @display_name,
        @description,
        @max_resource_size,
        @components,
        @color,
        @timezone,
        @privileges,
        @updated_at
      )
      ON CONFLICT(path) DO UPDATE SET
        display_name = excluded.display_name,
        description = excluded.description,
        max_resource_size = excluded.max_resource_size,
        components = excluded.components,
        color = excluded.color,
        timezone = excluded.timezone,
        privileges = excluded.privileges,
        updated_at = excluded.updated_at
    `);

    const row: CalendarRow = {
      path: calendar.path,
      display_name: calendar.name,
      description: calendar.description,
      max_resource_size: calendar.maxResourceSize,
      components: JSON.stringify(calendar.supportedComponentSet),
      color: calendar.color,
      timezone: calendar.timezone,
      privileges: JSON.stringify(calendar.currentUserPrivileges),
      updated_at: new Date().toISOString(),
    };
    stmt.run(row);
  }

  getCalendar(calendarPath: string): Calendar | undefined {
    const stmt = this.db.prepare(`
      SELECT path, display_name, description, max_resource_size, components, color, timezone, privileges, updated_at
      FROM calendars
      WHERE path = ?
    `);
    const row = stmt.get(calendarPath) as CalendarRow | undefined;
    if (!row) {
      return undefined;
    }

    return {
      path: row.path,
      name: row.display_name,
      description: row.description,
      maxResourceSize: row.max_resource_size,
      supportedComponentSet: parseStringList(row.components),
      color: row.color,
      timezone: row.timezone,
      syncToken: this.getState(row.path, "sync_token") ?? "",
      currentUserPrivileges: parseStringList(row.privileges),
    };
  }

  /** An update without a payload keeps the stored one only while the etag is unchanged. */
  upsertObject(calendarPath: string, object: CalendarObject) {
    const stmt = this.db.prepare(`
      INSERT INTO calendar_objects (
        calendar_path,
        path,
        etag,
        last_modified,
        content_length,
        data,
        synced_at
      )
      VALUES (
        @calendar_path,
        @path,
        @etag,
        @last_modified,
        @content_length,
        @data,
        @synced_at
      )
      ON CONFLICT(calendar_path, path) DO UPDATE SET
        etag = excluded.etag,
        last_modified = excluded.last_modified,
        content_length = excluded.content_length,
        data = CASE
          WHEN excluded.data IS NOT NULL THEN excluded.data
          WHEN excluded.etag = calendar_objects.etag THEN calendar_objects.data
          ELSE NULL
        END,
        synced_at = excluded.synced_at
    `);

    const row: CalendarObjectRow = {
      calendar_path: calendarPath,
      path: object.path,
      etag: object.etag,
      last_modified: object.modTime ? object.modTime.toISOString() : null,
      content_length: object.contentLength,
      data: object.data ? object.data : null,
      synced_at: new Date().toISOString(),
    };
    stmt.run(row);
  }

  deleteObject(calendarPath: string, objectPath: string): boolean {
    const stmt = this.db.prepare(`DELETE FROM calendar_objects WHERE calendar_path = ? AND path = ?`);
    return stmt.run(calendarPath, objectPath).changes > 0;
  }

  listObjects(calendarPath: string): StoredCalendarObject[] {
    const stmt = this.db.prepare(`
      SELECT calendar_path, path, etag, last_modified, content_length, data, synced_at
      FROM calendar_objects
      WHERE calendar_path = ?
      ORDER BY path
    `);
    const rows = stmt.all(calendarPath) as CalendarObjectRow[];
    return rows.map((row) => ({
      calendarPath: row.calendar_path,
      path: row.path,
      etag: row.etag,
      modTime: row.last_modified ? new Date(row.last_modified) : null,
      contentLength: row.content_length,
      data: row.data,
      syncedAt: row.synced_at,
    }));
  }

  countObjects(calendarPath: string): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS count FROM calendar_objects WHERE calendar_path = ?`)
      .get(calendarPath) as { count: number } | undefined;
    return row?.count ?? 0;
  }

  deleteAllObjects(calendarPath: string): number {
    const stmt = this.db.prepare(`DELETE FROM calendar_objects WHERE calendar_path = ?`);
    return stmt.run(calendarPath).changes;
  }

  setState(calendarPath: string, key: string, value: string) {
    const stmt = this.db.prepare(`
      INSERT INTO sync_state (calendar_path, key, value)
      VALUES (?, ?, ?)
      ON CONFLICT(calendar_path, key) DO UPDATE SET value = excluded.value
    `);
    stmt.run(calendarPath, key, value);
  }

  getState(calendarPath: string, key: string): string | undefined {
    const stmt = this.db.prepare(`
      SELECT value
      FROM sync_state
      WHERE calendar_path = ? AND key = ?
    `);
    const row = stmt.get(calendarPath, key) as { value: string } | undefined;
    return row?.value;
  }

  deleteAllState(calendarPath: string): number {
    const stmt = this.db.prepare(`DELETE FROM sync_state WHERE calendar_path = ?`);
    return stmt.run(calendarPath).changes;
  }

  listTrackedCalendarPaths(): string[] {
    const rows = this.db
      .prepare(`SELECT DISTINCT calendar_path FROM sync_state ORDER BY calendar_path`)
      .all() as Array<{ calendar_path: string }>;
    return rows.map((row) => row.calendar_path);
  }
}
