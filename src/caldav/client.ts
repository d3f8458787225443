import type pino from "pino";
import { findProp, hrefToPath, propStatErrors, responseError } from "../clients/multistatus.js";
import type { DavTransport } from "../clients/webdav.js";
import {
  asArray,
  asRecord,
  asText,
  childNames,
  element,
  textElement,
  type XmlElement,
} from "../clients/xml.js";
import { HttpError } from "../http.js";
import {
  CALENDAR_PROPS,
  decodeCalendarObject,
  isCalendarResourceType,
  parseCalendarFromResponse,
  populateCalendarObject,
  quoteEtag,
} from "./decode.js";
import { CalDavError, PreconditionFailedError, isNotFound, toCalDavError } from "./errors.js";
import { encodeCalendarDataRequest, encodeCompFilter } from "./filter.js";
import { parentCollectionPath, sameCollectionPath } from "./paths.js";
import {
  DEFAULT_RANGE_WINDOW_MS,
  MIN_RANGE_WINDOW_MS,
  queryCalendarRange,
  type CalendarQueryExecutor,
} from "./range-query.js";
import { syncCalendar } from "./sync.js";
import type {
  Calendar,
  CalendarCompRequest,
  CalendarListSyncResult,
  CalendarObject,
  CalendarQueryRequest,
  DeleteCalendarObjectOptions,
  OperationOptions,
  PutCalendarObjectOptions,
  SyncQuery,
  SyncResponse,
  UpdateCalendarOptions,
} from "./types.js";

export const CALENDAR_MIME_TYPE = "text/calendar";

export interface CalDavClientOptions {
  rangeWindowMs?: number;
  rangeMinWindowMs?: number;
}

function hrefPath(value: unknown): string {
  const href = asText(asArray(asRecord(value)?.href)[0]).trim();
  return href ? hrefToPath(href) : "";
}

function ensureValidCalendar(calendar: Calendar): Calendar {
  if (calendar.maxResourceSize < 0) {
    throw new Error(`max-resource-size of ${calendar.path} must be a non-negative integer`);
  }
  return calendar;
}

export class CalDavClient {
  private readonly rangeWindowMs: number;
  private readonly rangeMinWindowMs: number;

  constructor(
    private readonly transport: DavTransport,
    private readonly logger: pino.Logger,
    options: CalDavClientOptions = {},
  ) {
    this.rangeWindowMs = options.rangeWindowMs ?? DEFAULT_RANGE_WINDOW_MS;
    this.rangeMinWindowMs = options.rangeMinWindowMs ?? MIN_RANGE_WINDOW_MS;
  }

  async findCurrentUserPrincipal(options: OperationOptions = {}): Promise<string> {
    try {
      const ms = await this.transport.propFind("", "0", [element("d:current-user-principal")], options);
      const response = ms.responses[0];
      if (!response) {
        throw new Error("Server returned no PROPFIND response");
      }

      const principal = asRecord(findProp(response, "current-user-principal"));
      if (principal && "unauthenticated" in principal) {
        throw new Error("Server reports the request as unauthenticated");
      }
      const path = hrefPath(principal);
      if (!path) {
        throw new Error("current-user-principal is missing");
      }
      return path;
    } catch (error) {
      throw toCalDavError("discovery", "Finding the current user principal failed", error);
    }
  }

  async findCalendarHomeSet(principal: string, options: OperationOptions = {}): Promise<string> {
    try {
      const ms = await this.transport.propFind(principal, "0", [element("c:calendar-home-set")], options);
      const response = ms.responses[0];
      const path = response ? hrefPath(findProp(response, "calendar-home-set")) : "";
      if (!path) {
        throw new Error(`calendar-home-set is missing on ${principal}`);
      }
      return path;
    } catch (error) {
      throw toCalDavError("discovery", "Finding the calendar home set failed", error);
    }
  }

  async findCalendars(calendarHomeSet: string, options: OperationOptions = {}): Promise<Calendar[]> {
    try {
      const ms = await this.transport.propFind(calendarHomeSet, "1", CALENDAR_PROPS, options);
      const calendars: Calendar[] = [];
      for (const response of ms.responses) {
        if (responseError(response) || isCalendarResourceType(response) !== true) {
          continue;
        }
        const calendar = parseCalendarFromResponse(response);
        if (calendar) {
          calendars.push(ensureValidCalendar(calendar));
        }
      }
      return calendars;
    } catch (error) {
      throw toCalDavError("discovery", `Listing calendars in ${calendarHomeSet} failed`, error);
    }
  }

  async getCalendar(path: string, options: OperationOptions = {}): Promise<Calendar> {
    try {
      const ms = await this.transport.propFind(path, "0", CALENDAR_PROPS, options);
      const response = ms.responses[0];
      if (!response) {
        throw new Error(`Server returned no properties for ${path}`);
      }
      const failure = responseError(response);
      if (failure) {
        throw failure;
      }

      const calendar = parseCalendarFromResponse(response);
      if (!calendar) {
        throw new Error(`Resource at ${path} is not a calendar collection`);
      }
      return ensureValidCalendar(calendar);
    } catch (error) {
      throw toCalDavError("discovery", `Reading calendar ${path} failed`, error);
    }
  }

  async updateCalendar(
    path: string,
    update: UpdateCalendarOptions,
    options: OperationOptions = {},
  ): Promise<Calendar> {
    const set: XmlElement[] = [];
    if (update.name !== undefined) {
      set.push(textElement("d:displayname", update.name));
    }
    if (update.description !== undefined) {
      set.push(textElement("c:calendar-description", update.description));
    }
    if (update.color !== undefined) {
      set.push(textElement("a:calendar-color", update.color));
    }
    if (update.timezone !== undefined) {
      set.push(textElement("c:calendar-timezone", update.timezone));
    }
    if (set.length === 0) {
      throw new CalDavError("update", "No calendar properties to update");
    }

    try {
      const ms = await this.transport.propPatch(path, set, options);
      if (ms.responses.length !== 1) {
        throw new Error(`Expected 1 PROPPATCH response, got ${ms.responses.length}`);
      }
      const response = ms.responses[0];
      const failure = responseError(response) ?? propStatErrors(response)[0];
      if (failure) {
        throw failure;
      }
    } catch (error) {
      throw toCalDavError("update", `Updating calendar ${path} failed`, error);
    }

    return this.getCalendar(path, options);
  }

  async getCalendarObject(path: string, options: OperationOptions = {}): Promise<CalendarObject> {
    try {
      const resource = await this.transport.getResource(path, { Accept: CALENDAR_MIME_TYPE }, options);
      const mediaType = (resource.headers.get("content-type") ?? "").split(";")[0].trim().toLowerCase();
      if (mediaType !== CALENDAR_MIME_TYPE) {
        throw new Error(`Expected Content-Type ${CALENDAR_MIME_TYPE}, got '${mediaType}'`);
      }

      return populateCalendarObject(
        { path: resource.path, modTime: null, contentLength: 0, etag: "", data: resource.body },
        resource.headers,
      );
    } catch (error) {
      throw toCalDavError("object", `Fetching ${path} failed`, error);
    }
  }

  async putCalendarObject(
    path: string,
    data: string,
    conditions: PutCalendarObjectOptions = {},
    options: OperationOptions = {},
  ): Promise<CalendarObject> {
    const headers: Record<string, string> = {};
    if (conditions.ifMatch) {
      headers["If-Match"] = quoteEtag(conditions.ifMatch);
    }
    if (conditions.ifNoneMatch) {
      headers["If-None-Match"] = conditions.ifNoneMatch === "*" ? "*" : quoteEtag(conditions.ifNoneMatch);
    }

    try {
      const resource = await this.transport.putResource(path, data, CALENDAR_MIME_TYPE, headers, options);
      return populateCalendarObject(
        { path, modTime: null, contentLength: 0, etag: "", data: null },
        resource.headers,
      );
    } catch (error) {
      if (error instanceof HttpError && error.status === 412) {
        throw new PreconditionFailedError(path, error);
      }
      throw toCalDavError("object", `Storing ${path} failed`, error);
    }
  }

  async deleteCalendarObject(
    path: string,
    conditions: DeleteCalendarObjectOptions = {},
    options: OperationOptions = {},
  ): Promise<void> {
    const headers: Record<string, string> = {};
    if (conditions.ifMatch) {
      headers["If-Match"] = quoteEtag(conditions.ifMatch);
    }

    try {
      await this.transport.deleteResource(path, headers, options);
    } catch (error) {
      if (error instanceof HttpError && error.status === 412) {
        throw new PreconditionFailedError(path, error);
      }
      if (isNotFound(error)) {
        throw new CalDavError("object", `Calendar object not found at ${path}`, error);
      }
      throw toCalDavError("object", `Deleting ${path} failed`, error);
    }
  }

  async calendarQuery(
    path: string,
    query: CalendarQueryRequest,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    try {
      return await this.executeCalendarQuery(path, query, options);
    } catch (error) {
      throw toCalDavError("query", `calendar-query on ${path} failed`, error);
    }
  }

  async calendarMultiget(
    paths: string[],
    compRequest: CalendarCompRequest,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    try {
      return await this.executeMultiget(paths, compRequest, options);
    } catch (error) {
      throw toCalDavError("query", `calendar-multiget of ${paths.length} object(s) failed`, error);
    }
  }

  private async executeMultiget(
    paths: string[],
    compRequest: CalendarCompRequest,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    if (paths.length === 0) {
      return [];
    }

    const body = element("c:calendar-multiget", undefined, [
      element("d:prop", undefined, encodeCalendarDataRequest(compRequest)),
      ...paths.map((path) => textElement("d:href", encodeURI(path))),
    ]);

    const ms = await this.transport.report(parentCollectionPath(paths[0]), "1", body, options);
    const objects: CalendarObject[] = [];
    for (const response of ms.responses) {
      const failure = responseError(response);
      if (failure) {
        if (failure.status === 404) {
          this.logger.debug({ path: response.path }, "Multiget target no longer exists");
          continue;
        }
        throw failure;
      }
      objects.push(decodeCalendarObject(response, response.path));
    }
    return objects;
  }

  async listCalendarObjects(
    path: string,
    fetchData: boolean,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    try {
      const ms = await this.transport.propFind(
        path,
        "1",
        [
          element("d:getetag"),
          element("d:getlastmodified"),
          element("d:getcontentlength"),
          element("d:resourcetype"),
        ],
        options,
      );

      const objects: CalendarObject[] = [];
      const objectPaths: string[] = [];
      for (const response of ms.responses) {
        if (responseError(response) || sameCollectionPath(response.path, path)) {
          continue;
        }
        // Sub-collections carry a non-empty resourcetype.
        if (childNames(findProp(response, "resourcetype")).length > 0) {
          continue;
        }

        if (fetchData) {
          objectPaths.push(response.path);
        } else {
          objects.push(decodeCalendarObject(response, response.path));
        }
      }

      if (fetchData) {
        return await this.executeMultiget(
          objectPaths,
          { name: "VCALENDAR", allProps: true, allComps: true },
          options,
        );
      }
      return objects;
    } catch (error) {
      throw toCalDavError("query", `Listing objects in ${path} failed`, error);
    }
  }

  async syncCalendar(
    path: string,
    query: SyncQuery = {},
    options: OperationOptions = {},
  ): Promise<SyncResponse> {
    return syncCalendar(
      this.transport,
      (paths, compRequest, fetchOptions) => this.executeMultiget(paths, compRequest, fetchOptions),
      path,
      query,
      { signal: options.signal, logger: this.logger },
    );
  }

  async calendarQueryRange(
    path: string,
    start: Date | undefined,
    end: Date | undefined,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    const executor: CalendarQueryExecutor = {
      calendarQuery: (queryPath, query, queryOptions) =>
        this.executeCalendarQuery(queryPath, query, queryOptions),
    };

    try {
      return await queryCalendarRange(executor, path, start, end, {
        signal: options.signal,
        windowMs: this.rangeWindowMs,
        minWindowMs: this.rangeMinWindowMs,
        logger: this.logger,
      });
    } catch (error) {
      throw toCalDavError("query", `Time range query on ${path} failed`, error);
    }
  }

  async syncCalendarList(
    calendarHomeSet: string,
    syncToken: string,
    limit = 0,
    options: OperationOptions = {},
  ): Promise<CalendarListSyncResult> {
    try {
      const ms = await this.transport.syncCollection(
        calendarHomeSet,
        syncToken,
        "1",
        limit > 0 ? limit : undefined,
        CALENDAR_PROPS,
        options,
      );

      const result: CalendarListSyncResult = {
        nextSyncToken: ms.syncToken ?? "",
        updatedCalendars: [],
        deletedCalendars: [],
      };

      for (const response of ms.responses) {
        if (sameCollectionPath(response.path, calendarHomeSet)) {
          continue;
        }

        const failure = responseError(response);
        if (failure) {
          if (failure.status === 404) {
            result.deletedCalendars.push(response.path);
          } else {
            this.logger.warn(
              { path: response.path, status: failure.status },
              "Skipping calendar list entry with error status",
            );
          }
          continue;
        }

        const calendar = parseCalendarFromResponse(response);
        if (calendar) {
          result.updatedCalendars.push(ensureValidCalendar(calendar));
        }
      }

      return result;
    } catch (error) {
      throw toCalDavError("sync", `Syncing the calendar list of ${calendarHomeSet} failed`, error);
    }
  }

  private async executeCalendarQuery(
    path: string,
    query: CalendarQueryRequest,
    options: OperationOptions = {},
  ): Promise<CalendarObject[]> {
    const body = element("c:calendar-query", undefined, [
      element("d:prop", undefined, encodeCalendarDataRequest(query.compRequest)),
      element("c:filter", undefined, [encodeCompFilter(query.filter)]),
    ]);

    const ms = await this.transport.report(path, "1", body, options);
    return ms.responses.map((response) => {
      const failure = responseError(response);
      if (failure) {
        throw failure;
      }
      return decodeCalendarObject(response, response.path);
    });
  }
}
