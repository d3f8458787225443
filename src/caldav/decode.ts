import { findProp, type DavResponse } from "../clients/multistatus.js";
import { asArray, asRecord, asText, attributeOf, childNames, element, type XmlElement } from "../clients/xml.js";
import type { Calendar, CalendarObject } from "./types.js";

/** Properties requested when describing a calendar collection. */
export const CALENDAR_PROPS: XmlElement[] = [
  element("d:resourcetype"),
  element("d:displayname"),
  element("c:calendar-description"),
  element("c:max-resource-size"),
  element("c:supported-calendar-component-set"),
  element("a:calendar-color"),
  element("c:calendar-timezone"),
  element("d:sync-token"),
  element("d:current-user-privilege-set"),
];

export function unquoteEtag(raw: string): string {
  const trimmed = raw.trim().replace(/^W\//, "");
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\"/g, '"');
  }
  return trimmed;
}

export function quoteEtag(etag: string): string {
  return `"${etag.replace(/"/g, '\\"')}"`;
}

export function parseHttpDate(raw: string, context: string): Date {
  const parsed = new Date(raw.trim());
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid ${context} value '${raw}'`);
  }
  return parsed;
}

export function parseContentLength(raw: string, context: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${context} value '${raw}'`);
  }
  return Number(trimmed);
}

function textProp(response: DavResponse, name: string): string {
  return asText(findProp(response, name)).trim();
}

export function isCalendarResourceType(response: DavResponse): boolean | null {
  const resourceType = findProp(response, "resourcetype");
  if (resourceType === undefined) {
    return null;
  }
  return childNames(resourceType).includes("calendar");
}

/**
 * Decodes collection properties into a Calendar. Returns `null` for
 * collections that say they are not calendars; a missing resourcetype is
 * taken as a calendar, since sync responses often omit it.
 */
export function parseCalendarFromResponse(response: DavResponse): Calendar | null {
  if (isCalendarResourceType(response) === false) {
    return null;
  }

  const rawMaxSize = textProp(response, "max-resource-size");
  const maxResourceSize = rawMaxSize ? Number(rawMaxSize) : 0;
  if (!Number.isInteger(maxResourceSize)) {
    throw new Error(`Invalid max-resource-size value '${rawMaxSize}' on ${response.path}`);
  }

  const componentSet = asRecord(findProp(response, "supported-calendar-component-set"));
  const supportedComponentSet = asArray(componentSet?.comp)
    .map((comp) => attributeOf(comp, "name"))
    .filter((name): name is string => Boolean(name));

  const privilegeSet = asRecord(findProp(response, "current-user-privilege-set"));
  const currentUserPrivileges = asArray(privilegeSet?.privilege).flatMap((privilege) =>
    childNames(privilege),
  );

  return {
    path: response.path,
    name: textProp(response, "displayname"),
    description: textProp(response, "calendar-description"),
    maxResourceSize,
    supportedComponentSet,
    color: textProp(response, "calendar-color"),
    timezone: asText(findProp(response, "calendar-timezone")),
    syncToken: textProp(response, "sync-token"),
    currentUserPrivileges,
  };
}

/**
 * Decodes an object entry. calendar-data may be absent (some servers leave
 * it out of sync responses); `data` is then `null`.
 */
export function decodeCalendarObject(response: DavResponse, path: string): CalendarObject {
  const data = findProp(response, "calendar-data");
  const lastModified = textProp(response, "getlastmodified");
  const etag = textProp(response, "getetag");
  const contentLength = textProp(response, "getcontentlength");

  return {
    path,
    modTime: lastModified ? parseHttpDate(lastModified, "getlastmodified") : null,
    contentLength: contentLength ? parseContentLength(contentLength, "getcontentlength") : 0,
    etag: etag ? unquoteEtag(etag) : "",
    data: data === undefined ? null : asText(data),
  };
}

/** Fills object metadata from GET/PUT response headers. */
export function populateCalendarObject(object: CalendarObject, headers: Headers): CalendarObject {
  const populated = { ...object };

  const location = headers.get("location");
  if (location) {
    populated.path = decodeURIComponent(new URL(location, "http://localhost").pathname);
  }
  const etag = headers.get("etag");
  if (etag) {
    populated.etag = unquoteEtag(etag);
  }
  const contentLength = headers.get("content-length");
  if (contentLength) {
    populated.contentLength = parseContentLength(contentLength, "Content-Length");
  }
  const lastModified = headers.get("last-modified");
  if (lastModified) {
    populated.modTime = parseHttpDate(lastModified, "Last-Modified");
  }

  return populated;
}
