import { element, textElement, type XmlElement } from "../clients/xml.js";
import type {
  CalendarCompRequest,
  CalendarExpandRequest,
  CompFilter,
  ParamFilter,
  PropFilter,
  TextMatch,
} from "./types.js";

/** Formats an instant as an iCalendar UTC date-time (`20231002T120000Z`). */
export function formatIcsUtc(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, "Z")
    .replace(/[-:]/g, "");
}

function encodeTimeRange(start: Date | undefined, end: Date | undefined): XmlElement | null {
  if (!start && !end) {
    return null;
  }
  const attributes: Record<string, string> = {};
  if (start) {
    attributes.start = formatIcsUtc(start);
  }
  if (end) {
    attributes.end = formatIcsUtc(end);
  }
  return element("c:time-range", attributes);
}

function encodeTextMatch(match: TextMatch): XmlElement {
  const encoded = textElement("c:text-match", match.text);
  if (match.negateCondition) {
    encoded.attributes = { "negate-condition": "yes" };
  }
  return encoded;
}

function notDefined(): XmlElement {
  return element("c:is-not-defined");
}

export function encodeParamFilter(filter: ParamFilter): XmlElement {
  const children: XmlElement[] = [];
  if (filter.isNotDefined) {
    children.push(notDefined());
  }
  if (filter.textMatch) {
    children.push(encodeTextMatch(filter.textMatch));
  }
  return element("c:param-filter", { name: filter.name }, children);
}

export function encodePropFilter(filter: PropFilter): XmlElement {
  const children: XmlElement[] = [];
  if (filter.isNotDefined) {
    children.push(notDefined());
  }

  const timeRange = encodeTimeRange(filter.start, filter.end);
  if (timeRange) {
    children.push(timeRange);
  }
  if (filter.textMatch) {
    children.push(encodeTextMatch(filter.textMatch));
  }
  for (const paramFilter of filter.paramFilters ?? []) {
    children.push(encodeParamFilter(paramFilter));
  }

  return element("c:prop-filter", { name: filter.name }, children);
}

export function encodeCompFilter(filter: CompFilter): XmlElement {
  const children: XmlElement[] = [];
  if (filter.isNotDefined) {
    children.push(notDefined());
  }

  const timeRange = encodeTimeRange(filter.start, filter.end);
  if (timeRange) {
    children.push(timeRange);
  }
  for (const propFilter of filter.props ?? []) {
    children.push(encodePropFilter(propFilter));
  }
  for (const compFilter of filter.comps ?? []) {
    children.push(encodeCompFilter(compFilter));
  }

  return element("c:comp-filter", { name: filter.name }, children);
}

export function encodeCalendarCompRequest(request: CalendarCompRequest): XmlElement {
  const children: XmlElement[] = [];
  if (request.allProps) {
    children.push(element("c:allprop"));
  }
  for (const name of request.props ?? []) {
    children.push(element("c:prop", { name }));
  }
  if (request.allComps) {
    children.push(element("c:allcomp"));
  }
  for (const child of request.comps ?? []) {
    children.push(encodeCalendarCompRequest(child));
  }
  return element("c:comp", { name: request.name }, children);
}

function encodeExpand(expand: CalendarExpandRequest): XmlElement {
  return element("c:expand", {
    start: formatIcsUtc(expand.start),
    end: formatIcsUtc(expand.end),
  });
}

/**
 * The `DAV:prop` children for object-returning reports: calendar-data shaped
 * by `request`, plus the resource metadata the decoder reads.
 */
export function encodeCalendarDataRequest(request: CalendarCompRequest): XmlElement[] {
  const calendarData: XmlElement[] = [encodeCalendarCompRequest(request)];
  if (request.expand) {
    calendarData.push(encodeExpand(request.expand));
  }

  return [
    element("c:calendar-data", undefined, calendarData),
    element("d:getlastmodified"),
    element("d:getetag"),
    element("d:getcontentlength"),
  ];
}
