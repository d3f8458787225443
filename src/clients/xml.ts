import { XMLBuilder, XMLParser } from "fast-xml-parser";

export const DAV_NS = "DAV:";
export const CALDAV_NS = "urn:ietf:params:xml:ns:caldav";
export const APPLE_ICAL_NS = "http://apple.com/ns/ical/";
export const CALENDARSERVER_NS = "http://calendarserver.org/ns/";

// Request bodies always declare these prefixes on the root element.
const NAMESPACE_PREFIXES: Record<string, string> = {
  d: DAV_NS,
  c: CALDAV_NS,
  a: APPLE_ICAL_NS,
  cs: CALENDARSERVER_NS,
};

/**
 * A request-side XML element. `name` carries one of the fixed prefixes
 * (`d:`, `c:`, `a:`, `cs:`).
 */
export interface XmlElement {
  name: string;
  attributes?: Record<string, string>;
  children?: XmlElement[];
  text?: string;
}

export function element(
  name: string,
  attributes?: Record<string, string>,
  children?: XmlElement[],
): XmlElement {
  return { name, attributes, children };
}

export function textElement(name: string, text: string): XmlElement {
  return { name, text };
}

type OrderedNode = Record<string, unknown>;

function toOrderedNode(node: XmlElement, isRoot: boolean): OrderedNode {
  const children: OrderedNode[] = [];
  if (node.text) {
    children.push({ "#text": node.text });
  }
  for (const child of node.children ?? []) {
    children.push(toOrderedNode(child, false));
  }

  const attributes: Record<string, string> = {};
  if (isRoot) {
    for (const [prefix, ns] of Object.entries(NAMESPACE_PREFIXES)) {
      attributes[`@_xmlns:${prefix}`] = ns;
    }
  }
  for (const [key, value] of Object.entries(node.attributes ?? {})) {
    attributes[`@_${key}`] = value;
  }

  const ordered: OrderedNode = { [node.name]: children };
  if (Object.keys(attributes).length > 0) {
    ordered[":@"] = attributes;
  }
  return ordered;
}

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  suppressEmptyNode: true,
  format: false,
});

export function serializeXml(root: XmlElement): string {
  return `<?xml version="1.0" encoding="UTF-8"?>${builder.build([toOrderedNode(root, true)])}`;
}

const parser = new XMLParser({
  removeNSPrefix: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // Numeric references such as &#13; carry the CR of CRLF in calendar-data.
  htmlEntities: true,
  isArray: (tagName) => tagName === "response" || tagName === "propstat",
});

export function parseXml(xml: string): Record<string, unknown> {
  const parsed: unknown = parser.parse(xml);
  return asRecord(parsed) ?? {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Text content of a parsed node. Elements that also carry attributes come
 * back from the parser as `{ "#text": ..., "@_attr": ... }`.
 */
export function asText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  const record = asRecord(value);
  if (record && "#text" in record) {
    return asText(record["#text"]);
  }
  return "";
}

/** Child element names of a parsed node, attributes excluded. */
export function childNames(value: unknown): string[] {
  const record = asRecord(value);
  if (!record) {
    return [];
  }
  return Object.keys(record).filter((key) => !key.startsWith("@_") && key !== "#text");
}

export function attributeOf(value: unknown, name: string): string | undefined {
  const attribute = asRecord(value)?.[`@_${name}`];
  return typeof attribute === "string" ? attribute : undefined;
}
