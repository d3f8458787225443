import { HttpError } from "../http.js";
import { asArray, asRecord, asText, parseXml } from "./xml.js";

export interface DavPropStat {
  status: number;
  props: Record<string, unknown>;
}

export interface DavResponse {
  href: string;
  /** Decoded path of `href`. */
  path: string;
  /** Response-level status; `null` when the entry only carries propstats. */
  status: number | null;
  propStats: DavPropStat[];
}

export interface Multistatus {
  responses: DavResponse[];
  syncToken: string | null;
}

export function parseStatusLine(line: string): number {
  const match = line.trim().match(/^HTTP\/\d+(?:\.\d+)?\s+(\d{3})/i);
  if (!match) {
    throw new Error(`Malformed status line '${line}'`);
  }
  return Number(match[1]);
}

export function hrefToPath(href: string): string {
  const pathname = new URL(href.trim(), "http://localhost").pathname;
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

function decodePropStat(raw: unknown): DavPropStat {
  const record = asRecord(raw) ?? {};
  return {
    status: parseStatusLine(asText(record.status)),
    props: asRecord(record.prop) ?? {},
  };
}

function decodeResponse(raw: unknown): DavResponse {
  const record = asRecord(raw) ?? {};
  const href = asText(asArray(record.href)[0]);
  if (!href) {
    throw new Error("Multistatus response is missing href");
  }

  return {
    href,
    path: hrefToPath(href),
    status: record.status === undefined ? null : parseStatusLine(asText(record.status)),
    propStats: asArray(record.propstat).map(decodePropStat),
  };
}

export function parseMultistatus(xml: string): Multistatus {
  const root = asRecord(parseXml(xml).multistatus);
  if (!root) {
    throw new Error("Response body is not a DAV:multistatus document");
  }

  const syncToken = root["sync-token"];
  return {
    responses: asArray(root.response).map(decodeResponse),
    syncToken: syncToken === undefined ? null : asText(syncToken),
  };
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** The entry's own failure status, if the server reported one. */
export function responseError(response: DavResponse): HttpError | null {
  if (response.status === null || isSuccess(response.status)) {
    return null;
  }
  return new HttpError(
    `Multistatus entry ${response.path} has status ${response.status}`,
    response.status,
    undefined,
    new Headers(),
  );
}

/**
 * Looks up a property in the entry's successful propstats. Properties that
 * are absent or reported under a 404 propstat both come back `undefined`.
 */
export function findProp(response: DavResponse, name: string): unknown {
  for (const propStat of response.propStats) {
    if (!isSuccess(propStat.status)) {
      continue;
    }
    if (name in propStat.props) {
      return propStat.props[name];
    }
  }
  return undefined;
}

export function propStatErrors(response: DavResponse): HttpError[] {
  return response.propStats
    .filter((propStat) => !isSuccess(propStat.status))
    .map(
      (propStat) =>
        new HttpError(
          `Property update on ${response.path} failed with status ${propStat.status}`,
          propStat.status,
          Object.keys(propStat.props),
          new Headers(),
        ),
    );
}
