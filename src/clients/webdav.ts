import type pino from "pino";
import { HttpError, basicAuthorization, requestText, type TextResponse } from "../http.js";
import { parseMultistatus, type Multistatus } from "./multistatus.js";
import { element, serializeXml, textElement, type XmlElement } from "./xml.js";

export type Depth = "0" | "1" | "infinity";
export type SyncLevel = "1" | "infinite";

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface DavCredentials {
  username: string;
  password: string;
}

export interface DavResource {
  /** Path the server answered from, after redirects. */
  path: string;
  headers: Headers;
  body: string;
}

/**
 * The WebDAV primitives the CalDAV layer is built on. Every method rejects
 * with `HttpError` on a non-2xx answer.
 */
export interface DavTransport {
  propFind(path: string, depth: Depth, props: XmlElement[], options?: RequestOptions): Promise<Multistatus>;
  propPatch(path: string, set: XmlElement[], options?: RequestOptions): Promise<Multistatus>;
  report(path: string, depth: Depth | null, body: XmlElement, options?: RequestOptions): Promise<Multistatus>;
  syncCollection(
    path: string,
    syncToken: string,
    level: SyncLevel,
    limit: number | undefined,
    props: XmlElement[],
    options?: RequestOptions,
  ): Promise<Multistatus>;
  getResource(path: string, headers: Record<string, string>, options?: RequestOptions): Promise<DavResource>;
  putResource(
    path: string,
    body: string,
    contentType: string,
    headers: Record<string, string>,
    options?: RequestOptions,
  ): Promise<DavResource>;
  deleteResource(path: string, headers: Record<string, string>, options?: RequestOptions): Promise<void>;
}

const XML_CONTENT_TYPE = "application/xml; charset=utf-8";

export function buildSyncCollectionBody(
  syncToken: string,
  level: SyncLevel,
  limit: number | undefined,
  props: XmlElement[],
): XmlElement {
  const children: XmlElement[] = [textElement("d:sync-token", syncToken), textElement("d:sync-level", level)];
  if (limit !== undefined && limit > 0) {
    children.push(element("d:limit", undefined, [textElement("d:nresults", String(limit))]));
  }
  children.push(element("d:prop", undefined, props));
  return element("d:sync-collection", undefined, children);
}

export class WebDavClient implements DavTransport {
  private readonly endpoint: URL;

  constructor(
    endpoint: string,
    private readonly credentials: DavCredentials | undefined,
    private readonly logger: pino.Logger,
    private readonly timeoutMs = 20_000,
  ) {
    this.endpoint = new URL(endpoint);
  }

  resolveUrl(path: string): string {
    if (!path) {
      return this.endpoint.href;
    }
    return new URL(encodeURI(path), this.endpoint).href;
  }

  async propFind(
    path: string,
    depth: Depth,
    props: XmlElement[],
    options: RequestOptions = {},
  ): Promise<Multistatus> {
    const body = element("d:propfind", undefined, [element("d:prop", undefined, props)]);
    return this.multistatus("PROPFIND", path, body, { Depth: depth }, options);
  }

  async propPatch(path: string, set: XmlElement[], options: RequestOptions = {}): Promise<Multistatus> {
    const body = element("d:propertyupdate", undefined, [
      element("d:set", undefined, [element("d:prop", undefined, set)]),
    ]);
    return this.multistatus("PROPPATCH", path, body, {}, options);
  }

  async report(
    path: string,
    depth: Depth | null,
    body: XmlElement,
    options: RequestOptions = {},
  ): Promise<Multistatus> {
    const headers: Record<string, string> = depth === null ? {} : { Depth: depth };
    return this.multistatus("REPORT", path, body, headers, options);
  }

  async syncCollection(
    path: string,
    syncToken: string,
    level: SyncLevel,
    limit: number | undefined,
    props: XmlElement[],
    options: RequestOptions = {},
  ): Promise<Multistatus> {
    const body = buildSyncCollectionBody(syncToken, level, limit, props);
    return this.multistatus("REPORT", path, body, { Depth: "0" }, options);
  }

  async getResource(
    path: string,
    headers: Record<string, string>,
    options: RequestOptions = {},
  ): Promise<DavResource> {
    const response = await this.send("GET", path, { headers }, options);
    return this.toResource(path, response);
  }

  async putResource(
    path: string,
    body: string,
    contentType: string,
    headers: Record<string, string>,
    options: RequestOptions = {},
  ): Promise<DavResource> {
    const response = await this.send(
      "PUT",
      path,
      { headers: { ...headers, "Content-Type": contentType }, body },
      options,
    );
    return this.toResource(path, response);
  }

  async deleteResource(
    path: string,
    headers: Record<string, string>,
    options: RequestOptions = {},
  ): Promise<void> {
    await this.send("DELETE", path, { headers }, options);
  }

  private async multistatus(
    method: string,
    path: string,
    body: XmlElement,
    headers: Record<string, string>,
    options: RequestOptions,
  ): Promise<Multistatus> {
    const response = await this.send(
      method,
      path,
      {
        headers: { ...headers, "Content-Type": XML_CONTENT_TYPE },
        body: serializeXml(body),
      },
      options,
    );

    if (response.status !== 207) {
      throw new HttpError(
        `${method} ${path} returned status ${response.status} instead of 207 Multi-Status`,
        response.status,
        response.body,
        response.headers,
      );
    }

    return parseMultistatus(response.body);
  }

  private async send(
    method: string,
    path: string,
    init: { headers: Record<string, string>; body?: string },
    options: RequestOptions,
  ): Promise<TextResponse> {
    options.signal?.throwIfAborted();

    const headers: Record<string, string> = { ...init.headers };
    if (this.credentials) {
      headers.Authorization = basicAuthorization(this.credentials.username, this.credentials.password);
    }

    const url = this.resolveUrl(path);
    const startedAt = Date.now();
    try {
      const response = await requestText(
        url,
        { method, headers, body: init.body, signal: options.signal },
        this.timeoutMs,
      );
      this.logger.debug(
        { method, path, status: response.status, durationMs: Date.now() - startedAt },
        "WebDAV request completed",
      );
      return response;
    } catch (error) {
      if (error instanceof HttpError) {
        this.logger.debug(
          { method, path, status: error.status, durationMs: Date.now() - startedAt },
          "WebDAV request failed",
        );
      }
      throw error;
    }
  }

  private toResource(requestedPath: string, response: TextResponse): DavResource {
    const answeredPath = response.url ? new URL(response.url).pathname : "";
    return {
      path: answeredPath ? decodePathname(answeredPath) : requestedPath,
      headers: response.headers,
      body: response.body,
    };
  }
}

function decodePathname(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}
