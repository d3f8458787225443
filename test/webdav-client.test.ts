import { afterEach, describe, expect, it, vi } from "vitest";
import { WebDavClient, buildSyncCollectionBody } from "../src/clients/webdav.js";
import { element, serializeXml } from "../src/clients/xml.js";
import { HttpError } from "../src/http.js";
import { createSilentLogger } from "../src/logger.js";

const EMPTY_MULTISTATUS = `<?xml version="1.0"?><d:multistatus xmlns:d="DAV:"><d:sync-token>t9</d:sync-token></d:multistatus>`;

function stubFetch(response: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) {
    return undefined;
  }
  const value = headers[name];
  return typeof value === "string" ? value : undefined;
}

describe("WebDavClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("resolves and percent-encodes paths against the endpoint", () => {
    const client = new WebDavClient("https://dav.example.com/base/", undefined, createSilentLogger());

    expect(client.resolveUrl("/calendars/alice/team sync.ics")).toBe(
      "https://dav.example.com/calendars/alice/team%20sync.ics",
    );
    expect(client.resolveUrl("")).toBe("https://dav.example.com/base/");
  });

  it("sends a sync-collection REPORT with Depth 0 and Basic credentials", async () => {
    const fetchMock = stubFetch(() => new Response(EMPTY_MULTISTATUS, { status: 207 }));
    const client = new WebDavClient(
      "https://dav.example.com/",
      { username: "alice", password: "test-secret" },
      createSilentLogger(),
    );

    const ms = await client.syncCollection("/cal/", "t1", "1", 25, [element("d:getetag")]);

    expect(ms).toEqual({ responses: [], syncToken: "t9" });
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://dav.example.com/cal/");
    expect(init?.method).toBe("REPORT");
    expect(headerOf(init, "Depth")).toBe("0");
    expect(headerOf(init, "Authorization")).toBe(`Basic ${Buffer.from("alice:test-secret").toString("base64")}`);
    expect(init?.body).toBe(serializeXml(buildSyncCollectionBody("t1", "1", 25, [element("d:getetag")])));
  });

  it("writes the result limit only when positive", () => {
    const limited = buildSyncCollectionBody("", "1", 10, []);
    const unlimited = buildSyncCollectionBody("", "1", undefined, []);

    expect(limited.children?.map((child) => child.name)).toEqual([
      "d:sync-token",
      "d:sync-level",
      "d:limit",
      "d:prop",
    ]);
    expect(limited.children?.[2]?.children?.[0]).toEqual({ name: "d:nresults", text: "10" });
    expect(unlimited.children?.map((child) => child.name)).toEqual(["d:sync-token", "d:sync-level", "d:prop"]);
  });

  it("rejects multistatus requests answered without 207", async () => {
    stubFetch(() => new Response("<ok/>", { status: 200 }));
    const client = new WebDavClient("https://dav.example.com/", undefined, createSilentLogger());

    const error = await client.propFind("/cal/", "0", []).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error instanceof HttpError ? error.status : null).toBe(200);
  });

  it("surfaces HTTP failures with status and body", async () => {
    stubFetch(() => new Response("<d:error/>", { status: 403 }));
    const client = new WebDavClient("https://dav.example.com/", undefined, createSilentLogger());

    const error = await client.deleteResource("/cal/a.ics", {}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error instanceof HttpError ? [error.status, error.body] : null).toEqual([403, "<d:error/>"]);
  });

  it("returns GET bodies and headers", async () => {
    stubFetch(
      () =>
        new Response("BEGIN:VCALENDAR", {
          status: 200,
          headers: { "Content-Type": "text/calendar; charset=utf-8", ETag: '"e1"' },
        }),
    );
    const client = new WebDavClient("https://dav.example.com/", undefined, createSilentLogger());

    const resource = await client.getResource("/cal/a.ics", { Accept: "text/calendar" });

    expect(resource.path).toBe("/cal/a.ics");
    expect(resource.body).toBe("BEGIN:VCALENDAR");
    expect(resource.headers.get("etag")).toBe('"e1"');
  });

  it("does not send a request once cancelled", async () => {
    const fetchMock = stubFetch(() => new Response(EMPTY_MULTISTATUS, { status: 207 }));
    const client = new WebDavClient("https://dav.example.com/", undefined, createSilentLogger());
    const controller = new AbortController();
    controller.abort();

    const error = await client
      .propFind("/cal/", "1", [], { signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBe(controller.signal.reason);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
