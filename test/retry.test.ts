import { afterEach, describe, expect, it, vi } from "vitest";
import { CalDavError } from "../src/caldav/errors.js";
import { HttpError } from "../src/http.js";
import { createSilentLogger } from "../src/logger.js";
import { withRetry } from "../src/retry.js";

function discoveryError(status: number, headers: Record<string, string> = {}): CalDavError {
  return new CalDavError(
    "discovery",
    "Finding the current user principal failed",
    new HttpError(`PROPFIND failed with status ${status}`, status, undefined, new Headers(headers)),
  );
}

describe("withRetry", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries transient failures wrapped in a CalDAV error after Retry-After", async () => {
    vi.useFakeTimers();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(discoveryError(503, { "Retry-After": "2" }))
      .mockResolvedValueOnce("/principals/alice/");

    const promise = withRetry(createSilentLogger(), "findCurrentUserPrincipal", fn);
    await vi.advanceTimersByTimeAsync(1_999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(promise).resolves.toBe("/principals/alice/");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows permanent failures unchanged", async () => {
    const failure = discoveryError(404);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(createSilentLogger(), "getCalendar", fn)).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
