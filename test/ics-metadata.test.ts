import { describe, expect, it } from "vitest";
import { extractEventMetadata, parseIcsTime, unfoldIcsLines } from "../src/caldav/ics-metadata.js";
import { vevent } from "./helpers/dav.js";

describe("unfoldIcsLines", () => {
  it("joins continuation lines and drops exactly one leading whitespace character", () => {
    const lines = unfoldIcsLines("SUMMARY:Long\r\n  title\r\n\tend\r\nUID:1");

    expect(lines).toEqual(["SUMMARY:Long titleend", "UID:1"]);
  });

  it("accepts bare LF and CR line endings", () => {
    expect(unfoldIcsLines("A:1\nB:2\rC:3")).toEqual(["A:1", "B:2", "C:3"]);
  });
});

describe("parseIcsTime", () => {
  it("parses UTC date-times", () => {
    expect(parseIcsTime("20231002T120000Z")?.toISOString()).toBe("2023-10-02T12:00:00.000Z");
  });

  it("reads floating date-times as UTC wall-clock", () => {
    expect(parseIcsTime("20231002T090000")?.toISOString()).toBe("2023-10-02T09:00:00.000Z");
  });

  it("parses dates as midnight UTC", () => {
    expect(parseIcsTime("20231002")?.toISOString()).toBe("2023-10-02T00:00:00.000Z");
  });

  it("keeps years below 100 literal", () => {
    expect(parseIcsTime("00500301T120000Z")?.toISOString()).toBe("0050-03-01T12:00:00.000Z");
    expect(parseIcsTime("00010101")?.toISOString()).toBe("0001-01-01T00:00:00.000Z");
  });

  it("rejects out-of-range fields and unknown shapes", () => {
    expect(parseIcsTime("20231332")).toBeNull();
    expect(parseIcsTime("20230230T000000Z")).toBeNull();
    expect(parseIcsTime("2023-10-02")).toBeNull();
  });
});

describe("extractEventMetadata", () => {
  it("returns null for empty payloads", () => {
    expect(extractEventMetadata(null)).toBeNull();
    expect(extractEventMetadata("")).toBeNull();
  });

  it("reads DTSTART and DTEND with parameters", () => {
    const meta = extractEventMetadata(
      vevent(["UID:a", "DTSTART;TZID=Europe/Berlin:20231002T090000", "DTEND:20231002T100000Z"]),
    );

    expect(meta).toEqual({
      start: new Date("2023-10-02T09:00:00Z"),
      end: new Date("2023-10-02T10:00:00Z"),
      recurring: false,
      recurrenceEnd: null,
      recurrenceOpen: false,
    });
  });

  it("treats a rule without UNTIL or COUNT as open-ended", () => {
    const meta = extractEventMetadata(vevent(["DTSTART:20200101T090000Z", "RRULE:FREQ=WEEKLY"]));

    expect(meta?.recurring).toBe(true);
    expect(meta?.recurrenceOpen).toBe(true);
    expect(meta?.recurrenceEnd).toBeNull();
  });

  it("reads UNTIL as the recurrence end", () => {
    const meta = extractEventMetadata(
      vevent(["DTSTART:20200101T090000Z", "RRULE:FREQ=DAILY;UNTIL=20200301T000000Z"]),
    );

    expect(meta?.recurrenceOpen).toBe(false);
    expect(meta?.recurrenceEnd?.toISOString()).toBe("2020-03-01T00:00:00.000Z");
  });

  it("closes the recurrence on COUNT without setting an end", () => {
    const meta = extractEventMetadata(vevent(["DTSTART:20200101T090000Z", "RRULE:FREQ=DAILY;COUNT=5"]));

    expect(meta?.recurrenceOpen).toBe(false);
    expect(meta?.recurrenceEnd).toBeNull();
  });

  it("keeps a recurring event even without parseable times", () => {
    const meta = extractEventMetadata(vevent(["DTSTART:garbage", "RRULE:FREQ=DAILY"]));

    expect(meta).not.toBeNull();
    expect(meta?.start).toBeNull();
  });

  it("unfolds a rule split across lines", () => {
    const meta = extractEventMetadata(
      vevent(["DTSTART:20200101T090000Z", "RRULE:FREQ=DAILY;UN", " TIL=20200105T000000Z"]),
    );

    expect(meta?.recurrenceEnd?.toISOString()).toBe("2020-01-05T00:00:00.000Z");
  });

  it("only reads the first VEVENT", () => {
    const data = [
      "BEGIN:VCALENDAR",
      "BEGIN:VEVENT",
      "DTSTART:20231001T080000Z",
      "END:VEVENT",
      "BEGIN:VEVENT",
      "DTSTART:20231005T080000Z",
      "RRULE:FREQ=DAILY",
      "END:VEVENT",
      "END:VCALENDAR",
    ].join("\r\n");

    const meta = extractEventMetadata(data);

    expect(meta?.start?.toISOString()).toBe("2023-10-01T08:00:00.000Z");
    expect(meta?.recurring).toBe(false);
  });

  it("ignores properties outside VEVENT", () => {
    const data = ["BEGIN:VCALENDAR", "DTSTART:20231001T080000Z", "BEGIN:VTODO", "END:VTODO", "END:VCALENDAR"].join(
      "\r\n",
    );

    expect(extractEventMetadata(data)).toBeNull();
  });
});
