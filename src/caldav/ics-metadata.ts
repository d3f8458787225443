export interface EventMetadata {
  start: Date | null;
  end: Date | null;
  recurring: boolean;
  /** UNTIL of the recurrence rule; `null` when unbounded or bounded by COUNT. */
  recurrenceEnd: Date | null;
  /** True when the rule has neither UNTIL nor COUNT. */
  recurrenceOpen: boolean;
}

// UTC date-time, floating date-time, date. Tried in order; first match wins.
const ICS_TIME_FORMATS: RegExp[] = [
  /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/,
  /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/,
  /^(\d{4})(\d{2})(\d{2})$/,
];

export function unfoldIcsLines(icsText: string): string[] {
  const rawLines = icsText.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");
  const lines: string[] = [];

  for (const rawLine of rawLines) {
    if ((rawLine.startsWith(" ") || rawLine.startsWith("\t")) && lines.length > 0) {
      lines[lines.length - 1] += rawLine.slice(1);
      continue;
    }
    lines.push(rawLine);
  }

  return lines;
}

function matchIcsTime(pattern: RegExp, value: string): Date | null {
  const match = value.match(pattern);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = "0", minute = "0", second = "0"] = match;
  const fields = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = fields;
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const parsed = new Date(0);
  parsed.setUTCFullYear(y, mo - 1, d);
  parsed.setUTCHours(h, mi, s, 0);

  // Out-of-range fields roll over; reject instead.
  if (
    parsed.getUTCFullYear() !== y ||
    parsed.getUTCMonth() !== mo - 1 ||
    parsed.getUTCDate() !== d ||
    parsed.getUTCHours() !== h ||
    parsed.getUTCMinutes() !== mi ||
    parsed.getUTCSeconds() !== s
  ) {
    return null;
  }

  return parsed;
}

/**
 * Parses an iCalendar DATE or DATE-TIME value. Floating times are read as
 * UTC wall-clock; only ordering against a cutoff depends on the result.
 */
export function parseIcsTime(value: string): Date | null {
  const trimmed = value.trim();
  for (const pattern of ICS_TIME_FORMATS) {
    const parsed = matchIcsTime(pattern, trimmed);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

function propertyName(line: string): string {
  const colonIndex = line.indexOf(":");
  const head = colonIndex < 0 ? line : line.slice(0, colonIndex);
  return (head.split(";")[0] ?? "").trim().toUpperCase();
}

function propertyValue(line: string): string {
  const colonIndex = line.indexOf(":");
  if (colonIndex < 0) {
    return "";
  }
  return line.slice(colonIndex + 1).trim();
}

function applyRecurrenceRule(meta: EventMetadata, rule: string) {
  meta.recurring = true;
  meta.recurrenceOpen = true;

  for (const part of rule.split(";")) {
    const eqIndex = part.indexOf("=");
    if (eqIndex < 0) {
      continue;
    }

    const key = part.slice(0, eqIndex).trim().toUpperCase();
    const value = part.slice(eqIndex + 1).trim();

    if (key === "UNTIL") {
      const until = parseIcsTime(value);
      if (until) {
        meta.recurrenceEnd = until;
        meta.recurrenceOpen = false;
      }
    } else if (key === "COUNT" && /^[+-]?\d+$/.test(value)) {
      meta.recurrenceOpen = false;
    }
  }
}

/**
 * Best-effort summary of the first VEVENT in a calendar object. Returns
 * `null` for an empty payload or a non-recurring event with neither DTSTART
 * nor DTEND.
 */
export function extractEventMetadata(data: string | null | undefined): EventMetadata | null {
  if (!data) {
    return null;
  }

  const meta: EventMetadata = {
    start: null,
    end: null,
    recurring: false,
    recurrenceEnd: null,
    recurrenceOpen: false,
  };

  let inEvent = false;
  for (const line of unfoldIcsLines(data)) {
    const marker = line.trim().toUpperCase();
    if (marker === "BEGIN:VEVENT") {
      inEvent = true;
      continue;
    }
    if (marker === "END:VEVENT") {
      if (inEvent) {
        break;
      }
      continue;
    }
    if (!inEvent) {
      continue;
    }

    const name = propertyName(line);
    if (name !== "DTSTART" && name !== "DTEND" && name !== "RRULE") {
      continue;
    }

    const value = propertyValue(line);
    if (!value) {
      continue;
    }

    if (name === "RRULE") {
      applyRecurrenceRule(meta, value);
    } else if (name === "DTSTART") {
      meta.start = parseIcsTime(value) ?? meta.start;
    } else {
      meta.end = parseIcsTime(value) ?? meta.end;
    }
  }

  if (meta.recurring) {
    return meta;
  }
  if (!meta.start && !meta.end) {
    return null;
  }
  return meta;
}
