export interface ResolvedCommitDate {
  day: string;
  timestamp: string;
}

export interface DateResolveOptions {
  timezone?: string;
}

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  offset?: string;
}

const MONTHS: Record<string, number> = {
  Jan: 1,
  Feb: 2,
  Mar: 3,
  Apr: 4,
  May: 5,
  Jun: 6,
  Jul: 7,
  Aug: 8,
  Sep: 9,
  Oct: 10,
  Nov: 11,
  Dec: 12
};

// 2025-12-04, 2025-12-04 10:20:30 +0100, 2025-12-04T10:20:30+01:00
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2})(?:\s*(Z|[+-]\d{2}:?\d{2}))?)?$/;
// Thu Dec 4 10:20:30 2025 +0100
const DEFAULT_PATTERN =
  /^[A-Z][a-z]{2}\s+([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})(?:\s+([+-]\d{4}))?$/;
// Thu, 4 Dec 2025 10:20:30 +0100
const RFC_PATTERN =
  /^[A-Z][a-z]{2},\s+(\d{1,2})\s+([A-Z][a-z]{2})\s+(\d{4})\s+(\d{2}):(\d{2}):(\d{2})(?:\s+([+-]\d{4}))?$/;

export function formatDateInTimeZone(date: Date, timezone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  });
  const parts = formatter.formatToParts(date);
  const year = parts.find((part) => part.type === "year")?.value ?? "1970";
  const month = parts.find((part) => part.type === "month")?.value ?? "01";
  const day = parts.find((part) => part.type === "day")?.value ?? "01";
  return `${year}-${month}-${day}`;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset === "Z") {
    return "Z";
  }
  if (offset.includes(":")) {
    return offset;
  }
  return `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day
  );
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a `YYYY-MM-DD` string naming a real calendar day. */
export function isCalendarDay(value: string): boolean {
  const match = value.match(DAY_PATTERN);
  if (!match) {
    return false;
  }
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function matchParts(raw: string): DateParts | null {
  const iso = raw.match(ISO_PATTERN);
  if (iso) {
    return {
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: Number(iso[4] ?? 0),
      minute: Number(iso[5] ?? 0),
      second: Number(iso[6] ?? 0),
      ...(iso[7] ? { offset: iso[7] } : {})
    };
  }

  const def = raw.match(DEFAULT_PATTERN);
  const defMonth = def?.[1] ? MONTHS[def[1]] : undefined;
  if (def && defMonth) {
    return {
      year: Number(def[6]),
      month: defMonth,
      day: Number(def[2]),
      hour: Number(def[3]),
      minute: Number(def[4]),
      second: Number(def[5]),
      ...(def[7] ? { offset: def[7] } : {})
    };
  }

  const rfc = raw.match(RFC_PATTERN);
  const rfcMonth = rfc?.[2] ? MONTHS[rfc[2]] : undefined;
  if (rfc && rfcMonth) {
    return {
      year: Number(rfc[3]),
      month: rfcMonth,
      day: Number(rfc[1]),
      hour: Number(rfc[4]),
      minute: Number(rfc[5]),
      second: Number(rfc[6]),
      ...(rfc[7] ? { offset: rfc[7] } : {})
    };
  }

  return null;
}

/**
 * Resolves a git date string (default, rfc, iso, iso-strict or short format)
 * to a calendar day and an ISO instant. Returns `null` for anything else.
 *
 * Without a timezone the day is the one printed in the log, i.e. the
 * author's local day.
 */
export function resolveCommitDate(raw: string, options: DateResolveOptions = {}): ResolvedCommitDate | null {
  const parts = matchParts(raw.trim());
  if (!parts) {
    return null;
  }

  if (!isCalendarDate(parts.year, parts.month, parts.day)) {
    return null;
  }
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) {
    return null;
  }

  const localDay = `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
  const instant = new Date(
    `${localDay}T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}${normalizeOffset(parts.offset)}`
  );
  if (Number.isNaN(instant.getTime())) {
    return null;
  }

  return {
    day: options.timezone ? formatDateInTimeZone(instant, options.timezone) : localDay,
    timestamp: instant.toISOString()
  };
}
