/**
 * Parses and formats the ISO-8601-style local timestamps stored in
 * `created_at` and `export_date`.
 * Accepts: 2026-03-01, 2026-03-01T09, 2026-03-01T09:30, 2026-03-01 09:30:15,
 * fractional seconds (1-6 digits) and a Z / ±HH:MM / ±HHMM offset.
 * Offsets are validated but not applied: dates are shown as written.
 */

const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

/** Wall-clock fields of a parsed timestamp; month is 1-based */
export interface Timestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function toInt(group: string | undefined): number {
  return group === undefined ? 0 : parseInt(group, 10);
}

function isValidOffset(offset: string | undefined): boolean {
  if (offset === undefined || offset === 'Z') return true;
  const digits = offset.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2), 10) : 0;
  return hours < 24 && minutes < 60;
}

// The Date constructor maps years 0-99 to 1900-1999; setFullYear does not
function localDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date {
  const d = new Date(2000, 0, 1);
  d.setFullYear(year, month - 1, day);
  d.setHours(hour, minute, second, 0);
  return d;
}

/**
 * Parse a stored timestamp. Returns null for anything that is not a string
 * in one of the accepted shapes, or that names an impossible date or time.
 */
export function parseTimestamp(value: unknown): Timestamp | null {
  if (typeof value !== 'string') return null;

  const m = TIMESTAMP_RE.exec(value);
  if (!m) return null;

  const year = toInt(m[1]);
  const month = toInt(m[2]);
  const day = toInt(m[3]);
  const hour = toInt(m[4]);
  const minute = toInt(m[5]);
  const second = toInt(m[6]);

  if (year < 1) return null;

  // Rejects calendar overflow like 2026-02-30
  const noon = localDate(year, month, day, 12);
  if (noon.getFullYear() !== year || noon.getMonth() !== month - 1 || noon.getDate() !== day) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) return null;
  if (!isValidOffset(m[8])) return null;

  return { year, month, day, hour, minute, second };
}

/** The local Date a timestamp's wall-clock fields name */
export function toDate(ts: Timestamp): Date {
  return localDate(ts.year, ts.month, ts.day, ts.hour, ts.minute, ts.second);
}

/** Wall-clock fields of a Date in local time */
export function fromDate(d: Date): Timestamp {
  return {
    year: d.getFullYear(),
    month: d.getMonth() + 1,
    day: d.getDate(),
    hour: d.getHours(),
    minute: d.getMinutes(),
    second: d.getSeconds(),
  };
}

/** Format a Date as yyyy-MM-ddTHH:mm:ss.SSS in local time */
export function formatTimestamp(d: Date): string {
  return `${formatDay(fromDate(d))}T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

/** yyyy-MM-dd */
export function formatDay(ts: Timestamp): string {
  return `${pad(ts.year, 4)}-${pad(ts.month)}-${pad(ts.day)}`;
}

/** yyyy-MM-dd HH:mm */
export function formatMinute(ts: Timestamp): string {
  return `${formatDay(ts)} ${pad(ts.hour)}:${pad(ts.minute)}`;
}

/** yyyyMMdd_HHmmss (filesystem-safe) */
export function formatCompact(ts: Timestamp): string {
  return `${pad(ts.year, 4)}${pad(ts.month)}${pad(ts.day)}_${pad(ts.hour)}${pad(ts.minute)}${pad(ts.second)}`;
}

/** Day of a stored timestamp, or N/A when it does not parse */
export function displayDay(value: unknown): string {
  const ts = parseTimestamp(value);
  return ts ? formatDay(ts) : 'N/A';
}

/** Day and minute of a stored timestamp, or N/A when it does not parse */
export function displayMinute(value: unknown): string {
  const ts = parseTimestamp(value);
  return ts ? formatMinute(ts) : 'N/A';
}
