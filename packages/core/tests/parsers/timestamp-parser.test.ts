import { describe, it, expect } from 'vitest';
import {
  parseTimestamp,
  formatTimestamp,
  formatDay,
  formatMinute,
  formatCompact,
  fromDate,
  toDate,
  displayDay,
  displayMinute,
} from '../../src/parsers/timestamp-parser.js';

const NOW = new Date(2026, 2, 1, 9, 30, 15, 250);

describe('parseTimestamp', () => {
  it('parses a full local timestamp with fraction', () => {
    expect(parseTimestamp('2026-03-01T09:30:15.250')).toEqual({
      year: 2026, month: 3, day: 1, hour: 9, minute: 30, second: 15,
    });
  });

  it('parses a date without a time', () => {
    expect(parseTimestamp('2025-12-31')).toEqual({
      year: 2025, month: 12, day: 31, hour: 0, minute: 0, second: 0,
    });
  });

  it('accepts a space separator and minute precision', () => {
    expect(parseTimestamp('2026-01-05 18:45')).toEqual({
      year: 2026, month: 1, day: 5, hour: 18, minute: 45, second: 0,
    });
  });

  it('accepts six fraction digits and offsets without shifting the wall clock', () => {
    expect(parseTimestamp('2026-01-05T23:10:00.123456+05:30')?.hour).toBe(23);
    expect(parseTimestamp('2026-01-05T23:10:00Z')?.day).toBe(5);
    expect(parseTimestamp('2026-01-05T23:10:00-0800')?.minute).toBe(10);
  });

  it('parses years before 100 as written', () => {
    expect(parseTimestamp('0050-06-01T10:00:00')).toEqual({
      year: 50, month: 6, day: 1, hour: 10, minute: 0, second: 0,
    });
    expect(parseTimestamp('0001-01-01T00:00:00')?.year).toBe(1);
    expect(parseTimestamp('0004-02-29')?.day).toBe(29);
    expect(parseTimestamp('0100-02-29')).toBeNull();
    expect(parseTimestamp('0000-01-01')).toBeNull();
  });

  it('rejects impossible dates and times', () => {
    expect(parseTimestamp('2026-02-30')).toBeNull();
    expect(parseTimestamp('2026-13-01')).toBeNull();
    expect(parseTimestamp('2026-01-01T24:00')).toBeNull();
    expect(parseTimestamp('2026-01-01T10:60')).toBeNull();
    expect(parseTimestamp('2026-01-01T10:00+25:00')).toBeNull();
  });

  it('rejects free text and non-strings', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('01/02/2026')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(20260101)).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });
});

describe('toDate', () => {
  it('builds the local Date of the wall-clock fields', () => {
    expect(toDate(fromDate(NOW))).toEqual(new Date(2026, 2, 1, 9, 30, 15));
  });

  it('keeps two-digit years', () => {
    const d = toDate({ year: 50, month: 6, day: 1, hour: 10, minute: 0, second: 0 });
    expect(d.getFullYear()).toBe(50);
    expect(d.getMonth()).toBe(5);
    expect(d.getHours()).toBe(10);
  });
});

describe('formatting', () => {
  it('formats a Date as a local ISO-style timestamp', () => {
    expect(formatTimestamp(NOW)).toBe('2026-03-01T09:30:15.250');
  });

  it('round-trips its own output through the parser', () => {
    expect(parseTimestamp(formatTimestamp(NOW))).toEqual(fromDate(NOW));
  });

  it('formats day, minute and compact forms', () => {
    const ts = fromDate(NOW);
    expect(formatDay(ts)).toBe('2026-03-01');
    expect(formatMinute(ts)).toBe('2026-03-01 09:30');
    expect(formatCompact(ts)).toBe('20260301_093015');
  });

  it('displays N/A for unreadable stored values', () => {
    expect(displayDay('2026-03-01T09:30:15')).toBe('2026-03-01');
    expect(displayDay('not a date')).toBe('N/A');
    expect(displayMinute('2026-03-01T09:30:15')).toBe('2026-03-01 09:30');
    expect(displayMinute('')).toBe('N/A');
  });
});
