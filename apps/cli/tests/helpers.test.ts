import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  parsePriorityArg,
  parseFormatArg,
  parseStrategyArg,
  parseIdArg,
  parseDaysArg,
  parseIdArgs,
  $try,
} from '../src/helpers.js';

describe('parsePriorityArg', () => {
  it('parses names', () => {
    expect(parsePriorityArg('high')).toBe('high');
    expect(parsePriorityArg('medium')).toBe('medium');
    expect(parsePriorityArg('low')).toBe('low');
  });

  it('parses numbers and p-numbers', () => {
    expect(parsePriorityArg('1')).toBe('high');
    expect(parsePriorityArg('p2')).toBe('medium');
    expect(parsePriorityArg('3')).toBe('low');
  });

  it('is case-insensitive', () => {
    expect(parsePriorityArg('HIGH')).toBe('high');
    expect(parsePriorityArg(' Low ')).toBe('low');
  });

  it('returns null for unknown', () => {
    expect(parsePriorityArg('critical')).toBeNull();
  });
});

describe('parseFormatArg', () => {
  it('accepts aliases', () => {
    expect(parseFormatArg('json')).toBe('record');
    expect(parseFormatArg('CSV')).toBe('table');
    expect(parseFormatArg('md')).toBe('checklist');
    expect(parseFormatArg('html')).toBe('document');
    expect(parseFormatArg('txt')).toBe('text');
  });

  it('returns null for unknown', () => {
    expect(parseFormatArg('pdf')).toBeNull();
  });
});

describe('parseStrategyArg', () => {
  it('accepts the three strategies', () => {
    expect(parseStrategyArg('append')).toBe('append');
    expect(parseStrategyArg('Replace')).toBe('replace');
    expect(parseStrategyArg('skip_duplicates')).toBe('skip_duplicates');
  });

  it('accepts a dashed spelling', () => {
    expect(parseStrategyArg('skip-duplicates')).toBe('skip_duplicates');
  });

  it('returns null for unknown', () => {
    expect(parseStrategyArg('merge')).toBeNull();
  });
});

describe('parseIdArgs', () => {
  it('parses integer ids', () => {
    expect(parseIdArgs(['1', ' 12', '0'])).toEqual([1, 12, 0]);
  });

  it('throws on the first invalid id', () => {
    expect(() => parseIdArgs(['1', 'abc', '-2'])).toThrow("Invalid task id 'abc'");
    expect(() => parseIdArg('1.5')).toThrow("Invalid task id '1.5'");
  });
});

describe('parseDaysArg', () => {
  it('parses whole numbers of days', () => {
    expect(parseDaysArg('7')).toBe(7);
    expect(parseDaysArg(' 0 ')).toBe(0);
  });

  it('returns null for anything else', () => {
    expect(parseDaysArg('-1')).toBeNull();
    expect(parseDaysArg('2.5')).toBeNull();
    expect(parseDaysArg('week')).toBeNull();
  });
});

describe('$try', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the error message and sets the exit code', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    $try(() => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('test error');
    expect(process.exitCode).toBe(1);
    consoleSpy.mockRestore();
  });
});
