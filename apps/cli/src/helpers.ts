/**
 * CLI helpers: argument parsing and error handling.
 */

import type { Format, MergeStrategy, Priority, TaskId } from '@taskbridge/core';
import { isMergeStrategy, parseFormatTag } from '@taskbridge/core';
import * as out from './output.js';

/**
 * Parse a priority string (name, number or p-number) into a Priority.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case '1': case 'p1': return 'high';
    case 'medium': case '2': case 'p2': return 'medium';
    case 'low': case '3': case 'p3': return 'low';
    default: return null;
  }
}

/** A format tag or alias (json, csv, md, html, txt, ...) */
export function parseFormatArg(tag: string): Format | null {
  return parseFormatTag(tag);
}

export function parseStrategyArg(value: string): MergeStrategy | null {
  const normalized = value.trim().toLowerCase().replaceAll('-', '_');
  return isMergeStrategy(normalized) ? normalized : null;
}

/** A non-negative whole number of days, or null */
export function parseDaysArg(value: string): number | null {
  const trimmed = value.trim();
  return /^[0-9]+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export function parseIdArg(arg: string): TaskId {
  const trimmed = arg.trim();
  if (!/^[0-9]+$/.test(trimmed)) throw new Error(`Invalid task id '${arg}'`);
  return parseInt(trimmed, 10);
}

/**
 * Parse task id arguments, throwing on the first one that is not a
 * non-negative integer.
 */
export function parseIdArgs(args: readonly string[]): TaskId[] {
  return args.map(parseIdArg);
}

/**
 * Run a command action, printing any thrown error in red and marking the
 * process as failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
