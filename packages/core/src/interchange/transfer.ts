/**
 * File-level entry points: resolve the format, read or write the file, and run
 * the decode -> validate -> merge pipeline. Every failure comes back as a
 * value (null or false); nothing here throws for I/O or malformed input.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { CandidateRecord, Task } from '../types/task.js';
import type { DecodeOptions, EncodeOptions } from './options.js';
import { resolveFormat } from './format-resolver.js';
import { decode } from './decoders/index.js';
import { encode } from './encoders/index.js';
import { validateRecords } from './validator.js';
import type { MergeStrategy } from './merge.js';
import { DEFAULT_MERGE_STRATEGY, mergeTasks } from './merge.js';

export interface ImportOptions extends DecodeOptions {
  /** Explicit format tag or alias; otherwise taken from the file extension */
  format?: string;
}

export interface ExportOptions extends EncodeOptions {
  format?: string;
}

export interface MergeImportOptions extends ImportOptions {
  strategy?: MergeStrategy;
}

export interface ImportOutcome {
  /** The merged collection, ready to be persisted */
  readonly tasks: Task[];
  /** Number of records that survived validation */
  readonly imported: number;
  readonly warnings: string[];
}

const BOM = '\uFEFF';

function readText(filePath: string): string | null {
  try {
    const text = readFileSync(filePath, 'utf8');
    return text.startsWith(BOM) ? text.slice(BOM.length) : text;
  } catch {
    return null;
  }
}

/** Read and decode a file into candidate records. Null on unknown format, read error or malformed input. */
export function importTasks(filePath: string, options: ImportOptions = {}): CandidateRecord[] | null {
  const format = resolveFormat(filePath, options.format);
  if (format === null) return null;

  const text = readText(filePath);
  if (text === null) return null;

  return decode(text, format, options);
}

/** Encode and write a collection. False on unknown format, encoder refusal or write error. */
export function exportTasks(tasks: readonly Task[], filePath: string, options: ExportOptions = {}): boolean {
  const format = resolveFormat(filePath, options.format);
  if (format === null) return false;

  const content = encode(tasks, format, options);
  if (content === null) return false;

  try {
    writeFileSync(filePath, content, 'utf8');
    return true;
  } catch {
    return false;
  }
}

/**
 * Import a file into an existing collection: decode, validate, then merge.
 * Null when the file cannot be decoded; validation problems become warnings.
 */
export function importIntoCollection(
  existing: readonly Task[],
  filePath: string,
  options: MergeImportOptions = {},
): ImportOutcome | null {
  const candidates = importTasks(filePath, options);
  if (candidates === null) return null;

  const { tasks, warnings } = validateRecords(candidates, options);
  return {
    tasks: mergeTasks(existing, tasks, options.strategy ?? DEFAULT_MERGE_STRATEGY),
    imported: tasks.length,
    warnings,
  };
}
