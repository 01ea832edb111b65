/**
 * Decodes plain text, one task per line:
 *
 *   [HIGH] Buy milk
 *   [low] x Water the plants
 *   # comments and blank lines are skipped
 *
 * A leading bracket tag sets the priority when it names one and is dropped
 * either way. A leading `x `, `X `, `✓ `, `[x]` or `[X]` marks the task done.
 * Lines that end up with an empty description still produce a task.
 */

import type { TaskRecord } from '../../types/task.js';
import type { Priority } from '../../types/priority.js';
import { DEFAULT_PRIORITY, isPriority } from '../../types/priority.js';
import { formatTimestamp } from '../../parsers/timestamp-parser.js';
import type { DecodeOptions } from '../options.js';

const COMPLETED_PREFIXES = ['x ', 'X ', '✓ ', '[x]', '[X]'];
// Everything a completion marker may be built from
const COMPLETED_MARK_RE = /^[xX✓ [\]]+/u;

type TextLine =
  | { readonly kind: 'skip' }
  | { readonly kind: 'task'; readonly description: string; readonly priority: Priority; readonly completed: boolean };

interface TextParserState {
  readonly nextId: number;
  readonly records: readonly TaskRecord[];
}

function readPriorityTag(line: string): { priority: Priority; rest: string } {
  if (!line.startsWith('[')) return { priority: DEFAULT_PRIORITY, rest: line };

  const end = line.indexOf(']');
  if (end === -1) return { priority: DEFAULT_PRIORITY, rest: line };

  const tag = line.slice(1, end).trim().toLowerCase();
  return {
    priority: isPriority(tag) ? tag : DEFAULT_PRIORITY,
    rest: line.slice(end + 1).trim(),
  };
}

function classifyLine(raw: string): TextLine {
  const line = raw.trim();
  if (line === '' || line.startsWith('#')) return { kind: 'skip' };

  const { priority, rest } = readPriorityTag(line);

  if (COMPLETED_PREFIXES.some(prefix => rest.startsWith(prefix))) {
    return { kind: 'task', description: rest.replace(COMPLETED_MARK_RE, '').trim(), priority, completed: true };
  }
  return { kind: 'task', description: rest, priority, completed: false };
}

/** Decode text lines into records with ids 1..n. Returns null when no line yields a task. */
export function decodeText(text: string, options: DecodeOptions = {}): TaskRecord[] | null {
  const stamp = formatTimestamp(options.now ?? new Date());

  let state: TextParserState = { nextId: 1, records: [] };
  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = classifyLine(raw);
    if (line.kind === 'skip') continue;

    state = {
      nextId: state.nextId + 1,
      records: [...state.records, {
        id: state.nextId,
        task: line.description,
        priority: line.priority,
        completed: line.completed,
        created_at: stamp,
      }],
    };
  }

  return state.records.length > 0 ? [...state.records] : null;
}
