import type { TaskRecord } from '../../types/task.js';
import { DEFAULT_PRIORITY } from '../../types/priority.js';
import { parseCsv } from '../../parsers/csv-parser.js';
import { formatTimestamp } from '../../parsers/timestamp-parser.js';
import type { DecodeOptions } from '../options.js';

export const TABLE_COLUMNS = ['id', 'task', 'priority', 'completed', 'created_at'] as const;

type Column = (typeof TABLE_COLUMNS)[number];

const DIGITS_RE = /^[0-9]+$/;
const TRUE_VALUES = new Set(['true', '1', 'yes']);

/**
 * Decode CSV with a header row. Cells are looked up by header name; a header
 * naming the canonical columns in order is what the table encoder writes.
 * A file without data rows is a failure (null), not an empty result.
 */
export function decodeTable(text: string, options: DecodeOptions = {}): TaskRecord[] | null {
  const [header, ...rows] = parseCsv(text);
  if (!header || rows.length === 0) return null;

  const stamp = formatTimestamp(options.now ?? new Date());
  const positions = new Map<Column, number>();
  for (const column of TABLE_COLUMNS) {
    const index = header.indexOf(column);
    if (index !== -1) positions.set(column, index);
  }

  return rows.map(cells => {
    const cell = (column: Column): string | undefined => {
      const index = positions.get(column);
      return index === undefined ? undefined : cells[index];
    };

    const id = cell('id') ?? '';
    return {
      id: DIGITS_RE.test(id) ? parseInt(id, 10) : 0,
      task: cell('task') ?? '',
      priority: cell('priority') ?? DEFAULT_PRIORITY,
      completed: TRUE_VALUES.has((cell('completed') ?? 'false').toLowerCase()),
      created_at: cell('created_at') ?? stamp,
    };
  });
}
