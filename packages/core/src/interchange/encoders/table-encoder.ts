import type { Task } from '../../types/task.js';
import { toRecord } from '../../types/task.js';
import { formatCsvRow } from '../../parsers/csv-parser.js';
import { TABLE_COLUMNS } from '../decoders/table-decoder.js';

/**
 * CSV with the canonical header and one row per task in collection order.
 * An empty collection is refused (null), as the table decoder refuses a file
 * without rows.
 */
export function encodeTable(tasks: readonly Task[]): string | null {
  if (tasks.length === 0) return null;

  const lines = [formatCsvRow(TABLE_COLUMNS)];
  for (const task of tasks) {
    const record = toRecord(task);
    lines.push(formatCsvRow(TABLE_COLUMNS.map(column => String(record[column]))));
  }
  return lines.join('\n') + '\n';
}
