/**
 * Turns candidate records into validated tasks.
 *
 * Only two defects reject a record: a value that is not a key/value object,
 * and a missing or blank `task` description. Every other defect is repaired
 * in place of the record (priority -> medium, completed -> false, id -> its
 * 1-based position, created_at -> now), some of them with a warning.
 */

import type { CandidateRecord, Task } from '../types/task.js';
import { isRecordShaped } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { DEFAULT_PRIORITY, isPriority } from '../types/priority.js';
import { formatTimestamp, parseTimestamp } from '../parsers/timestamp-parser.js';

export interface ValidationResult {
  readonly tasks: Task[];
  readonly warnings: string[];
}

export interface ValidateOptions {
  /** Stamp for missing or unreadable created_at values. Defaults to the current time. */
  now?: Date;
}

function has(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key) && record[key] !== undefined;
}

export function validateRecords(
  candidates: readonly CandidateRecord[],
  options: ValidateOptions = {},
): ValidationResult {
  const stamp = formatTimestamp(options.now ?? new Date());
  const tasks: Task[] = [];
  const warnings: string[] = [];

  candidates.forEach((candidate, index) => {
    const position = index + 1;

    if (!isRecordShaped(candidate)) {
      warnings.push(`Task ${position}: Not a valid dictionary`);
      return;
    }

    const description = candidate['task'];
    if (typeof description !== 'string' || description.trim() === '') {
      warnings.push(`Task ${position}: Missing or empty 'task' field`);
      return;
    }

    let priority: Priority = DEFAULT_PRIORITY;
    if (has(candidate, 'priority')) {
      const value = candidate['priority'];
      if (isPriority(value)) {
        priority = value;
      } else {
        warnings.push(`Task ${position}: Invalid priority '${String(value)}', using 'medium'`);
      }
    }

    const completed = candidate['completed'];
    const id = candidate['id'];

    let createdAt = stamp;
    if (has(candidate, 'created_at')) {
      const value = candidate['created_at'];
      if (typeof value === 'string' && parseTimestamp(value) !== null) {
        createdAt = value;
      } else {
        warnings.push(`Task ${position}: Invalid date format, using current time`);
      }
    }

    tasks.push({
      id: typeof id === 'number' && Number.isInteger(id) ? id : position,
      description,
      priority,
      completed: typeof completed === 'boolean' ? completed : false,
      createdAt,
    });
  });

  return { tasks, warnings };
}
