import type { Task } from '../../types/task.js';
import { toRecord } from '../../types/task.js';
import { formatTimestamp } from '../../parsers/timestamp-parser.js';
import type { EncodeOptions } from '../options.js';

/** `{ export_date, total_tasks, tasks }` as JSON, indented unless compact */
export function encodeRecords(tasks: readonly Task[], options: EncodeOptions = {}): string {
  const data = {
    export_date: formatTimestamp(options.now ?? new Date()),
    total_tasks: tasks.length,
    tasks: tasks.map(toRecord),
  };
  return (options.compact ? JSON.stringify(data) : JSON.stringify(data, null, 2)) + '\n';
}
