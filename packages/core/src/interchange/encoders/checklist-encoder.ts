import type { Task } from '../../types/task.js';
import { PRIORITY_ORDER, PriorityName } from '../../types/priority.js';
import { displayDay, formatMinute, fromDate } from '../../parsers/timestamp-parser.js';
import type { EncodeOptions } from '../options.js';

/** Checklist grouped under one `## <Priority> Priority` heading per non-empty priority */
export function encodeChecklist(tasks: readonly Task[], options: EncodeOptions = {}): string {
  const now = options.now ?? new Date();
  const lines = ['# Task List', '', `*Exported: ${formatMinute(fromDate(now))}*`, ''];

  for (const priority of PRIORITY_ORDER) {
    const bucket = tasks.filter(t => t.priority === priority);
    if (bucket.length === 0) continue;

    lines.push(`## ${PriorityName[priority]} Priority`, '');
    for (const task of bucket) {
      const checkbox = task.completed ? '[x]' : '[ ]';
      lines.push(`- ${checkbox} **${task.description}** _${displayDay(task.createdAt)}_`);
    }
    lines.push('');
  }

  return lines.join('\n') + '\n';
}
