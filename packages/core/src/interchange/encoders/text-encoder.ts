import type { Task } from '../../types/task.js';
import { displayDay, formatMinute, fromDate } from '../../parsers/timestamp-parser.js';
import type { EncodeOptions } from '../options.js';

const RULE_WIDTH = 60;
const DOUBLE_RULE = '='.repeat(RULE_WIDTH);
const SINGLE_RULE = '-'.repeat(RULE_WIDTH);

export function encodeText(tasks: readonly Task[], options: EncodeOptions = {}): string {
  const now = options.now ?? new Date();
  const lines = [
    DOUBLE_RULE,
    'TASK LIST EXPORT',
    DOUBLE_RULE,
    `Exported: ${formatMinute(fromDate(now))}`,
    `Total Tasks: ${tasks.length}`,
    DOUBLE_RULE,
    '',
  ];

  for (const task of tasks) {
    const status = task.completed ? '✓' : '○';
    lines.push(
      `[${status}] [${task.priority.toUpperCase()}] ${task.description}`,
      `    Created: ${displayDay(task.createdAt)}`,
      SINGLE_RULE,
      '',
    );
  }

  return lines.join('\n') + '\n';
}
