/**
 * In-memory filters over a task collection.
 */

import type { Task } from '../types/task.js';
import { parseTimestamp, toDate } from '../parsers/timestamp-parser.js';

export const DEFAULT_OVERDUE_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Tasks whose description contains the keyword, ignoring case. An empty keyword matches all. */
export function searchTasks(tasks: readonly Task[], keyword: string): Task[] {
  if (!keyword) return [...tasks];

  const needle = keyword.toLowerCase();
  return tasks.filter(t => t.description.toLowerCase().includes(needle));
}

/**
 * Unchecked tasks created more than `days` days before `now`.
 * Tasks with an unreadable created_at are never overdue.
 */
export function getOverdueTasks(
  tasks: readonly Task[],
  days: number = DEFAULT_OVERDUE_DAYS,
  now: Date = new Date(),
): Task[] {
  const cutoff = now.getTime() - days * DAY_MS;

  return tasks.filter(t => {
    if (t.completed) return false;
    const ts = parseTimestamp(t.createdAt);
    return ts !== null && toDate(ts).getTime() < cutoff;
  });
}
