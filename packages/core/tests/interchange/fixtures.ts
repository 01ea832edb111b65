import type { Task } from '../../src/types/task.js';

export const NOW = new Date(2026, 2, 1, 9, 30, 15, 250);
export const STAMP = '2026-03-01T09:30:15.250';

export const TASKS: Task[] = [
  { id: 1, description: 'Write report', priority: 'medium', completed: false, createdAt: '2026-02-10T08:05:00' },
  { id: 2, description: 'Fix <login> & "signup"', priority: 'high', completed: true, createdAt: '2026-02-11T14:20:59.500' },
  { id: 3, description: 'Water plants', priority: 'low', completed: false, createdAt: 'garbage' },
];

export function task(id: number, description: string, overrides: Partial<Task> = {}): Task {
  return { id, description, priority: 'medium', completed: false, createdAt: '2026-01-01T00:00:00', ...overrides };
}
