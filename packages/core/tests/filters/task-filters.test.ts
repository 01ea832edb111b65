import { describe, it, expect } from 'vitest';
import { searchTasks, getOverdueTasks } from '../../src/filters/task-filters.js';
import { NOW, task } from '../interchange/fixtures.js';

describe('searchTasks', () => {
  const tasks = [
    task(1, 'Buy milk'),
    task(2, 'Call the bank'),
    task(3, 'BUY stamps'),
  ];

  it('matches a substring of the description, ignoring case', () => {
    expect(searchTasks(tasks, 'buy').map(t => t.id)).toEqual([1, 3]);
    expect(searchTasks(tasks, 'BANK').map(t => t.id)).toEqual([2]);
  });

  it('returns every task for an empty keyword', () => {
    expect(searchTasks(tasks, '')).toEqual(tasks);
  });

  it('returns nothing when no description matches', () => {
    expect(searchTasks(tasks, 'dentist')).toEqual([]);
  });
});

describe('getOverdueTasks', () => {
  const tasks = [
    task(1, 'Old and open', { createdAt: '2026-02-20T00:00:00' }),
    task(2, 'Recent', { createdAt: '2026-02-25T12:00:00' }),
    task(3, 'Old but done', { createdAt: '2026-01-01T00:00:00', completed: true }),
    task(4, 'Unreadable date', { createdAt: 'garbage' }),
    task(5, 'Ancient', { createdAt: '0050-01-01T00:00:00' }),
  ];

  it('keeps unchecked tasks older than the threshold', () => {
    expect(getOverdueTasks(tasks, 7, NOW).map(t => t.id)).toEqual([1, 5]);
  });

  it('uses a wider window for more days', () => {
    expect(getOverdueTasks(tasks, 30, NOW).map(t => t.id)).toEqual([5]);
  });

  it('counts anything created before now with zero days', () => {
    expect(getOverdueTasks(tasks, 0, NOW).map(t => t.id)).toEqual([1, 2, 5]);
  });
});
