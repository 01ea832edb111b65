/**
 * Task store operations using Drizzle ORM.
 * The store hands the interchange engine a collection (getAllTasks) and
 * persists whatever collection comes back (replaceAllTasks).
 */

import { asc, eq, max } from 'drizzle-orm';
import type { TaskbridgeDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { TaskResult, BatchResult } from '../types/results.js';
import type { Priority } from '../types/priority.js';
import { DEFAULT_PRIORITY } from '../types/priority.js';
import { tasks } from '../schema/tasks.js';
import { formatTimestamp } from '../parsers/timestamp-parser.js';

/** Map a Drizzle row to a Task (drops the storage-only seq column) */
function toTask(row: typeof tasks.$inferSelect): Task {
  return {
    id: row.id,
    description: row.description,
    priority: row.priority,
    completed: row.completed,
    createdAt: row.createdAt,
  };
}

function toRow(task: Task): typeof tasks.$inferInsert {
  return {
    id: task.id,
    description: task.description,
    priority: task.priority,
    completed: task.completed,
    createdAt: task.createdAt,
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** The whole collection in storage order */
export function getAllTasks(db: TaskbridgeDb): Task[] {
  return db.select().from(tasks).orderBy(asc(tasks.seq)).all().map(toTask);
}

/** All tasks carrying an id (ids are not unique after an append merge) */
export function getTasksById(db: TaskbridgeDb, id: TaskId): Task[] {
  return db.select().from(tasks).where(eq(tasks.id, id)).orderBy(asc(tasks.seq)).all().map(toTask);
}

/** One past the highest id in use, or 1 for an empty store */
export function getNextId(db: TaskbridgeDb): TaskId {
  const row = db.select({ maxId: max(tasks.id) }).from(tasks).get();
  return (row?.maxId ?? 0) + 1;
}

// ---------------------------------------------------------------------------
// Write queries
// ---------------------------------------------------------------------------

/** Add a task at the end of the collection */
export function addTask(
  db: TaskbridgeDb,
  description: string,
  priority: Priority = DEFAULT_PRIORITY,
  now?: Date,
): Task {
  const trimmed = description.trim();
  if (!trimmed) throw new Error('Task description cannot be empty');

  const task: Task = {
    id: getNextId(db),
    description: trimmed,
    priority,
    completed: false,
    createdAt: formatTimestamp(now ?? new Date()),
  };
  db.insert(tasks).values(toRow(task)).run();
  return task;
}

function setCompletedOne(db: TaskbridgeDb, id: TaskId, completed: boolean): TaskResult {
  const existing = getTasksById(db, id);
  if (existing.length === 0) return { type: 'not-found', taskId: id };

  const label = completed ? 'checked' : 'unchecked';
  if (existing.every(t => t.completed === completed)) {
    return { type: 'no-change', taskId: id, message: `Task ${id} is already ${label}` };
  }

  db.update(tasks).set({ completed }).where(eq(tasks.id, id)).run();
  return { type: 'success', taskId: id, message: `Task ${id} ${label}` };
}

/** Mark tasks done or not done */
export function setCompleted(db: TaskbridgeDb, ids: readonly TaskId[], completed: boolean): BatchResult {
  return { results: ids.map(id => setCompletedOne(db, id, completed)) };
}

export function setPriority(db: TaskbridgeDb, id: TaskId, priority: Priority): TaskResult {
  const existing = getTasksById(db, id);
  if (existing.length === 0) return { type: 'not-found', taskId: id };

  if (existing.every(t => t.priority === priority)) {
    return { type: 'no-change', taskId: id, message: `Task ${id} already has ${priority} priority` };
  }

  db.update(tasks).set({ priority }).where(eq(tasks.id, id)).run();
  return { type: 'success', taskId: id, message: `Task ${id} priority set to ${priority}` };
}

export function deleteTasks(db: TaskbridgeDb, ids: readonly TaskId[]): BatchResult {
  const results = ids.map((id): TaskResult => {
    const deleted = db.delete(tasks).where(eq(tasks.id, id)).run();
    return deleted.changes > 0
      ? { type: 'success', taskId: id, message: `Deleted task ${id}` }
      : { type: 'not-found', taskId: id };
  });
  return { results };
}

/** Delete every checked task, returning how many were removed */
export function clearCompleted(db: TaskbridgeDb): number {
  return db.delete(tasks).where(eq(tasks.completed, true)).run().changes;
}

/** Persist a collection in place of the stored one, keeping its order */
export function replaceAllTasks(db: TaskbridgeDb, collection: readonly Task[]): void {
  db.transaction((tx) => {
    tx.delete(tasks).run();
    for (const task of collection) {
      tx.insert(tasks).values(toRow(task)).run();
    }
  });
}
