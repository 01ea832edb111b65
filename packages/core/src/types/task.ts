import type { Priority } from './priority.js';

/** Ids are advisory: unique per collection only if the caller keeps them so */
export type TaskId = number;

/** A validated task as held in memory */
export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly priority: Priority;
  readonly completed: boolean;
  readonly createdAt: string; // YYYY-MM-DDTHH:MM:SS.mmm (local)
}

/** One task's field set as it appears in interchange files */
export interface TaskRecord {
  id: number;
  task: string;
  priority: string;
  completed: boolean;
  created_at: string;
}

/**
 * Decoder output before validation. Anything goes here: the validator decides
 * what is kept, repaired or rejected.
 */
export type CandidateRecord = unknown;

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    task: task.description,
    priority: task.priority,
    completed: task.completed,
    created_at: task.createdAt,
  };
}

/** True for a plain key/value object (not null, not an array) */
export function isRecordShaped(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
