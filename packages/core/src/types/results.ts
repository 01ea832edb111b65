import type { TaskId } from './task.js';

/** Outcome of a store operation on a single task id */
export type TaskResult =
  | { readonly type: 'success'; readonly taskId: TaskId; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'no-change'; readonly taskId: TaskId; readonly message: string };

export interface BatchResult {
  readonly results: readonly TaskResult[];
}

export function isNotFound(r: TaskResult): r is Extract<TaskResult, { type: 'not-found' }> {
  return r.type === 'not-found';
}

/** True when some id in the batch did not match a task */
export function anyFailed(batch: BatchResult): boolean {
  return batch.results.some(isNotFound);
}
