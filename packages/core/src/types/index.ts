export { PRIORITIES, DEFAULT_PRIORITY, PRIORITY_ORDER, PriorityName, isPriority } from './priority.js';
export type { Priority } from './priority.js';
export type { TaskId, Task, TaskRecord, CandidateRecord } from './task.js';
export { toRecord, isRecordShaped } from './task.js';
export type { TaskResult, BatchResult } from './results.js';
export { isNotFound, anyFailed } from './results.js';
