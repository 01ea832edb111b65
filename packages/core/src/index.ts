// Types
export {
  PRIORITIES, DEFAULT_PRIORITY, PRIORITY_ORDER, PriorityName, isPriority,
  toRecord, isRecordShaped,
  isNotFound, anyFailed,
} from './types/index.js';
export type {
  Priority, TaskId, Task, TaskRecord, CandidateRecord, TaskResult, BatchResult,
} from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDataDir, getDefaultDbPath, getDefaultBackupDir } from './db.js';
export type { TaskbridgeDb } from './db.js';

// Parsers
export * from './parsers/index.js';

// Interchange
export * from './interchange/index.js';

// Filters
export * from './filters/index.js';

// Queries
export * from './queries/index.js';

// Backup
export { BackupManager } from './backup/index.js';
export type { BackupInfo } from './backup/index.js';
