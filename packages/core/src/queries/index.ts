// Task queries
export {
  getAllTasks,
  getTasksById,
  getNextId,
  addTask,
  setCompleted,
  setPriority,
  deleteTasks,
  clearCompleted,
  replaceAllTasks,
} from './task-queries.js';

// Config queries
export {
  CONFIG_KEYS,
  isConfigKey,
  getConfig,
  setConfig,
  unsetConfig,
  getAllConfig,
  validateConfigValue,
  getBackupDir,
  getExportFormat,
  getMergeStrategy,
} from './config-queries.js';
export type { ConfigKey } from './config-queries.js';
