export { DEFAULT_OVERDUE_DAYS, searchTasks, getOverdueTasks } from './task-filters.js';
