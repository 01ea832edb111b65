import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  /** Storage order; the collection is read back ordered by seq */
  seq: integer('seq').primaryKey({ autoIncrement: true }),
  /** Caller-facing id. Not unique: an append merge may bring in duplicates */
  id: integer('id').notNull(),
  description: text('description').notNull(),
  priority: text('priority').$type<Priority>().notNull().default('medium'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
}, (table) => [
  index('idx_tasks_id').on(table.id),
]);
