/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TaskbridgeDb } from '../db.js';
import { getDefaultBackupDir } from '../db.js';
import { config } from '../schema/index.js';
import type { Format } from '../interchange/format-resolver.js';
import { parseFormatTag } from '../interchange/format-resolver.js';
import type { MergeStrategy } from '../interchange/merge.js';
import { DEFAULT_MERGE_STRATEGY, MERGE_STRATEGIES, isMergeStrategy } from '../interchange/merge.js';

export const CONFIG_KEYS = ['backup_dir', 'export_format', 'merge_strategy'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/** Get a config value by key */
export function getConfig(db: TaskbridgeDb, key: ConfigKey): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TaskbridgeDb, key: ConfigKey, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

/** Remove a config value, returning whether one was set */
export function unsetConfig(db: TaskbridgeDb, key: ConfigKey): boolean {
  return db.delete(config).where(eq(config.key, key)).run().changes > 0;
}

/** All stored values, keyed by name */
export function getAllConfig(db: TaskbridgeDb): Record<string, string> {
  const rows = db.select().from(config).all();
  return Object.fromEntries(rows.map(r => [r.key, r.value]));
}

/** Why a value is not acceptable for a key, or null when it is */
export function validateConfigValue(key: ConfigKey, value: string): string | null {
  switch (key) {
    case 'backup_dir':
      return value.trim() ? null : 'backup_dir cannot be empty';
    case 'export_format':
      return parseFormatTag(value) ? null : `Unknown format '${value}'`;
    case 'merge_strategy':
      return isMergeStrategy(value) ? null : `Unknown merge strategy '${value}' (expected ${MERGE_STRATEGIES.join(', ')})`;
  }
}

/** Backup directory: configured value or the platform default */
export function getBackupDir(db: TaskbridgeDb): string {
  return getConfig(db, 'backup_dir') ?? getDefaultBackupDir();
}

/** Configured export format, or null to let the file extension decide */
export function getExportFormat(db: TaskbridgeDb): Format | null {
  const value = getConfig(db, 'export_format');
  return value ? parseFormatTag(value) : null;
}

export function getMergeStrategy(db: TaskbridgeDb): MergeStrategy {
  const value = getConfig(db, 'merge_strategy');
  return isMergeStrategy(value) ? value : DEFAULT_MERGE_STRATEGY;
}
