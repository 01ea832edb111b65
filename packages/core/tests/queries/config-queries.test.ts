import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, getDefaultBackupDir, type TaskbridgeDb } from '../../src/db.js';
import {
  getConfig,
  setConfig,
  unsetConfig,
  getAllConfig,
  isConfigKey,
  validateConfigValue,
  getBackupDir,
  getExportFormat,
  getMergeStrategy,
} from '../../src/queries/config-queries.js';

let db: TaskbridgeDb;

beforeEach(() => {
  db = createTestDb();
});

describe('config storage', () => {
  it('returns null for unset keys', () => {
    expect(getConfig(db, 'backup_dir')).toBeNull();
  });

  it('sets, overwrites and unsets values', () => {
    setConfig(db, 'merge_strategy', 'replace');
    setConfig(db, 'merge_strategy', 'skip_duplicates');
    expect(getConfig(db, 'merge_strategy')).toBe('skip_duplicates');
    expect(getAllConfig(db)).toEqual({ merge_strategy: 'skip_duplicates' });

    expect(unsetConfig(db, 'merge_strategy')).toBe(true);
    expect(unsetConfig(db, 'merge_strategy')).toBe(false);
    expect(getAllConfig(db)).toEqual({});
  });
});

describe('typed accessors', () => {
  it('fall back to defaults', () => {
    expect(getBackupDir(db)).toBe(getDefaultBackupDir());
    expect(getExportFormat(db)).toBeNull();
    expect(getMergeStrategy(db)).toBe('append');
  });

  it('read configured values', () => {
    setConfig(db, 'backup_dir', '/tmp/task-backups');
    setConfig(db, 'export_format', 'MD');
    setConfig(db, 'merge_strategy', 'replace');

    expect(getBackupDir(db)).toBe('/tmp/task-backups');
    expect(getExportFormat(db)).toBe('checklist');
    expect(getMergeStrategy(db)).toBe('replace');
  });

  it('ignore an unusable stored strategy', () => {
    setConfig(db, 'merge_strategy', 'merge-everything');
    expect(getMergeStrategy(db)).toBe('append');
  });
});

describe('validation', () => {
  it('knows the config keys', () => {
    expect(isConfigKey('backup_dir')).toBe(true);
    expect(isConfigKey('theme')).toBe(false);
  });

  it('checks values per key', () => {
    expect(validateConfigValue('export_format', 'csv')).toBeNull();
    expect(validateConfigValue('export_format', 'pdf')).toBe("Unknown format 'pdf'");
    expect(validateConfigValue('merge_strategy', 'append')).toBeNull();
    expect(validateConfigValue('merge_strategy', 'merge')).toBe(
      "Unknown merge strategy 'merge' (expected append, replace, skip_duplicates)",
    );
    expect(validateConfigValue('backup_dir', ' ')).toBe('backup_dir cannot be empty');
  });
});
