import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readdirSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BackupManager } from '../../src/backup/backup-manager.js';
import { validateRecords } from '../../src/interchange/validator.js';
import type { Task } from '../../src/types/task.js';

const NOW = new Date(2026, 2, 1, 9, 30, 15);

const TASKS: Task[] = [
  { id: 1, description: 'Buy milk', priority: 'high', completed: false, createdAt: '2026-02-01T08:00:00' },
  { id: 2, description: 'Call bank', priority: 'low', completed: true, createdAt: '2026-02-02T08:00:00' },
];

let tmpDir: string;
let backupDir: string;
let mgr: BackupManager;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'taskbridge-backup-test-'));
  backupDir = join(tmpDir, 'backups');
  mgr = new BackupManager(backupDir);
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('BackupManager', () => {
  it('creates the directory and a timestamped backup file', () => {
    const path = mgr.createBackup(TASKS, NOW);

    expect(path).toBe(join(backupDir, 'task_backup_20260301_093015.json'));
    expect(existsSync(backupDir)).toBe(true);
    expect(readdirSync(backupDir)).toEqual(['task_backup_20260301_093015.json']);
  });

  it('restores what it backed up', () => {
    const path = mgr.createBackup(TASKS, NOW);
    expect(path).not.toBeNull();

    const records = mgr.restoreBackup(path ?? '');
    const { tasks, warnings } = validateRecords(records ?? []);
    expect(warnings).toEqual([]);
    expect(tasks).toEqual(TASKS);
  });

  it('backs up an empty collection', () => {
    const path = mgr.createBackup([], NOW);
    expect(mgr.restoreBackup(path ?? '')).toEqual([]);
  });

  it('restores any record-format file regardless of its extension', () => {
    const path = join(tmpDir, 'handmade.txt');
    writeFileSync(path, '{"task_list": [{"task": "From elsewhere"}]}');
    expect(mgr.restoreBackup(path)).toEqual([{ task: 'From elsewhere' }]);
  });

  it('returns null when restoring a missing or malformed file', () => {
    expect(mgr.restoreBackup(join(tmpDir, 'nope.json'))).toBeNull();

    const broken = join(tmpDir, 'broken.json');
    writeFileSync(broken, 'not json');
    expect(mgr.restoreBackup(broken)).toBeNull();
  });

  it('returns null when the directory cannot be created', () => {
    const blocker = join(tmpDir, 'file');
    writeFileSync(blocker, '');
    const badMgr = new BackupManager(join(blocker, 'backups'));
    expect(badMgr.createBackup(TASKS, NOW)).toBeNull();
  });

  it('lists backups newest first, ignoring other files', () => {
    mgr.createBackup(TASKS, new Date(2026, 0, 5, 10, 0, 0));
    mgr.createBackup(TASKS, new Date(2026, 1, 5, 10, 0, 0));
    mgr.createBackup(TASKS, new Date(2025, 11, 31, 23, 59, 59));
    writeFileSync(join(backupDir, 'notes.json'), '[]');

    const backups = mgr.listBackups();
    expect(backups.map(b => b.timestamp)).toEqual([
      new Date(2026, 1, 5, 10, 0, 0),
      new Date(2026, 0, 5, 10, 0, 0),
      new Date(2025, 11, 31, 23, 59, 59),
    ]);
    expect(backups[0]?.filePath).toBe(join(backupDir, 'task_backup_20260205_100000.json'));
    for (const b of backups) {
      expect(b.fileSize).toBeGreaterThan(0);
    }
  });

  it('returns empty list when no backups exist', () => {
    expect(mgr.listBackups()).toEqual([]);
  });
});
