/**
 * Creates, lists and restores timestamped backups of a task collection.
 * Backups are record-format (JSON) exports named task_backup_<yyyyMMdd_HHmmss>.json.
 */

import { existsSync, mkdirSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { CandidateRecord, Task } from '../types/task.js';
import { getDefaultBackupDir } from '../db.js';
import { exportTasks, importTasks } from '../interchange/transfer.js';
import { formatCompact, fromDate } from '../parsers/timestamp-parser.js';

const BACKUP_PREFIX = 'task_backup_';
const BACKUP_EXT = '.json';
const BACKUP_NAME_RE = /^task_backup_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.json$/;

export interface BackupInfo {
  filePath: string;
  timestamp: Date;
  fileSize: number;
}

export class BackupManager {
  private backupDir: string;

  constructor(backupDir: string = getDefaultBackupDir()) {
    this.backupDir = backupDir;
  }

  getBackupDir(): string {
    return this.backupDir;
  }

  /**
   * Write a backup of the collection, creating the directory if needed.
   * Returns the backup path, or null when the directory or file cannot be written.
   */
  createBackup(tasks: readonly Task[], now: Date = new Date()): string | null {
    try {
      mkdirSync(this.backupDir, { recursive: true });
    } catch {
      return null;
    }

    const filePath = this.backupPath(now);
    return exportTasks(tasks, filePath, { format: 'record', now }) ? filePath : null;
  }

  /** Candidate records from a backup file, or null if it cannot be read or decoded */
  restoreBackup(filePath: string): CandidateRecord[] | null {
    return importTasks(filePath, { format: 'record' });
  }

  /** List available backups, newest first */
  listBackups(): BackupInfo[] {
    if (!existsSync(this.backupDir)) return [];

    const backups: BackupInfo[] = [];
    for (const name of readdirSync(this.backupDir)) {
      const info = this.parseBackupFile(name);
      if (info) backups.push(info);
    }

    return backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  private parseBackupFile(name: string): BackupInfo | null {
    const m = BACKUP_NAME_RE.exec(name);
    if (!m) return null;

    const timestamp = new Date(
      Number(m[1]), Number(m[2]) - 1, Number(m[3]),
      Number(m[4]), Number(m[5]), Number(m[6]),
    );
    if (isNaN(timestamp.getTime())) return null;

    const filePath = join(this.backupDir, name);
    return { filePath, timestamp, fileSize: statSync(filePath).size };
  }

  private backupPath(d: Date): string {
    return join(this.backupDir, `${BACKUP_PREFIX}${formatCompact(fromDate(d))}${BACKUP_EXT}`);
  }
}
