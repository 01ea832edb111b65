import { Command } from 'commander';
import chalk from 'chalk';
import type { MergeStrategy, TaskbridgeDb } from '@taskbridge/core';
import {
  BackupManager, getBackupDir, getAllTasks, replaceAllTasks,
  validateRecords, mergeTasks, formatTimestamp,
} from '@taskbridge/core';
import * as out from '../output.js';
import { parseStrategyArg, $try } from '../helpers.js';

export function createBackupCommand(db: TaskbridgeDb): Command {
  const backupCommand = new Command('backup')
    .description('Manage task backups');

  const managerFor = (dir: string | undefined) => new BackupManager(dir ?? getBackupDir(db));

  backupCommand.addCommand(
    new Command('create')
      .description('Back up all tasks')
      .option('-d, --dir <dir>', 'Backup directory (default: configured backup_dir)')
      .action((opts: { dir?: string }) => $try(() => {
        const backup = managerFor(opts.dir);
        const tasks = getAllTasks(db);
        const path = backup.createBackup(tasks);
        if (path === null) throw new Error(`Could not write a backup in ${backup.getBackupDir()}`);
        out.success(`Backed up ${tasks.length} task(s) to ${path}`);
      })),
  );

  backupCommand.addCommand(
    new Command('list')
      .description('List available backups')
      .option('-d, --dir <dir>', 'Backup directory (default: configured backup_dir)')
      .action((opts: { dir?: string }) => $try(() => {
        const backups = managerFor(opts.dir).listBackups();
        if (backups.length === 0) {
          out.info('No backups available.');
          return;
        }

        console.log(`${chalk.bold('Available backups:')}\n`);
        backups.forEach((b, i) => {
          const age = out.getTimeAgo(b.timestamp);
          const ts = formatTimestamp(b.timestamp).slice(0, 19).replace('T', ' ');
          console.log(`  ${String(i + 1).padStart(2)}. ${age.padEnd(14)} (${ts})  ${chalk.dim(out.formatBytes(b.fileSize))}`);
        });
      })),
  );

  backupCommand.addCommand(
    new Command('restore')
      .description('Restore tasks from a backup')
      .argument('<backup>', 'Backup number from "backup list" (1 = most recent) or a backup file path')
      .option('-d, --dir <dir>', 'Backup directory (default: configured backup_dir)')
      .option('-s, --strategy <strategy>', 'append, replace or skip_duplicates', 'replace')
      .option('--force', 'Skip confirmation prompt')
      .action((target: string, opts: { dir?: string; strategy: string; force?: boolean }) => $try(() => {
        const backup = managerFor(opts.dir);
        const strategy = parseStrategyArg(opts.strategy);
        if (strategy === null) {
          throw new Error(`Unknown merge strategy '${opts.strategy}' (expected append, replace, skip_duplicates)`);
        }

        const path = resolveBackupPath(backup, target);

        if (!opts.force) {
          out.warning(`This will restore tasks from ${path} (${strategy})`);
          if (strategy === 'replace') out.info('Current tasks will be backed up before restore.');
          out.info('Use --force to skip this confirmation.');
          return;
        }

        restore(db, backup, path, strategy);
      })),
  );

  return backupCommand;
}

/** A 1-based index into the backup list, or a path taken as given */
function resolveBackupPath(backup: BackupManager, target: string): string {
  if (!/^[0-9]+$/.test(target)) return target;

  const index = parseInt(target, 10);
  const backups = backup.listBackups();
  if (backups.length === 0) {
    throw new Error(`No backups available in ${backup.getBackupDir()}`);
  }

  const chosen = backups[index - 1];
  if (chosen === undefined) {
    throw new Error(`Backup #${index} not found. Use 'backup list' to see available backups (1-${backups.length}).`);
  }
  return chosen.filePath;
}

function restore(db: TaskbridgeDb, backup: BackupManager, path: string, strategy: MergeStrategy): void {
  const records = backup.restoreBackup(path);
  if (records === null) throw new Error(`Could not read backup ${path}`);

  const { tasks, warnings } = validateRecords(records);
  out.printWarnings(warnings);

  const existing = getAllTasks(db);
  if (strategy === 'replace' && existing.length > 0) {
    const safety = backup.createBackup(existing);
    if (safety === null) throw new Error('Could not back up current tasks; nothing restored');
    out.info(`Current tasks backed up to ${safety}`);
  }

  replaceAllTasks(db, mergeTasks(existing, tasks, strategy));
  out.success(`Restored ${tasks.length} task(s) from ${path}`);
}
