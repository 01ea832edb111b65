import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { getAllTasks, getExportFormat, exportTasks, resolveFormat } from '@taskbridge/core';
import * as out from '../output.js';
import { parseFormatArg, $try } from '../helpers.js';

export function createExportCommand(db: TaskbridgeDb): Command {
  return new Command('export')
    .description('Export all tasks to a file')
    .argument('<file>', 'Destination file; the extension picks the format unless --format is given')
    .option('-f, --format <format>', 'json, csv, md, html or txt')
    .option('--compact', 'Write JSON without indentation')
    .action((file: string, opts: { format?: string; compact?: boolean }) => $try(() => {
      const explicit = opts.format === undefined ? getExportFormat(db) : parseFormatArg(opts.format);
      if (explicit === null && opts.format !== undefined) {
        throw new Error(`Unknown format '${opts.format}'`);
      }

      const format = resolveFormat(file, explicit);
      if (format === null) throw new Error(`Cannot export to '${file}'`);

      const tasks = getAllTasks(db);
      if (format === 'table' && tasks.length === 0) {
        throw new Error('No tasks to export');
      }

      if (!exportTasks(tasks, file, { format, compact: opts.compact ?? false })) {
        throw new Error(`Failed to export tasks to ${file}`);
      }
      out.success(`Exported ${tasks.length} task(s) to ${file} (${format})`);
    }));
}
