import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import {
  getAllTasks, getMergeStrategy, replaceAllTasks,
  importIntoCollection, resolveFormat, isDecodable,
} from '@taskbridge/core';
import * as out from '../output.js';
import { parseFormatArg, parseStrategyArg, $try } from '../helpers.js';

export function createImportCommand(db: TaskbridgeDb): Command {
  return new Command('import')
    .description('Import tasks from a file')
    .argument('<file>', 'Source file; the extension picks the format unless --format is given')
    .option('-f, --format <format>', 'json, csv, md or txt')
    .option('-s, --strategy <strategy>', 'append, replace or skip_duplicates')
    .option('--dry-run', 'Show what would be imported without saving')
    .action((file: string, opts: { format?: string; strategy?: string; dryRun?: boolean }) => $try(() => {
      const explicit = opts.format === undefined ? null : parseFormatArg(opts.format);
      if (opts.format !== undefined && explicit === null) {
        throw new Error(`Unknown format '${opts.format}'`);
      }

      const strategy = opts.strategy === undefined ? getMergeStrategy(db) : parseStrategyArg(opts.strategy);
      if (strategy === null) {
        throw new Error(`Unknown merge strategy '${opts.strategy}' (expected append, replace, skip_duplicates)`);
      }

      const format = resolveFormat(file, explicit);
      if (format !== null && !isDecodable(format)) {
        throw new Error(`Cannot import ${format} files`);
      }

      const outcome = importIntoCollection(getAllTasks(db), file, { format: explicit ?? undefined, strategy });
      if (outcome === null) throw new Error(`Could not read tasks from ${file}`);

      out.printWarnings(outcome.warnings);
      if (opts.dryRun) {
        out.info(`Dry run: ${outcome.imported} task(s) would be imported (${strategy}), giving ${outcome.tasks.length} in total`);
        return;
      }

      replaceAllTasks(db, outcome.tasks);
      out.success(`Imported ${outcome.imported} task(s) from ${file} (${strategy})`);
      out.info(`Total tasks: ${outcome.tasks.length}`);
    }));
}
