import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { DEFAULT_OVERDUE_DAYS, getAllTasks, getOverdueTasks } from '@taskbridge/core';
import * as out from '../output.js';
import { parseDaysArg, $try } from '../helpers.js';

export function createOverdueCommand(db: TaskbridgeDb): Command {
  return new Command('overdue')
    .description('Show unchecked tasks older than a number of days')
    .option('-d, --days <days>', 'Age threshold in days', String(DEFAULT_OVERDUE_DAYS))
    .action((opts: { days: string }) => $try(() => {
      const days = parseDaysArg(opts.days);
      if (days === null) {
        throw new Error(`Invalid number of days '${opts.days}'`);
      }

      const overdue = getOverdueTasks(getAllTasks(db), days);
      if (overdue.length === 0) {
        out.success(`No tasks are overdue (older than ${days} days).`);
        return;
      }

      out.warning(`Found ${overdue.length} overdue task(s):`);
      out.printTasks(overdue);
    }));
}
