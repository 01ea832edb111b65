import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { clearCompleted } from '@taskbridge/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createClearCommand(db: TaskbridgeDb): Command {
  return new Command('clear')
    .description('Delete all checked tasks')
    .action(() => $try(() => {
      const cleared = clearCompleted(db);
      if (cleared > 0) {
        out.success(`Cleared ${cleared} completed task(s)`);
      } else {
        out.warning('No completed tasks to clear.');
      }
    }));
}
