import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { anyFailed, deleteTasks } from '@taskbridge/core';
import * as out from '../output.js';
import { parseIdArgs, $try } from '../helpers.js';

export function createDeleteCommand(db: TaskbridgeDb): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(() => {
      const result = deleteTasks(db, parseIdArgs(taskIds));
      out.printBatchResults(result);
      if (anyFailed(result)) process.exitCode = 1;
    }));
}
