import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { anyFailed, setCompleted } from '@taskbridge/core';
import * as out from '../output.js';
import { parseIdArgs, $try } from '../helpers.js';

export function createCheckCommand(db: TaskbridgeDb): Command {
  return new Command('check')
    .description('Check one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to check')
    .action((taskIds: string[]) => $try(() => {
      const result = setCompleted(db, parseIdArgs(taskIds), true);
      out.printBatchResults(result);
      if (anyFailed(result)) process.exitCode = 1;
    }));
}

export function createUncheckCommand(db: TaskbridgeDb): Command {
  return new Command('uncheck')
    .description('Uncheck one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to uncheck')
    .action((taskIds: string[]) => $try(() => {
      const result = setCompleted(db, parseIdArgs(taskIds), false);
      out.printBatchResults(result);
      if (anyFailed(result)) process.exitCode = 1;
    }));
}
