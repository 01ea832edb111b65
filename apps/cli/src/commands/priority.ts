import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { isNotFound, setPriority } from '@taskbridge/core';
import * as out from '../output.js';
import { parseIdArg, parsePriorityArg, $try } from '../helpers.js';

export function createPriorityCommand(db: TaskbridgeDb): Command {
  return new Command('priority')
    .description('Set the priority of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<level>', 'Priority: high/1/p1, medium/2/p2, low/3/p3')
    .action((taskId: string, level: string) => $try(() => {
      const priority = parsePriorityArg(level);
      if (priority === null) {
        throw new Error(`Invalid priority '${level}' (expected high, medium, low)`);
      }
      const result = setPriority(db, parseIdArg(taskId), priority);
      out.printResult(result);
      if (isNotFound(result)) process.exitCode = 1;
    }));
}
