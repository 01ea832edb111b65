import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { addTask, DEFAULT_PRIORITY } from '@taskbridge/core';
import * as out from '../output.js';
import { parsePriorityArg, $try } from '../helpers.js';

export function createAddCommand(db: TaskbridgeDb): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description>', 'Task description')
    .option('-p, --priority <level>', 'Priority (high, medium, low)')
    .action((description: string, opts: { priority?: string }) => $try(() => {
      const priority = opts.priority === undefined ? DEFAULT_PRIORITY : parsePriorityArg(opts.priority);
      if (priority === null) {
        throw new Error(`Invalid priority '${opts.priority}' (expected high, medium, low)`);
      }

      const task = addTask(db, description, priority);
      out.success(`Task ${task.id} added. Use the list command to see your tasks`);
    }));
}
