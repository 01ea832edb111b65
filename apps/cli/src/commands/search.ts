import { Command } from 'commander';
import type { TaskbridgeDb } from '@taskbridge/core';
import { getAllTasks, searchTasks } from '@taskbridge/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import { sortByPriority } from './list.js';

export function createSearchCommand(db: TaskbridgeDb): Command {
  return new Command('search')
    .description('Find tasks whose description contains a keyword')
    .argument('<keyword>', 'Text to look for (case-insensitive)')
    .action((keyword: string) => $try(() => {
      const found = searchTasks(getAllTasks(db), keyword);
      if (found.length === 0) {
        out.info(`No tasks found matching '${keyword}'`);
        return;
      }

      out.info(`Found ${found.length} task(s) matching '${keyword}':`);
      out.printTasks(sortByPriority(found));
    }));
}
