import { Command } from 'commander';
import type { Task, TaskbridgeDb } from '@taskbridge/core';
import { PRIORITY_ORDER, getAllTasks } from '@taskbridge/core';
import * as out from '../output.js';
import { parsePriorityArg, $try } from '../helpers.js';

export function createListCommand(db: TaskbridgeDb): Command {
  return new Command('list')
    .description('List all tasks')
    .option('-c, --checked', 'Show only checked tasks')
    .option('-u, --unchecked', 'Show only unchecked tasks')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)')
    .action((opts: { checked?: boolean; unchecked?: boolean; priority?: string }) => $try(() => {
      if (opts.checked && opts.unchecked) {
        throw new Error('Cannot use both --checked and --unchecked at the same time');
      }

      const filterPriority = opts.priority === undefined ? null : parsePriorityArg(opts.priority);
      if (opts.priority !== undefined && filterPriority === null) {
        throw new Error(`Invalid priority '${opts.priority}' (expected high, medium, low)`);
      }

      const filterChecked = opts.checked ? true : opts.unchecked ? false : null;
      const tasks = getAllTasks(db)
        .filter(t => filterChecked === null || t.completed === filterChecked)
        .filter(t => filterPriority === null || t.priority === filterPriority);

      displayTasks(sortByPriority(tasks), filterChecked);
    }));
}

/** Highest priority first; storage order within a priority */
export function sortByPriority(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => PRIORITY_ORDER.indexOf(a.priority) - PRIORITY_ORDER.indexOf(b.priority));
}

function displayTasks(tasks: Task[], filterChecked: boolean | null): void {
  if (tasks.length === 0) {
    const message = filterChecked === true
      ? 'No checked tasks found'
      : filterChecked === false
        ? 'No unchecked tasks found'
        : 'No tasks saved yet... use the add command to create one';
    out.info(message);
    return;
  }

  out.printTasks(tasks);
}
