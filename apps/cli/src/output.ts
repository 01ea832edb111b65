/**
 * chalk-based terminal output. The core never prints; everything the user
 * sees goes through here.
 */

import chalk from 'chalk';
import type { Priority, Task, TaskResult, BatchResult } from '@taskbridge/core';
import { displayDay } from '@taskbridge/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case 'high': return chalk.red.bold('>>>');
    case 'medium': return chalk.yellow('>> ');
    case 'low': return chalk.blue('>  ');
  }
}

/** `(id) >>> [ ] description  created-day` */
export function formatTaskLine(task: Task): string {
  const taskId = chalk.dim(`(${task.id})`);
  const created = chalk.dim(`  ${displayDay(task.createdAt)}`);
  return `${taskId} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${chalk.bold(task.description)}${created}`;
}

export function printTasks(tasks: readonly Task[]): void {
  for (const t of tasks) console.log(formatTaskLine(t));
}

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  return `${(size / (1024 * 1024)).toFixed(1)} MB`;
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'no-change': info(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

export function printWarnings(warnings: readonly string[]): void {
  for (const w of warnings) warning(w);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function getTimeAgo(time: Date, now: Date = new Date()): string {
  const mins = (now.getTime() - time.getTime()) / 60000;
  if (mins < 1) return 'just now';
  if (mins < 60) return `${Math.floor(mins)}m ago`;
  const hours = mins / 60;
  if (hours < 24) return `${Math.floor(hours)}h ago`;
  const days = hours / 24;
  if (days < 7) return `${Math.floor(days)}d ago`;
  return formatMonthDay(time);
}
