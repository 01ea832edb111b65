#!/usr/bin/env node

import { Command } from 'commander';
import { createDb, getDefaultDbPath } from '@taskbridge/core';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createPriorityCommand } from './commands/priority.js';
import { createSearchCommand } from './commands/search.js';
import { createClearCommand } from './commands/clear.js';
import { createOverdueCommand } from './commands/overdue.js';
import { createExportCommand } from './commands/export.js';
import { createImportCommand } from './commands/import.js';
import { createBackupCommand } from './commands/backup.js';
import { createConfigCommand } from './commands/config.js';

// Initialize database
const dbPath = process.env['TASKBRIDGE_DB'] ?? getDefaultDbPath();
const db = createDb(dbPath);

// Build the CLI program
const program = new Command()
  .name('taskbridge')
  .description('Personal task tracker with import, export and backups')
  .version('1.0.0');

// Register commands
program.addCommand(createAddCommand(db));
program.addCommand(createListCommand(db));
program.addCommand(createCheckCommand(db));
program.addCommand(createUncheckCommand(db));
program.addCommand(createDeleteCommand(db));
program.addCommand(createPriorityCommand(db));
program.addCommand(createSearchCommand(db));
program.addCommand(createClearCommand(db));
program.addCommand(createOverdueCommand(db));
program.addCommand(createExportCommand(db));
program.addCommand(createImportCommand(db));
program.addCommand(createBackupCommand(db));
program.addCommand(createConfigCommand(db));

// Default action (no command): show task list
program.action((_opts: unknown, cmd: Command) => {
  cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
});

program.parse();
