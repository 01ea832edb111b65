import { Command } from 'commander';
import chalk from 'chalk';
import type { ConfigKey, TaskbridgeDb } from '@taskbridge/core';
import {
  CONFIG_KEYS, isConfigKey, getConfig, setConfig, unsetConfig,
  validateConfigValue, getBackupDir, getMergeStrategy,
} from '@taskbridge/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key '${key}' (expected ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

/** What a key resolves to when unset */
function defaultValue(db: TaskbridgeDb, key: ConfigKey): string {
  switch (key) {
    case 'backup_dir': return getBackupDir(db);
    case 'export_format': return 'from file extension';
    case 'merge_strategy': return getMergeStrategy(db);
  }
}

export function createConfigCommand(db: TaskbridgeDb): Command {
  const configCommand = new Command('config')
    .description('View and change settings');

  configCommand.addCommand(
    new Command('list')
      .description('Show all settings')
      .action(() => $try(() => {
        for (const key of CONFIG_KEYS) {
          const value = getConfig(db, key);
          const shown = value ?? chalk.dim(`${defaultValue(db, key)} (default)`);
          console.log(`  ${chalk.bold(key)}: ${shown}`);
        }
      })),
  );

  configCommand.addCommand(
    new Command('get')
      .description('Show one setting')
      .argument('<key>', CONFIG_KEYS.join(', '))
      .action((key: string) => $try(() => {
        const configKey = requireKey(key);
        out.info(getConfig(db, configKey) ?? defaultValue(db, configKey));
      })),
  );

  configCommand.addCommand(
    new Command('set')
      .description('Change a setting')
      .argument('<key>', CONFIG_KEYS.join(', '))
      .argument('<value>', 'New value')
      .action((key: string, value: string) => $try(() => {
        const configKey = requireKey(key);
        const problem = validateConfigValue(configKey, value);
        if (problem !== null) throw new Error(problem);

        setConfig(db, configKey, value);
        out.success(`${configKey} set to ${value}`);
      })),
  );

  configCommand.addCommand(
    new Command('unset')
      .description('Restore a setting to its default')
      .argument('<key>', CONFIG_KEYS.join(', '))
      .action((key: string) => $try(() => {
        const configKey = requireKey(key);
        if (unsetConfig(db, configKey)) {
          out.success(`${configKey} reset to default`);
        } else {
          out.info(`${configKey} is not set`);
        }
      })),
  );

  return configCommand;
}
