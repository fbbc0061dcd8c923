/**
 * Config Command
 *
 * Manages ~/.tsrr/config.toml via CLI:
 *   tsrr config get <key>          - Print one value
 *   tsrr config set <key> <value>  - Validate and write one value
 *   tsrr config list               - Show every value with its description
 *   tsrr config path               - Show config file location
 *   tsrr config reset --force      - Restore the default template
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import {
  ConfigSchema,
  getConfigPath,
  getConfigValue,
  listConfig,
  loadConfig,
  setConfigValue,
} from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Look up the `.describe()` text for a dot-notation key in the config schema.
 */
export function describeKey(key: string): string | undefined {
  let schema: z.ZodTypeAny = ConfigSchema;
  for (const part of key.split('.')) {
    if (!(schema instanceof z.ZodObject)) return undefined;
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const next = shape[part];
    if (next === undefined) return undefined;
    schema = next;
  }
  return schema.description;
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., tsrr config get thresholds.tsrr)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., tsrr config set scoring.precision 6)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      for (const [key, value] of entries) {
        const description = describeKey(key);
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        if (description && ctx.options.verbose) {
          ctx.log(chalk.dim(`      ${description}`));
        }
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        fs.unlinkSync(configPath);
      }
      loadConfig(true);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}
