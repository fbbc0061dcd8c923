#!/usr/bin/env node
/**
 * tsrr CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createScoreCommand } from './commands/score.js';
import { createExplainCommand } from './commands/explain.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { readVersion } from './version.js';

const VERSION = readVersion();

const program = new Command();

program
  .name('tsrr')
  .description('Tie-Sensitive Reciprocal Rank - score ranked candidate lists with tied similarities')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('tsrr score ./runs/faq.json')}                      Mean TsRR over a dataset
  ${chalk.cyan('tsrr score ./runs/faq.json --reduction none')}     Per-entry scores
  ${chalk.cyan('tsrr score ./runs/faq.json --check')}              Fail below thresholds.tsrr
  ${chalk.cyan('tsrr explain a -r a,b,c -s 0.9,0.9,0.1')}          Break down one score
  ${chalk.cyan('tsrr config set thresholds.tsrr 0.6')}             Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      // Warnings go to stderr so --json output stays parseable
      console.warn(chalk.yellow(`Warning: ${message}`));
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const contextFactory = () => createContext(getGlobalOptions());

program.addCommand(createScoreCommand(contextFactory));
program.addCommand(createExplainCommand(contextFactory));
program.addCommand(createConfigCommand(contextFactory));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: tsrr --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catches errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
