/**
 * Explain Command
 *
 * Scores one target given inline and prints every intermediate quantity:
 *
 *   tsrr explain doc-7 --results doc-2,doc-7,doc-9 --similarities 0.9,0.9,0.4
 *   tsrr explain 42 -r 7,42 -s 0.5,0.5 --json
 *
 * Labels are compared as strings, exactly as typed.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { explainTsrr } from '../../eval/tsrr.js';
import { parseNumberOption } from './score.js';
import { formatCell } from '../../utils/index.js';
import { loadConfig } from '../../config/loader.js';

interface ExplainCommandOptions {
  results: string;
  similarities: string;
}

/**
 * Split a comma-separated flag value. An empty string is an empty list.
 */
export function splitList(value: string): string[] {
  return value === '' ? [] : value.split(',').map((item) => item.trim());
}

/**
 * Create the explain command
 */
export function createExplainCommand(getContext: () => CommandContext): Command {
  return new Command('explain')
    .description('Show how the TsRR score of a single target is computed')
    .argument('<target>', 'Target label')
    .requiredOption('-r, --results <labels>', 'Comma-separated candidate labels')
    .requiredOption('-s, --similarities <scores>', 'Comma-separated similarity scores')
    .action((target: string, options: ExplainCommandOptions) => {
      const ctx = getContext();

      const labels = splitList(options.results);
      const similarities = splitList(options.similarities).map((value) =>
        parseNumberOption('similarities', value)
      );

      const [breakdown] = explainTsrr(target, labels, similarities);

      if (ctx.options.json) {
        console.log(JSON.stringify(breakdown, null, 2));
        return;
      }

      if (breakdown === undefined || !breakdown.found) {
        ctx.log(`${chalk.yellow('Target not found:')} ${target}`);
        ctx.log(`  TsRR = 0`);
        return;
      }

      const precision = loadConfig().scoring.precision;
      const fmt = (value: number) => formatCell(value, precision);

      ctx.log(chalk.bold(`Target: ${target}`));
      ctx.log(`  Ranked ahead (r_pre):          ${breakdown.rPre}`);
      ctx.log(
        `  Tie group:                     ${breakdown.tieSize} (${breakdown.relevantInTie} relevant, ${breakdown.irrelevantInTie} irrelevant)`
      );
      ctx.log(`  Contamination (tau):           ${fmt(breakdown.tau)}`);
      ctx.log(`  Expected in-tie rank (E_L):    ${fmt(breakdown.expectedInTie)}`);
      ctx.log(`  Worst in-tie rank (L_max):     ${fmt(breakdown.worstInTie)}`);
      ctx.log(`  Blended in-tie rank (E_tau):   ${fmt(breakdown.blendedInTie)}`);
      ctx.log(`  TsRR:                          ${chalk.cyan(fmt(breakdown.score))}`);
    });
}
