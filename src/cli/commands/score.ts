/**
 * Score Command
 *
 * Scores every entry of a dataset file with Tie-Sensitive Reciprocal Rank.
 *
 *   tsrr score ./runs/faq.json
 *   tsrr score ./runs/faq.json --reduction none
 *   tsrr score ./runs/faq.json --check --threshold 0.6 --json
 *
 * Defaults for --reduction and --threshold come from config.toml.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { loadDataset, datasetToBatch } from '../../eval/dataset.js';
import { explainTsrr, tsrr } from '../../eval/tsrr.js';
import { computeAggregateMetrics, summarizeScores } from '../../eval/metrics.js';
import { ReductionSchema, type Reduction, type TsrrBreakdown } from '../../eval/types.js';
import { ThresholdError, ValidationError } from '../../errors/index.js';
import { formatTable, type Column, type Row } from '../../utils/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface ScoreCommandOptions {
  reduction?: string;
  check?: boolean;
  threshold?: string;
  /** Deprecated; forwarded to tsrr() so the warning reaches the user */
  alpha?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

function parseReduction(value: string): Reduction {
  const result = ReductionSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid reduction: ${value}`, ['reduction: expected "mean" or "none"']);
  }
  return result.data;
}

/**
 * Parse a numeric flag, rejecting empty and non-numeric strings.
 */
export function parseNumberOption(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ValidationError(`Invalid value for --${name}: ${value}`, [`${name}: expected a number`]);
  }
  return parsed;
}

const ENTRY_COLUMNS: Column[] = [
  { header: 'ID', key: 'id' },
  { header: 'Target', key: 'target' },
  { header: 'r_pre', key: 'rPre' },
  { header: 'Tie', key: 'tieSize' },
  { header: 'tau', key: 'tau' },
  { header: 'TsRR', key: 'score' },
];

function entryRow(id: string, breakdown: TsrrBreakdown): Row {
  return {
    id,
    target: String(breakdown.target),
    rPre: breakdown.found ? breakdown.rPre : '-',
    tieSize: breakdown.found ? breakdown.tieSize : '-',
    tau: breakdown.found ? breakdown.tau : '-',
    score: breakdown.score,
  };
}

// ============================================================================
// Command
// ============================================================================

/**
 * Create the score command
 */
export function createScoreCommand(getContext: () => CommandContext): Command {
  return new Command('score')
    .description('Score a dataset file with Tie-Sensitive Reciprocal Rank')
    .argument('<file>', 'Path to a dataset JSON file')
    .option('-r, --reduction <mode>', 'Reduction: mean or none (default: from config)')
    .option('--check', 'Exit with code 4 when the mean TsRR is below the threshold')
    .option('-t, --threshold <value>', 'Threshold for --check (default: thresholds.tsrr)')
    .addOption(new Option('--alpha <value>', 'Deprecated, ignored').hideHelp())
    .action((file: string, options: ScoreCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const reduction = parseReduction(options.reduction ?? config.scoring.reduction);
      const threshold =
        options.threshold !== undefined
          ? parseNumberOption('threshold', options.threshold)
          : config.thresholds.tsrr;
      const alpha = options.alpha !== undefined ? parseNumberOption('alpha', options.alpha) : undefined;

      const dataset = loadDataset(file);
      const batch = datasetToBatch(dataset);
      ctx.debug(`Loaded ${batch.ids.length} entries from dataset "${dataset.name}"`);

      const scores = tsrr(batch.targets, batch.results, batch.similarities, {
        reduction: 'none',
        alpha,
        logger: ctx,
      });
      const summary = summarizeScores(scores);
      const metrics = computeAggregateMetrics(batch.targets, batch.results, batch.similarities);
      const passed = summary.mean >= threshold;

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              dataset: dataset.name,
              reduction,
              tsrr: reduction === 'mean' ? summary.mean : scores,
              summary,
              metrics,
              ...(options.check ? { threshold, passed } : {}),
            },
            null,
            2
          )
        );
      } else {
        const precision = config.scoring.precision;

        if (reduction === 'none' || ctx.options.verbose) {
          const breakdowns = explainTsrr(batch.targets, batch.results, batch.similarities);
          const rows = breakdowns.map((breakdown, index) => entryRow(batch.ids[index], breakdown));
          ctx.log(formatTable(ENTRY_COLUMNS, rows, { precision }));
          ctx.log('');
        }

        ctx.log(chalk.bold(`Dataset: ${dataset.name}`));
        ctx.log(`  Entries:    ${summary.count} (${summary.found} with target present)`);
        ctx.log(`  Mean TsRR:  ${chalk.cyan(summary.mean.toFixed(precision))}`);
        ctx.log(`  MRR:        ${metrics.mrr.toFixed(precision)}`);
        ctx.log(
          `  MRR range:  ${metrics.pessimistic_mrr.toFixed(precision)} – ${metrics.optimistic_mrr.toFixed(precision)}`
        );

        if (options.check && passed) {
          ctx.log(`${chalk.green('✓')} Mean TsRR meets threshold ${threshold}`);
        }
      }

      if (options.check && !passed) {
        throw new ThresholdError(summary.mean, threshold);
      }
    });
}
