/**
 * Configuration Schema
 *
 * Defines the shape of ~/.tsrr/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import { ReductionSchema } from '../eval/types.js';

/**
 * Scoring configuration
 * Defaults applied by the CLI when flags are omitted
 */
export const ScoringConfigSchema = z.object({
  reduction: ReductionSchema.describe('Default reduction for tsrr score (mean or none)'),
  precision: z
    .number()
    .int()
    .min(0)
    .max(12)
    .describe('Decimal places shown in table output (0-12)'),
});

/**
 * Quality thresholds
 * Checked by `tsrr score --check`
 */
export const ThresholdsConfigSchema = z.object({
  tsrr: z.number().min(0).max(1).describe('Minimum mean TsRR for --check to pass'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  scoring: ScoringConfigSchema,
  thresholds: ThresholdsConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
