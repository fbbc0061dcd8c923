/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  scoring: {
    reduction: 'mean',
    precision: 4,
  },

  thresholds: {
    tsrr: 0.5,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.tsrr/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# tsrr Configuration
# Location: ~/.tsrr/config.toml (set TSRR_HOME to move it)

# Scoring Settings
[scoring]
reduction = "${DEFAULT_CONFIG.scoring.reduction}"   # "mean" or "none"
precision = ${DEFAULT_CONFIG.scoring.precision}        # decimal places in tables

# Quality Thresholds
# tsrr score --check exits non-zero when the mean falls below these
[thresholds]
tsrr = ${DEFAULT_CONFIG.thresholds.tsrr}
`;
