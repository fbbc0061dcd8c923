/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.tsrr or $TSRR_HOME)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getTsrrDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

function ensureTsrrDir(): void {
  const dir = getTsrrDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source values overriding target.
 * Nested objects merge key by key; arrays and primitives replace.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge a user config over the defaults and validate the result.
 */
function mergeWithDefaults(user: Record<string, unknown>, onInvalid: (issues: string) => ConfigError): Config {
  const merged = deepMerge(DEFAULT_CONFIG, user);
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw onInvalid(formatIssues(result.error.issues));
  }
  return result.data;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: tsrr config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureTsrrDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema first so errors name the user's keys
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: tsrr config reset --force  to restore defaults'
    );
  }

  return mergeWithDefaults(
    partial.data,
    (issues) =>
      new ConfigError(
        `Invalid configuration:\n${issues}`,
        'Run: tsrr config reset --force  to restore defaults'
      )
  );
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('thresholds.tsrr') => 0.5
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Validates the complete config before writing it back
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();

  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: tsrr config list  to see available keys'
    );
  }

  // Unknown keys would be stripped silently by the schema, so reject them here
  if (!isKnownKey(key)) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: tsrr config list  to see available keys'
    );
  }

  const config = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    const child: Record<string, unknown> = isPlainObject(next) ? next : {};
    current[part] = child;
    current = child;
  }
  current[lastPart] = parseValue(value);

  mergeWithDefaults(
    config,
    (issues) =>
      new ConfigError(
        `Invalid value for '${key}':\n${issues}`,
        'Run: tsrr config list  to see current values and types'
      )
  );

  ensureTsrrDir();
  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

function isKnownKey(key: string): boolean {
  return listEntries(DEFAULT_CONFIG).some(([known]) => known === key);
}

function listEntries(config: Record<string, unknown>): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * List all config values in a flat format
 * Returns entries like ['thresholds.tsrr', 0.5]
 */
export function listConfig(): Array<[string, unknown]> {
  return listEntries(loadConfig());
}
