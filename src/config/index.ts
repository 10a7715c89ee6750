/**
 * Configuration Management
 *
 * Config is stored in ~/.fdo-compiler/config.json (or under FDO_COMPILER_HOME)
 * and can be overridden per process with environment variables.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { FDO_HOME, ensureDirectories } from '../db/schema.js';
import type { FdoConfig, Variant } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

const CONFIG_PATH = join(FDO_HOME, 'config.json');

export const MAX_TAB_WIDTH = 16;

// In-memory config cache
let currentConfig: FdoConfig | null = null;

function isVariant(value: unknown): value is Variant {
  return value === 'debug' || value === 'production';
}

function isCount(value: unknown, max = Number.MAX_SAFE_INTEGER): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= max;
}

/**
 * Apply the recognised fields of an untrusted object over a config
 */
export function mergeConfig(base: FdoConfig, overrides: unknown): FdoConfig {
  const config: FdoConfig = { ...base };
  if (typeof overrides !== 'object' || overrides === null) {
    return config;
  }

  const source: Record<string, unknown> = { ...overrides };
  if (isVariant(source.default_variant)) {
    config.default_variant = source.default_variant;
  }
  if (typeof source.golden_dir === 'string' && source.golden_dir !== '') {
    config.golden_dir = source.golden_dir;
  }
  if (typeof source.symbol_table_path === 'string' && source.symbol_table_path !== '') {
    config.symbol_table_path = source.symbol_table_path;
  }
  if (isCount(source.validator_concurrency)) {
    config.validator_concurrency = source.validator_concurrency;
  }
  if (isCount(source.tab_width, MAX_TAB_WIDTH)) {
    config.tab_width = source.tab_width;
  }
  return config;
}

/**
 * Environment overrides, as a partial config
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.FDO_DEFAULT_VARIANT) {
    overrides.default_variant = env.FDO_DEFAULT_VARIANT;
  }
  if (env.FDO_GOLDEN_DIR) {
    overrides.golden_dir = env.FDO_GOLDEN_DIR;
  }
  if (env.FDO_SYMBOL_TABLE) {
    overrides.symbol_table_path = env.FDO_SYMBOL_TABLE;
  }
  if (env.FDO_TAB_WIDTH !== undefined && /^\d+$/.test(env.FDO_TAB_WIDTH)) {
    overrides.tab_width = Number(env.FDO_TAB_WIDTH);
  }
  if (env.FDO_VALIDATOR_CONCURRENCY !== undefined && /^\d+$/.test(env.FDO_VALIDATOR_CONCURRENCY)) {
    overrides.validator_concurrency = Number(env.FDO_VALIDATOR_CONCURRENCY);
  }
  return overrides;
}

/**
 * Read the stored config file over the defaults, without environment overrides
 */
export function readConfigFile(path: string = CONFIG_PATH): FdoConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    return mergeConfig(DEFAULT_CONFIG, JSON.parse(readFileSync(path, 'utf-8')));
  } catch (error) {
    console.error('Failed to load config file:', error);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): FdoConfig {
  if (currentConfig) {
    return currentConfig;
  }

  ensureDirectories();
  currentConfig = mergeConfig(readConfigFile(), envOverrides());
  return currentConfig;
}

/**
 * Save configuration to disk
 *
 * Only what is passed in is written; environment overrides apply to the
 * cached copy and never reach the file.
 */
export function saveConfig(
  config: FdoConfig,
  path: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): FdoConfig {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = mergeConfig(config, envOverrides(env));
  return currentConfig;
}

/**
 * Update specific config values in the stored file
 */
export function updateConfig(
  updates: Partial<FdoConfig>,
  path: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): FdoConfig {
  return saveConfig(mergeConfig(readConfigFile(path), updates), path, env);
}

/**
 * Get current config (cached)
 */
export function getConfig(): FdoConfig {
  return loadConfig();
}

/**
 * Get config for display, with paths resolved
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    default_variant: config.default_variant,
    golden_dir: resolve(config.golden_dir),
    symbol_table_path: config.symbol_table_path ? resolve(config.symbol_table_path) : '(bundled)',
    validator_concurrency: config.validator_concurrency || '(one per core)',
    tab_width: config.tab_width || '(tabs rejected)',
    config_path: CONFIG_PATH,
  };
}

/**
 * Reset config to defaults
 */
export function resetConfig(): FdoConfig {
  return saveConfig({ ...DEFAULT_CONFIG });
}

/**
 * Validate config and return any issues
 */
export function validateConfig(config: FdoConfig = loadConfig()): { valid: boolean; issues: string[] } {
  const issues: string[] = [];

  if (!isVariant(config.default_variant)) {
    issues.push(`Unknown default variant: ${String(config.default_variant)}`);
  }

  if (!existsSync(config.golden_dir)) {
    issues.push(`Golden fixture directory not found: ${config.golden_dir}`);
  }

  if (config.symbol_table_path && !existsSync(config.symbol_table_path)) {
    issues.push(`Symbol table not found: ${config.symbol_table_path}`);
  }

  if (!isCount(config.tab_width, MAX_TAB_WIDTH)) {
    issues.push(`Tab width must be between 0 and ${MAX_TAB_WIDTH}`);
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}

export { CONFIG_PATH };
