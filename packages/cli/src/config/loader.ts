/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PgnReplayConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * Untyped configuration layer, validated once all layers are merged
 */
export type RawConfig = Record<string, unknown>;

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
export const ENV_VAR_MAP: Record<string, string> = {
  PGNREPLAY_DISAMBIGUATION: 'replay.disambiguation',
  PGNREPLAY_MAX_LINE_LENGTH: 'output.maxLineLength',
  PGNREPLAY_PERSPECTIVE: 'output.perspective',
  PGNREPLAY_CONTEXT_BOARD: 'context.includeBoard',
  PGNREPLAY_RECENT_MOVES: 'context.recentMoves',
};

const BOOLEAN_PATHS = new Set(['context.includeBoard']);
const NUMERIC_PATHS = new Set(['output.maxLineLength', 'context.recentMoves']);

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRaw(config: PgnReplayConfig): RawConfig {
  return {
    replay: { ...config.replay },
    output: { ...config.output },
    context: { ...config.context },
  };
}

/**
 * Deep merge two config layers
 * Source values override target values
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * Set a nested property on an object using dot notation path
 */
export function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

/**
 * Parse environment variable value based on expected type
 */
export function parseEnvValue(value: string, path: string): unknown {
  if (BOOLEAN_PATHS.has(path)) {
    return value.toLowerCase() === 'true' || value === '1';
  }

  if (NUMERIC_PATHS.has(path)) {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const config: RawConfig = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<RawConfig | null> {
  const explorer = cosmiconfig('pgnreplay', {
    searchPlaces: [
      'package.json',
      '.pgnreplayrc',
      '.pgnreplayrc.json',
      '.pgnreplayrc.yaml',
      '.pgnreplayrc.yml',
      'pgnreplay.config.js',
      'pgnreplay.config.cjs',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search();
  if (!result || result.isEmpty) {
    return null;
  }

  validatePartialConfig(result.config);
  return isRecord(result.config) ? result.config : null;
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): RawConfig {
  const config: RawConfig = {};

  if (options.disambiguation !== undefined) {
    setNestedProperty(config, 'replay.disambiguation', options.disambiguation);
  }
  if (options.maxLineLength !== undefined) {
    setNestedProperty(config, 'output.maxLineLength', options.maxLineLength);
  }
  if (options.perspective !== undefined) {
    setNestedProperty(config, 'output.perspective', options.perspective);
  }
  if (options.board !== undefined) {
    setNestedProperty(config, 'context.includeBoard', options.board);
  }
  if (options.recentMoves !== undefined) {
    setNestedProperty(config, 'context.recentMoves', options.recentMoves);
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PgnReplayConfig> {
  let config = toRaw(DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: PgnReplayConfig): string {
  return JSON.stringify(config, null, 2);
}
