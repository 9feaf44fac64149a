/**
 * Default configuration values
 */

import type {
  ContextConfigSchema,
  OutputConfigSchema,
  PgnReplayConfig,
  ReplayConfigSchema,
} from './schema.js';

export const DEFAULT_REPLAY_CONFIG: ReplayConfigSchema = {
  disambiguation: 'san',
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  maxLineLength: 80,
  perspective: 'white',
};

export const DEFAULT_CONTEXT_CONFIG: ContextConfigSchema = {
  includeBoard: true,
  recentMoves: 0,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: PgnReplayConfig = {
  replay: DEFAULT_REPLAY_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
  context: DEFAULT_CONTEXT_CONFIG,
};
