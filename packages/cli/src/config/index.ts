/**
 * Configuration module exports
 */

// Schema types
export type {
  Disambiguation,
  Perspective,
  ReplayConfigSchema,
  OutputConfigSchema,
  ContextConfigSchema,
  PgnReplayConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_REPLAY_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONTEXT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  disambiguationSchema,
  perspectiveSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  ENV_VAR_MAP,
  deepMerge,
  loadConfig,
  loadEnvConfig,
  mapCliToConfig,
  formatConfig,
  type RawConfig,
} from './loader.js';
