/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { PgnReplayConfig } from './schema.js';

/**
 * Disambiguation mode schema
 */
export const disambiguationSchema = z.enum(['san', 'geometric']);

/**
 * Board perspective schema
 */
export const perspectiveSchema = z.enum(['white', 'black']);

export const replayConfigSchema = z.object({
  disambiguation: disambiguationSchema,
});

export const outputConfigSchema = z.object({
  maxLineLength: z.number().int().min(0).max(255),
  perspective: perspectiveSchema,
});

export const contextConfigSchema = z.object({
  includeBoard: z.boolean(),
  recentMoves: z.number().int().min(0),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  replay: replayConfigSchema,
  output: outputConfigSchema,
  context: contextConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z
  .object({
    replay: replayConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
    context: contextConfigSchema.partial().optional(),
  })
  .strict();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @returns the configuration, typed
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): PgnReplayConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): void {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}
