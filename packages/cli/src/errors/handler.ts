/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CliError ? error.exitCode : 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}
