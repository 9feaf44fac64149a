/**
 * Error formatting tests
 */

import chalk from 'chalk';
import { beforeAll, describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import {
  AuditFailedError,
  CliError,
  GameSelectionError,
  InputError,
} from '../errors/cli-errors.js';
import { exitCodeFor, formatError } from '../errors/handler.js';

describe('CliError', () => {
  it('should format the message with a suggestion', () => {
    const error = new InputError('Input file not found: x.pgn', 'Check the file path');
    expect(error.format()).toBe(
      'Error: Input file not found: x.pgn\n\nSuggestion: Check the file path',
    );
    expect(error.exitCode).toBe(1);
  });

  it('should format the message alone without a suggestion', () => {
    expect(new GameSelectionError('Game 4 not found').format()).toBe('Error: Game 4 not found');
  });

  it('should count audit findings', () => {
    expect(new AuditFailedError(1).message).toBe('Replay audit reported 1 finding');
    expect(new AuditFailedError(3).message).toBe('Replay audit reported 3 findings');
  });
});

describe('formatError', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should use the CLI error format', () => {
    expect(formatError(new CliError('Bad input', 'Try again'))).toBe(
      'Error: Bad input\n\nSuggestion: Try again',
    );
  });

  it('should use the config validation format', () => {
    const error = new ConfigValidationError([{ path: 'output.perspective', message: 'Invalid' }]);
    expect(formatError(error).split('\n').slice(0, 3)).toEqual([
      'Configuration validation failed:',
      '',
      '  output.perspective: Invalid',
    ]);
  });

  it('should fall back to the message of plain errors and values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });
});

describe('exitCodeFor', () => {
  it('should use the CLI error exit code', () => {
    expect(exitCodeFor(new CliError('x', undefined, 3))).toBe(3);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});
