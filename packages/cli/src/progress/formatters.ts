/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { PgnReplayConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: PgnReplayConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Replay:'));
  lines.push(`  Disambiguation: ${config.replay.disambiguation}`);
  lines.push('');

  lines.push(chalk.dim('Output:'));
  const { maxLineLength } = config.output;
  lines.push(`  Max line length: ${maxLineLength === 0 ? 'no wrapping' : maxLineLength}`);
  lines.push(`  Perspective: ${config.output.perspective}`);
  lines.push('');

  lines.push(chalk.dim('Context:'));
  lines.push(`  Include board: ${config.context.includeBoard ? 'yes' : 'no'}`);
  lines.push(
    `  Recent moves: ${config.context.recentMoves === 0 ? 'off' : config.context.recentMoves}`,
  );

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a count with a singular or plural noun
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Format a replay cursor: 0 = "start", 2 = "after move 2", 2.5 = "after White's move 3"
 */
export function formatCursor(cursor: number): string {
  if (cursor <= 0) {
    return 'start';
  }
  const whole = Math.floor(cursor);
  return cursor === whole ? `after move ${whole}` : `after White's move ${whole + 1}`;
}
