/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Disambiguation descriptions for help text
 */
const DISAMBIGUATION_HELP = `How ambiguous moves pick their piece:
    san       - Honour file/rank hints, clear paths and pawn direction [default]
    geometric - Closest piece of the right kind wins`;

/**
 * Perspective descriptions for help text
 */
const PERSPECTIVE_HELP = `Board orientation:
    white - White at the bottom [default]
    black - Black at the bottom`;

/**
 * Parse a non-negative integer option value
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Parse a 1-based game index
 */
export function parseGameIndex(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Games are numbered from 1.');
  }
  return parsed;
}

/**
 * Parse a replay cursor: whole moves, with .5 after White's half-move
 */
export function parseCursor(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a move number such as 12 or 12.5.');
  }
  return parsed;
}

/**
 * Add the options every command shares
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-i, --input <file>', 'Input PGN file (default: stdin)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--disambiguation <mode>', DISAMBIGUATION_HELP)
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('pgnreplay')
    .description('Replay PGN games move by move and render boards, move context and clean PGN')
    .version(VERSION);

  withCommonOptions(program.command('list').description('List the games in a PGN file'))
    .action(async (options) => {
      const { listCommand } = await import('./commands/list.js');
      await listCommand(options);
    });

  withCommonOptions(program.command('show').description('Render a game position as an ASCII board'))
    .option('-g, --game <n>', 'Game number, starting at 1', parseGameIndex)
    .option(
      '--ply <cursor>',
      'Position to show, e.g. 12 or 12.5 (default: final position)',
      parseCursor,
    )
    .option('--perspective <side>', PERSPECTIVE_HELP)
    .action(async (options) => {
      const { showCommand } = await import('./commands/show.js');
      await showCommand(options);
    });

  withCommonOptions(
    program
      .command('context')
      .description('Print the tags and moves played up to a position, with the board'),
  )
    .option('-g, --game <n>', 'Game number, starting at 1', parseGameIndex)
    .option('--ply <cursor>', 'Position to describe (default: final position)', parseCursor)
    .option('--perspective <side>', PERSPECTIVE_HELP)
    .option('--recent-moves <count>', 'Also list the last <count> moves', parseNonNegativeInt)
    .option('--no-board', 'Leave the board out of the context')
    .action(async (options) => {
      const { contextCommand } = await import('./commands/context.js');
      await contextCommand(options);
    });

  withCommonOptions(program.command('export').description('Write a game back out as clean PGN'))
    .option('-g, --game <n>', 'Game number, starting at 1', parseGameIndex)
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .option(
      '--max-line-length <n>',
      'Wrap move text at <n> characters (0 = no wrapping)',
      parseNonNegativeInt,
    )
    .action(async (options) => {
      const { exportCommand } = await import('./commands/export.js');
      await exportCommand(options);
    });

  withCommonOptions(
    program
      .command('audit')
      .description('Replay every game against a rules-aware reference and report divergences'),
  )
    .action(async (options) => {
      const { auditCommand } = await import('./commands/audit.js');
      await auditCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = stringOption(options, 'input');
  if (input !== undefined) result.input = input;
  const output = stringOption(options, 'output');
  if (output !== undefined) result.output = output;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const disambiguation = stringOption(options, 'disambiguation');
  if (disambiguation !== undefined) result.disambiguation = disambiguation;
  const perspective = stringOption(options, 'perspective');
  if (perspective !== undefined) result.perspective = perspective;

  const maxLineLength = numberOption(options, 'maxLineLength');
  if (maxLineLength !== undefined) result.maxLineLength = maxLineLength;
  const recentMoves = numberOption(options, 'recentMoves');
  if (recentMoves !== undefined) result.recentMoves = recentMoves;
  const game = numberOption(options, 'game');
  if (game !== undefined) result.game = game;
  const ply = numberOption(options, 'ply');
  if (ply !== undefined) result.ply = ply;

  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Commander.js reports negated flags as board/color: false and defaults them to true
  if (options['board'] === false) result.board = false;
  if (options['color'] === false) result.noColor = true;

  return result;
}
