/**
 * Input, output and setup shared by every command
 */

import * as fs from 'node:fs';

import {
  PgnReplayEngine,
  UnreadableSourceError,
  parsePgn,
  type Game,
  type UnresolvedMoveError,
} from '@pgnreplay/pgn';

import { parseCliOptions } from '../cli.js';
import {
  ConfigValidationError,
  formatConfig,
  loadConfig,
  type CliOptions,
  type PgnReplayConfig,
} from '../config/index.js';
import {
  CliError,
  ConfigError,
  GameSelectionError,
  InputError,
  OutputError,
  handleError,
} from '../errors/index.js';
import {
  ProgressReporter,
  formatConfigDisplay,
  formatFileSize,
  pluralize,
} from '../progress/index.js';

/**
 * Everything a command body needs
 */
export interface CommandContext {
  options: CliOptions;
  config: PgnReplayConfig;
  reporter: ProgressReporter;
  games: Game[];
}

/**
 * Decode input bytes, rejecting invalid UTF-8
 */
export function decodeSource(bytes: Uint8Array, source: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new UnreadableSourceError(
      `${source} is not valid UTF-8 text${error instanceof Error ? ` (${error.message})` : ''}`,
      source,
    );
  }
}

/**
 * Read PGN text from a file or stdin
 */
export async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    if (!fs.existsSync(inputPath)) {
      throw new InputError(
        `Input file not found: ${inputPath}`,
        'Check the file path and try again',
      );
    }
    let bytes: Uint8Array;
    try {
      bytes = fs.readFileSync(inputPath);
    } catch (error) {
      throw new UnreadableSourceError(
        `Failed to read ${inputPath}: ${error instanceof Error ? error.message : String(error)}`,
        inputPath,
      );
    }
    return decodeSource(bytes, inputPath);
  }

  // No piped input
  if (process.stdin.isTTY) {
    throw new InputError(
      'No input provided',
      'Provide a PGN file with --input or pipe PGN data to stdin',
    );
  }

  return readStream(process.stdin, 'stdin');
}

/**
 * Collect a stream's bytes and decode them like a file's contents
 */
export function readStream(stream: NodeJS.ReadableStream, source: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    stream.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
    });

    stream.on('end', () => {
      try {
        resolve(decodeSource(Buffer.concat(chunks), source));
      } catch (error) {
        reject(error);
      }
    });

    stream.on('error', (err: Error) => {
      reject(new InputError(`Failed to read from ${source}: ${err.message}`));
    });
  });
}

/**
 * Write output to file or stdout
 */
export function writeOutput(output: string, outputPath: string | undefined): void {
  const text = output.endsWith('\n') ? output : `${output}\n`;
  if (outputPath) {
    try {
      fs.writeFileSync(outputPath, text, 'utf-8');
    } catch (error) {
      throw new OutputError(
        `Failed to write output file: ${outputPath}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
  } else {
    process.stdout.write(text);
  }
}

/**
 * Pick a game by its 1-based index (default: the first)
 */
export function selectGame(games: readonly Game[], index: number = 1): Game {
  const game = games[index - 1];
  if (!game) {
    throw new GameSelectionError(
      `Game ${index} not found`,
      `The input contains ${pluralize(games.length, 'game')}; choose --game 1 to ${games.length}`,
    );
  }
  return game;
}

/**
 * Move label for an unresolved half-move, e.g. "12... Nd7"
 */
export function describeUnresolved(error: UnresolvedMoveError, game: Game): string {
  const ply = error.ply ?? 0;
  const moveNumber = game.moves[Math.floor(ply / 2)]?.moveNumber ?? Math.floor(ply / 2) + 1;
  const dots = ply % 2 === 0 ? '.' : '...';
  const problem = `no ${error.side} piece could make this move (${error.reason})`;
  return `${moveNumber}${dots} ${error.san}: ${problem}`;
}

/**
 * Load a game into an engine at a cursor (default: final position),
 * warning about moves the replay could not apply
 */
export function replayGame(
  game: Game,
  config: PgnReplayConfig,
  reporter: ProgressReporter,
  cursor?: number,
): PgnReplayEngine {
  const engine = new PgnReplayEngine({ disambiguation: config.replay.disambiguation });
  engine.loadGame(game);
  if (cursor === undefined) {
    engine.last();
  } else {
    engine.jumpTo(cursor);
  }

  for (const error of engine.unresolvedMoves()) {
    reporter.warn(describeUnresolved(error, game));
  }
  return engine;
}

/**
 * Parse options, load config and games, then run the command body
 */
export async function runCommand(
  rawOptions: Record<string, unknown>,
  body: (context: CommandContext) => Promise<void> | void,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
  });

  try {
    let config: PgnReplayConfig;
    try {
      config = await loadConfig(options);
    } catch (error) {
      if (error instanceof ConfigValidationError || error instanceof CliError) throw error;
      throw new ConfigError(
        `Failed to load configuration${options.config ? ` from ${options.config}` : ''}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        'Check the config file syntax',
      );
    }

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter.startPhase('loading', options.input ?? 'stdin');
    const text = await readInput(options.input);
    const games = parsePgn(text);
    if (games.length === 0) {
      reporter.failPhase('loading', 'no games found');
      throw new InputError('No games found in input', 'Check that the input is PGN text');
    }
    reporter.completePhase(
      'loading',
      `${pluralize(games.length, 'game')} (${formatFileSize(Buffer.byteLength(text))})`,
    );

    await body({ options, config, reporter, games });
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
