/**
 * export command: a game re-serialized as PGN
 */

import { serializeGame } from '@pgnreplay/pgn';

import { runCommand, selectGame, writeOutput } from './shared.js';

/**
 * export command handler
 */
export async function exportCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runCommand(rawOptions, ({ options, config, reporter, games }) => {
    const game = selectGame(games, options.game);
    const pgn = serializeGame(game, { maxLineLength: config.output.maxLineLength });

    if (options.output) {
      reporter.startPhase('writing', options.output);
      writeOutput(pgn, options.output);
      reporter.completePhase('writing');
      reporter.printOutputLocation(options.output);
    } else {
      writeOutput(pgn, undefined);
    }
  });
}
