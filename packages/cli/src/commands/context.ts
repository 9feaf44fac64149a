/**
 * context command: tags and moves up to a position, for pasting into a prompt
 */

import { formatPositionForPrompt, type PgnReplayEngine } from '@pgnreplay/pgn';

import type { PgnReplayConfig } from '../config/schema.js';

import { replayGame, runCommand, selectGame, writeOutput } from './shared.js';

export function formatContext(engine: PgnReplayEngine, config: PgnReplayConfig): string {
  return formatPositionForPrompt(engine, {
    includeBoard: config.context.includeBoard,
    recentMoves: config.context.recentMoves,
    perspective: config.output.perspective,
  });
}

/**
 * context command handler
 */
export async function contextCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runCommand(rawOptions, ({ options, config, reporter, games }) => {
    const game = selectGame(games, options.game);
    const engine = replayGame(game, config, reporter, options.ply);
    writeOutput(formatContext(engine, config), undefined);
  });
}
