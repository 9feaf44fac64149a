/**
 * show command: ASCII board at a position
 */

import { gameTitle, renderBoard, type Game, type PgnReplayEngine } from '@pgnreplay/pgn';

import type { Perspective } from '../config/schema.js';
import { formatCursor } from '../progress/formatters.js';

import { replayGame, runCommand, selectGame, writeOutput } from './shared.js';

/**
 * Title, position label and board for the engine's current position
 */
export function formatShow(game: Game, engine: PgnReplayEngine, perspective: Perspective): string {
  const { board, cursor, lastMove, sideToMove } = engine.currentPosition();
  const lastMoveStr = lastMove ? `, last move ${lastMove.from}-${lastMove.to}` : '';

  return [
    gameTitle(game),
    `Position: ${formatCursor(cursor)}${lastMoveStr}; ${sideToMove} to move`,
    '',
    renderBoard(board, { perspective, lastMove }),
  ].join('\n');
}

/**
 * show command handler
 */
export async function showCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runCommand(rawOptions, ({ options, config, reporter, games }) => {
    const game = selectGame(games, options.game);
    const engine = replayGame(game, config, reporter, options.ply);
    writeOutput(formatShow(game, engine, config.output.perspective), undefined);
  });
}
