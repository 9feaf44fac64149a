/**
 * list command: one line per game
 */

import { gameSummary, type Game } from '@pgnreplay/pgn';

import { pluralize } from '../progress/formatters.js';

import { runCommand, writeOutput } from './shared.js';

/**
 * Format the game list: index, players and result, event, date, move count
 */
export function formatGameList(games: readonly Game[]): string {
  return games
    .map((game, index) => {
      const { event = '?', date = '????.??.??' } = game.metadata;
      return [
        `${index + 1}. ${gameSummary(game)}`,
        event,
        date,
        pluralize(game.moves.length, 'move'),
      ].join(' | ');
    })
    .join('\n');
}

/**
 * list command handler
 */
export async function listCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runCommand(rawOptions, ({ games }) => {
    writeOutput(formatGameList(games), undefined);
  });
}
