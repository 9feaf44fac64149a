import { parsePgn, type Game } from '@pgnreplay/pgn';

import { loadPgnSync } from './loader.js';

/**
 * Parse every game of a PGN fixture
 */
export function loadGamesSync(relativePath: string): Game[] {
  return parsePgn(loadPgnSync(relativePath));
}

/**
 * Parse one game of a PGN fixture
 * @throws Error if the fixture has no game at `index`
 */
export function loadGameSync(relativePath: string, index = 0): Game {
  const game = loadGamesSync(relativePath)[index];
  if (!game) {
    throw new Error(`Fixture ${relativePath} has no game at index ${index}`);
  }
  return game;
}
