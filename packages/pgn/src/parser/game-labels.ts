import type { Game } from '../index.js';

/**
 * Descriptive title, e.g. "Smith vs Jones - Club Open 2024.03.01"
 */
export function gameTitle(game: Game): string {
  const { white = 'Unknown', black = 'Unknown', event = 'Chess Game', date = '' } = game.metadata;
  return `${white} vs ${black} - ${event} ${date}`.trimEnd();
}

/**
 * Short list entry: surnames (text before the first comma) and the result
 */
export function gameSummary(game: Game): string {
  const { metadata } = game;
  const white = metadata.white?.split(',')[0] ?? 'White';
  const black = metadata.black?.split(',')[0] ?? 'Black';
  return `${white} vs ${black} (${metadata.result ?? '*'})`;
}
