import type { GameMetadata, MoveRecord } from '../index.js';
import { renderMoveText } from '../parser/pgn-parser.js';

/**
 * Default maximum line length for PGN output
 */
export const DEFAULT_MAX_LINE_LENGTH = 80;

/**
 * Options for PGN rendering
 */
export interface RenderOptions {
  /**
   * Maximum line length for move text (default: 80)
   * Set to 0 to disable line wrapping
   */
  maxLineLength?: number;
}

/**
 * Anything carrying a game's tags and move list (a Game or a GameState)
 */
export interface SerializableGame {
  readonly metadata: Readonly<GameMetadata>;
  readonly moves: readonly MoveRecord[];
}

/**
 * Seven Tag Roster order
 */
const TAG_ROSTER: ReadonlyArray<readonly [string, keyof GameMetadata]> = [
  ['Event', 'event'],
  ['Site', 'site'],
  ['Date', 'date'],
  ['Round', 'round'],
  ['White', 'white'],
  ['Black', 'black'],
  ['Result', 'result'],
];

/**
 * Render a game back to PGN: tags, blank line, moves and the result
 *
 * @param game - The game or replay state to render
 * @param options - Optional rendering options
 * @returns PGN string
 */
export function serializeGame(game: SerializableGame, options?: RenderOptions): string {
  const parts: string[] = [];

  const tags = renderTags(game.metadata);
  if (tags) {
    parts.push(tags);
    parts.push('');
  }

  const moveText = [...game.moves.map(renderRecord), game.metadata.result ?? '*'].join(' ');

  const maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  parts.push(maxLineLength > 0 ? wrapMoveText(moveText, maxLineLength) : moveText);

  return parts.join('\n');
}

/**
 * Tag lines for the metadata fields that are present, in roster order
 */
export function renderTags(metadata: Readonly<GameMetadata>): string {
  const tags: string[] = [];
  for (const [name, field] of TAG_ROSTER) {
    const value = metadata[field];
    if (value !== undefined) {
      tags.push(renderTag(name, value));
    }
  }
  return tags.join('\n');
}

/**
 * Render a single PGN tag
 */
export function renderTag(name: string, value: string): string {
  // Escape backslashes and quotes in the value
  const escapedValue = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${name} "${escapedValue}"]`;
}

function renderRecord(record: MoveRecord): string {
  return record.comment ? `${record.text} {${sanitizeComment(record.comment)}}` : record.text;
}

/**
 * Brace comments have no escapes, so a closing brace in the text becomes `)`
 */
function sanitizeComment(comment: string): string {
  return comment.replace(/\}/g, ')');
}

/**
 * Move text covering the first `plies` half-moves. A record cut in half
 * keeps only its White move.
 */
export function truncateMoves(moves: readonly MoveRecord[], plies: number): string {
  const parts: string[] = [];
  const whole = Math.floor(plies / 2);

  for (const record of moves.slice(0, whole)) {
    parts.push(record.text);
  }

  const boundary = moves[whole];
  if (plies % 2 === 1 && boundary?.white !== undefined) {
    parts.push(renderMoveText(boundary.moveNumber, boundary.white));
  }

  return parts.join(' ');
}

/**
 * Tags, a blank line and the moves played up to a half-move count.
 * No result token is appended; without tags only the moves are returned.
 */
export function renderMoveContext(
  metadata: Readonly<GameMetadata>,
  moves: readonly MoveRecord[],
  plies: number,
): string {
  const tags = renderTags(metadata);
  const moveText = truncateMoves(moves, plies);
  if (!tags) return moveText;
  return moveText ? `${tags}\n\n${moveText}` : tags;
}

/**
 * Wrap move text to respect maximum line length
 *
 * Breaks at spaces and never inside a brace comment.
 *
 * @param text - The move text to wrap
 * @param maxLength - Maximum line length
 * @returns Wrapped text with newlines
 */
export function wrapMoveText(text: string, maxLength: number): string {
  if (!text || maxLength <= 0) {
    return text;
  }

  const tokens = tokenizeMoveText(text);
  const lines: string[] = [];
  let currentLine = '';

  for (const token of tokens) {
    const wouldExceed = currentLine.length > 0 && currentLine.length + 1 + token.length > maxLength;

    if (wouldExceed) {
      lines.push(currentLine);
      currentLine = token;
    } else {
      currentLine = currentLine.length > 0 ? `${currentLine} ${token}` : token;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines.join('\n');
}

/**
 * Tokenize move text while preserving brace comments as single tokens
 */
function tokenizeMoveText(text: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    while (i < text.length && /\s/.test(text.charAt(i))) {
      i++;
    }

    if (i >= text.length) break;

    let end: number;
    if (text.charAt(i) === '{') {
      const close = text.indexOf('}', i + 1);
      end = close === -1 ? text.length : close + 1;
    } else {
      end = i;
      while (end < text.length && !/[\s{]/.test(text.charAt(end))) {
        end++;
      }
    }

    tokens.push(text.slice(i, end));
    i = end;
  }

  return tokens;
}

export const serialize = serializeGame;
