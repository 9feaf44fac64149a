/**
 * Board Visualization
 *
 * Renders positions as ASCII boards for terminals and chat prompts.
 * Uses brackets to distinguish pieces from empty squares.
 */

import type { MoveHighlight } from '../notation/notation-resolver.js';
import type { PgnReplayEngine } from '../replay/replay-engine.js';

import { boardToFen, pieceSymbol, squareAt, type ReadonlyBoard } from './board.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** Squares of the last move, drawn as `*P*` instead of `[P]` */
  lastMove?: MoveHighlight | undefined;
}

export interface PromptFormatOptions extends BoardRenderOptions {
  includeFen?: boolean;
  includeBoard?: boolean;
  /** Also list the last N move records reached (0 = off) */
  recentMoves?: number;
}

const FILE_LABELS = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];

/**
 * Render a board as ASCII
 *
 * Example output after 1. e4 with the last move marked:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  *P*  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P] *.* [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 *
 * Uppercase is White, lowercase Black.
 */
export function renderBoard(board: ReadonlyBoard, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const lastMove = options?.lastMove;
  const flipped = perspective === 'black';

  const order = [0, 1, 2, 3, 4, 5, 6, 7];
  const fileOrder = flipped ? [...order].reverse() : order;
  const rankOrder = flipped ? order : [...order].reverse();

  const files = fileOrder.map((index) => FILE_LABELS[index] ?? '?');
  const lines: string[] = [];

  lines.push(`   ${files.join('   ')}`);

  for (const rank of rankOrder) {
    const rankNum = rank + 1;
    const cells = fileOrder.map((file) => {
      const square = squareAt(file, rank);
      const occupant = square ? board.get(square) : undefined;
      const highlighted = square !== undefined && (square === lastMove?.from || square === lastMove?.to);
      const symbol = occupant ? pieceSymbol(occupant) : '.';
      if (highlighted) return `*${symbol}*`;
      return occupant ? `[${symbol}]` : ' . ';
    });
    lines.push(`${rankNum} ${cells.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}

/**
 * Describe the engine's current position for a chat prompt: the move
 * context, then FEN, side to move, last move and the board
 */
export function formatPositionForPrompt(
  engine: PgnReplayEngine,
  options?: PromptFormatOptions,
): string {
  const position = engine.currentPosition();
  const parts: string[] = [];

  const context = engine.movesUpTo();
  if (context) {
    parts.push(context);
    parts.push('');
  }

  const recent = options?.recentMoves ?? 0;
  if (recent > 0) {
    const records = engine.recentMoves(recent);
    if (records.length > 0) {
      parts.push(`Recent moves: ${records.map((record) => record.text).join(' ')}`);
    }
  }

  if (options?.includeFen !== false) {
    const fullmove = Math.floor(position.cursor) + 1;
    parts.push(`FEN: ${boardToFen(position.board, position.sideToMove, fullmove)}`);
  }

  parts.push(`Side to move: ${position.sideToMove === 'white' ? 'White' : 'Black'}`);

  if (position.lastMove) {
    parts.push(`Last move: ${position.lastMove.from}-${position.lastMove.to}`);
  }

  if (options?.includeBoard !== false) {
    parts.push('');
    parts.push('Board:');
    parts.push(
      renderBoard(position.board, {
        perspective: options?.perspective ?? 'white',
        lastMove: position.lastMove,
      }),
    );
  }

  return parts.join('\n');
}
