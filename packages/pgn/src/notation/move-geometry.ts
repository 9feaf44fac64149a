import {
  squareAt,
  squareCoords,
  type PieceKind,
  type ReadonlyBoard,
  type Side,
  type Square,
} from '../chess/board.js';

/**
 * Absolute file and rank distance between two squares
 */
export function distance(from: Square, to: Square): { files: number; ranks: number } {
  const a = squareCoords(from);
  const b = squareCoords(to);
  return { files: Math.abs(b.file - a.file), ranks: Math.abs(b.rank - a.rank) };
}

/**
 * Manhattan distance used to break ties between candidate movers
 */
export function proximity(from: Square, to: Square): number {
  const { files, ranks } = distance(from, to);
  return files + ranks;
}

/**
 * Whether the piece kind's movement pattern connects the two squares,
 * ignoring blockers. Pawns are always plausible.
 */
export function isPlausibleMove(kind: PieceKind, from: Square, to: Square): boolean {
  const { files, ranks } = distance(from, to);
  switch (kind) {
    case 'king':
      return files <= 1 && ranks <= 1;
    case 'queen':
      return files === 0 || ranks === 0 || files === ranks;
    case 'rook':
      return files === 0 || ranks === 0;
    case 'bishop':
      return files === ranks;
    case 'knight':
      return (files === 1 && ranks === 2) || (files === 2 && ranks === 1);
    case 'pawn':
      return true;
  }
}

/**
 * Whether every square strictly between two aligned squares is empty.
 * Squares that are not on a common line count as clear.
 */
export function isPathClear(board: ReadonlyBoard, from: Square, to: Square): boolean {
  const a = squareCoords(from);
  const b = squareCoords(to);
  const df = Math.sign(b.file - a.file);
  const dr = Math.sign(b.rank - a.rank);
  const files = Math.abs(b.file - a.file);
  const ranks = Math.abs(b.rank - a.rank);
  if (!(files === 0 || ranks === 0 || files === ranks)) return true;

  const steps = Math.max(files, ranks);
  for (let i = 1; i < steps; i++) {
    const between = squareAt(a.file + df * i, a.rank + dr * i);
    if (between && board.has(between)) return false;
  }
  return true;
}

/**
 * Forward pawn geometry: one step, two from the home rank, or one diagonal
 * step when capturing
 */
export function isPawnAdvance(side: Side, from: Square, to: Square, capture: boolean): boolean {
  const a = squareCoords(from);
  const b = squareCoords(to);
  const direction = side === 'white' ? 1 : -1;
  const forward = (b.rank - a.rank) * direction;
  const files = Math.abs(b.file - a.file);

  if (capture) {
    return files === 1 && forward === 1;
  }
  if (files !== 0) return false;
  const homeRank = side === 'white' ? 1 : 6;
  return forward === 1 || (forward === 2 && a.rank === homeRank);
}
