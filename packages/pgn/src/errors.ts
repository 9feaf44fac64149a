import type { Side } from './chess/board.js';

/**
 * Error raised when PGN source text cannot be read or decoded
 */
export class UnreadableSourceError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'UnreadableSourceError';
  }
}

/**
 * A recognized tag line that could not be parsed.
 * The parser skips these lines; the class exists for callers that report them.
 */
export class MalformedTagError extends Error {
  constructor(public readonly line: string) {
    super(`Malformed tag line: ${line}`);
    this.name = 'MalformedTagError';
  }
}

/**
 * Why a move token could not be applied to the board
 */
export type UnresolvedReason = 'invalid-destination' | 'no-candidate' | 'castling-blocked';

/**
 * A move token for which no moving piece could be found
 */
export class UnresolvedMoveError extends Error {
  constructor(
    public readonly san: string,
    public readonly side: Side,
    public readonly reason: UnresolvedReason,
    /** Half-move index, 0 being White's first move */
    public readonly ply?: number,
  ) {
    super(`Unresolved ${side} move "${san}" (${reason})`);
    this.name = 'UnresolvedMoveError';
  }

  /**
   * Copy of this error located at a half-move index
   */
  atPly(ply: number): UnresolvedMoveError {
    return new UnresolvedMoveError(this.san, this.side, this.reason, ply);
  }
}

/**
 * Error thrown for operations this engine deliberately does not support
 */
export class NotImplementedError extends Error {
  constructor(feature: string) {
    super(`${feature} is not implemented`);
    this.name = 'NotImplementedError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(san: string, fen: string) {
    super(`Illegal move "${san}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
