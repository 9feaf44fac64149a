import { Chess, type PieceSymbol } from 'chess.js';

import { IllegalMoveError, InvalidFenError } from '../errors.js';

import { isSquare, piece, type Board, type PieceKind } from './board.js';

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation, as chess.js writes it */
  san: string;
  from: string;
  to: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const KINDS: Record<PieceSymbol, PieceKind> = {
  k: 'king',
  q: 'queen',
  r: 'rook',
  b: 'bishop',
  n: 'knight',
  p: 'pawn',
};

/**
 * Rules-checked position backed by chess.js, used to cross-check replays
 */
export class ReferencePosition {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
    } else {
      this.chess = new Chess();
    }
  }

  fen(): string {
    return this.chess.fen();
  }

  /**
   * Apply a move in SAN notation
   * @throws IllegalMoveError if the move is not legal
   */
  move(san: string): MoveResult {
    const fenBefore = this.chess.fen();
    try {
      const result = this.chess.move(san);
      return {
        san: result.san,
        from: result.from,
        to: result.to,
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      // chess.js throws a plain Error for moves it rejects
      throw new IllegalMoveError(san, fenBefore);
    }
  }

  turn(): 'w' | 'b' {
    return this.chess.turn();
  }

  /**
   * Current placement in the replay engine's board model
   */
  placement(): Board {
    const board: Board = new Map();
    for (const row of this.chess.board()) {
      for (const cell of row) {
        if (cell && isSquare(cell.square)) {
          board.set(cell.square, piece(cell.color === 'w' ? 'white' : 'black', KINDS[cell.type]));
        }
      }
    }
    return board;
  }
}
