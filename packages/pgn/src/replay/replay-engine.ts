/**
 * Replay engine: owns the board of one loaded game and moves a ply cursor
 * through it.
 *
 * Cursor values are multiples of 0.5. A whole number N sits just after
 * Black's move N (0 is the initial position); N + 0.5 sits after White's
 * move N + 1. Internally the cursor is kept as a half-move count.
 */

import {
  createStartingBoard,
  type Board,
  type ReadonlyBoard,
  type Side,
  type Square,
} from '../chess/board.js';
import { NotImplementedError, type UnresolvedMoveError } from '../errors.js';
import type { GameMetadata, MoveRecord, Game } from '../index.js';
import {
  applySan,
  type MoveHighlight,
  type ResolveOptions,
} from '../notation/notation-resolver.js';
import { renderMoveContext } from '../renderer/pgn-renderer.js';

export type ReplayOptions = ResolveOptions;

/**
 * Read-only view of the engine's state
 */
export interface GameState {
  readonly metadata: Readonly<GameMetadata>;
  readonly moves: readonly MoveRecord[];
  readonly cursor: number;
  readonly board: ReadonlyBoard;
  readonly lastMove: MoveHighlight | undefined;
}

/**
 * What a board renderer needs for the current ply
 */
export interface Position {
  board: ReadonlyBoard;
  cursor: number;
  hasPrevious: boolean;
  hasNext: boolean;
  lastMove: MoveHighlight | undefined;
  sideToMove: Side;
}

/**
 * Move token played at a half-move index, if that half exists
 */
export function halfMoveAt(
  moves: readonly MoveRecord[],
  ply: number,
): { san: string; side: Side } | undefined {
  const record = moves[Math.floor(ply / 2)];
  if (!record) return undefined;
  const side: Side = ply % 2 === 0 ? 'white' : 'black';
  const san = side === 'white' ? record.white : record.black;
  return san === undefined ? undefined : { san, side };
}

/**
 * Half-move count after the last move of a game
 */
export function finalPly(moves: readonly MoveRecord[]): number {
  const last = moves[moves.length - 1];
  if (!last) return 0;
  return last.black === undefined ? moves.length * 2 - 1 : moves.length * 2;
}

export class PgnReplayEngine {
  private metadata: GameMetadata = {};
  private moves: readonly MoveRecord[] = [];
  private ply = 0;
  private board: Board = createStartingBoard();
  private lastMove: MoveHighlight | undefined;
  private readonly unresolved = new Map<number, UnresolvedMoveError>();

  constructor(private readonly options: ReplayOptions = {}) {}

  /**
   * Replace the whole state with a fresh replay of `game` at cursor 0
   */
  loadGame(game: Game): void {
    this.metadata = { ...game.metadata };
    this.moves = [...game.moves];
    this.unresolved.clear();
    this.reset();
  }

  get cursor(): number {
    return this.ply / 2;
  }

  get hasPrevious(): boolean {
    return this.ply > 0;
  }

  get hasNext(): boolean {
    return this.ply < finalPly(this.moves);
  }

  get state(): GameState {
    return {
      metadata: this.metadata,
      moves: this.moves,
      cursor: this.cursor,
      board: new Map(this.board),
      lastMove: this.lastMove,
    };
  }

  first(): void {
    this.reset();
  }

  last(): void {
    this.replayTo(finalPly(this.moves));
  }

  next(): void {
    if (!this.hasNext) return;
    this.advance();
  }

  previous(): void {
    if (!this.hasPrevious) return;
    this.replayTo(this.ply - 1);
  }

  /**
   * Move to an arbitrary cursor; out-of-range values are clamped and
   * in-between values snap down to the previous half move
   */
  jumpTo(cursor: number): void {
    this.replayTo(this.toPly(cursor));
  }

  currentPosition(): Position {
    return {
      board: new Map(this.board),
      cursor: this.cursor,
      hasPrevious: this.hasPrevious,
      hasNext: this.hasNext,
      lastMove: this.lastMove,
      sideToMove: this.ply % 2 === 0 ? 'white' : 'black',
    };
  }

  /**
   * Tags and move text up to a cursor (the current one by default),
   * without a result token
   */
  movesUpTo(cursor: number = this.cursor): string {
    return renderMoveContext(this.metadata, this.moves, this.toPly(cursor));
  }

  /**
   * The last `count` move records the cursor has reached
   */
  recentMoves(count: number): MoveRecord[] {
    if (count <= 0) return [];
    const reached = this.moves.slice(0, Math.ceil(this.ply / 2));
    return reached.slice(-count);
  }

  /**
   * Moves that could not be applied while replaying, in ply order
   */
  unresolvedMoves(): UnresolvedMoveError[] {
    return [...this.unresolved.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, error]) => error);
  }

  makeMove(_side: Side, _from: Square, _to: Square): never {
    throw new NotImplementedError('Interactive move entry');
  }

  private toPly(cursor: number): number {
    if (!Number.isFinite(cursor)) return 0;
    const ply = Math.floor(cursor * 2);
    return Math.min(Math.max(ply, 0), finalPly(this.moves));
  }

  private reset(): void {
    this.board = createStartingBoard();
    this.ply = 0;
    this.lastMove = undefined;
  }

  private replayTo(ply: number): void {
    this.reset();
    while (this.ply < ply) {
      this.advance();
    }
  }

  /**
   * Apply the half-move at the cursor and step forward by one ply
   */
  private advance(): void {
    const halfMove = halfMoveAt(this.moves, this.ply);
    if (halfMove) {
      const outcome = applySan(this.board, halfMove.san, halfMove.side, this.options);
      if (outcome.ok) {
        this.lastMove = { from: outcome.move.from, to: outcome.move.to };
      } else {
        this.unresolved.set(this.ply, outcome.error.atPly(this.ply));
      }
    }
    this.ply++;
  }
}
