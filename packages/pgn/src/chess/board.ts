/**
 * Board model: squares, pieces and the starting placement
 */

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;
export const RANKS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export type File = (typeof FILES)[number];
export type Rank = (typeof RANKS)[number];

/**
 * Square identifier such as "e4"
 */
export type Square = `${File}${Rank}`;

export type Side = 'white' | 'black';

export type PieceKind = 'king' | 'queen' | 'rook' | 'bishop' | 'knight' | 'pawn';

export interface Piece {
  readonly side: Side;
  readonly kind: PieceKind;
}

/**
 * Sparse square-to-piece mapping; a missing key is an empty square
 */
export type Board = Map<Square, Piece>;
export type ReadonlyBoard = ReadonlyMap<Square, Piece>;

const SQUARE_PATTERN = /^[a-h][1-8]$/;

export function isSquare(value: string): value is Square {
  return SQUARE_PATTERN.test(value);
}

/**
 * Zero-based file and rank indices of a square
 */
export function squareCoords(square: Square): { file: number; rank: number } {
  return {
    file: square.charCodeAt(0) - 97,
    rank: square.charCodeAt(1) - 49,
  };
}

/**
 * Square at zero-based file/rank indices, or undefined when off the board
 */
export function squareAt(file: number, rank: number): Square | undefined {
  const f = FILES[file];
  const r = RANKS[rank];
  if (f === undefined || r === undefined) return undefined;
  const square: Square = `${f}${r}`;
  return square;
}

/**
 * Every square in file-major, ascending-rank order (a1, a2 ... h8)
 */
export const ALL_SQUARES: readonly Square[] = FILES.flatMap((file) =>
  RANKS.map((rank): Square => `${file}${rank}`),
);

export function opponent(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}

const PIECE_CACHE = new Map<string, Piece>();

/**
 * Shared frozen piece value
 */
export function piece(side: Side, kind: PieceKind): Piece {
  const key = `${side}:${kind}`;
  let cached = PIECE_CACHE.get(key);
  if (!cached) {
    cached = Object.freeze({ side, kind });
    PIECE_CACHE.set(key, cached);
  }
  return cached;
}

const BACK_RANK: readonly PieceKind[] = [
  'rook',
  'knight',
  'bishop',
  'queen',
  'king',
  'bishop',
  'knight',
  'rook',
];

function buildStartingPosition(): ReadonlyBoard {
  const board: Board = new Map();
  FILES.forEach((file, index) => {
    const kind = BACK_RANK[index] ?? 'pawn';
    board.set(`${file}1`, piece('white', kind));
    board.set(`${file}2`, piece('white', 'pawn'));
    board.set(`${file}7`, piece('black', 'pawn'));
    board.set(`${file}8`, piece('black', kind));
  });
  return board;
}

/**
 * Standard initial placement
 */
export const STARTING_POSITION: ReadonlyBoard = buildStartingPosition();

/**
 * Fresh mutable board holding the initial placement
 */
export function createStartingBoard(): Board {
  return new Map(STARTING_POSITION);
}

const FEN_LETTERS: Record<PieceKind, string> = {
  king: 'k',
  queen: 'q',
  rook: 'r',
  bishop: 'b',
  knight: 'n',
  pawn: 'p',
};

/**
 * FEN letter of a piece (uppercase for White)
 */
export function pieceSymbol(p: Piece): string {
  const letter = FEN_LETTERS[p.kind];
  return p.side === 'white' ? letter.toUpperCase() : letter;
}

/**
 * FEN placement field of a board
 */
export function boardToPlacement(board: ReadonlyBoard): string {
  const rows: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < 8; file++) {
      const square = squareAt(file, rank);
      const occupant = square ? board.get(square) : undefined;
      if (occupant) {
        if (empty > 0) row += String(empty);
        empty = 0;
        row += pieceSymbol(occupant);
      } else {
        empty++;
      }
    }
    if (empty > 0) row += String(empty);
    rows.push(row);
  }
  return rows.join('/');
}

/**
 * FEN string for a board. Castling and en-passant are not tracked, so both
 * fields are always "-".
 */
export function boardToFen(board: ReadonlyBoard, sideToMove: Side, fullmoveNumber = 1): string {
  const turn = sideToMove === 'white' ? 'w' : 'b';
  return `${boardToPlacement(board)} ${turn} - - 0 ${fullmoveNumber}`;
}

/**
 * Squares whose occupants differ between two boards, in board order
 */
export function diffBoards(a: ReadonlyBoard, b: ReadonlyBoard): Square[] {
  return ALL_SQUARES.filter((square) => !samePiece(a.get(square), b.get(square)));
}

export function samePiece(a: Piece | undefined, b: Piece | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.side === b.side && a.kind === b.kind;
}
