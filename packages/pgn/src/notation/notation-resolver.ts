/**
 * Notation resolver: applies one SAN token to a board without checking legality.
 *
 * The source square is found by scanning the board for pieces of the right
 * kind and side whose movement pattern reaches the destination. When more
 * than one piece qualifies, the one closest to the destination wins.
 */

import {
  ALL_SQUARES,
  isSquare,
  piece,
  squareCoords,
  type Board,
  type Piece,
  type PieceKind,
  type Side,
  type Square,
} from '../chess/board.js';
import { UnresolvedMoveError } from '../errors.js';

import { isPathClear, isPawnAdvance, isPlausibleMove, proximity } from './move-geometry.js';

/**
 * How the source square of an ambiguous move is chosen
 *
 * - `geometric`: movement pattern plus proximity only; SAN hint characters
 *   are ignored and pawns may come from anywhere
 * - `san`: file/rank hints filter candidates first, sliding pieces need a
 *   clear path and pawns must advance; proximity breaks remaining ties
 */
export type DisambiguationMode = 'san' | 'geometric';

export interface ResolveOptions {
  disambiguation?: DisambiguationMode;
}

export type CastlingSide = 'kingside' | 'queenside';

/**
 * The two squares of the most recent move, for highlighting
 */
export interface MoveHighlight {
  from: Square;
  to: Square;
}

export interface ResolvedMove extends MoveHighlight {
  piece: Piece;
  captured?: Piece;
  promotion?: PieceKind;
  castling?: CastlingSide;
}

export type MoveOutcome =
  | { ok: true; move: ResolvedMove }
  | { ok: false; error: UnresolvedMoveError };

/**
 * A non-castling SAN token broken into its parts
 */
export interface SanToken {
  kind: PieceKind;
  destination: Square;
  capture: boolean;
  /** Zero-based file index from a disambiguation hint */
  fromFile?: number;
  /** Zero-based rank index from a disambiguation hint */
  fromRank?: number;
  promotion?: PieceKind;
}

const PIECE_LETTERS: Record<string, PieceKind> = {
  K: 'king',
  Q: 'queen',
  R: 'rook',
  B: 'bishop',
  N: 'knight',
};

const PROMOTION_PATTERN = /^(.+[1-8])=?([QRBN])$/;

/**
 * Remove check, mate and annotation glyphs from the end of a token
 */
export function cleanToken(san: string): string {
  return san.trim().replace(/[+#!?]+$/, '');
}

export function castlingSide(token: string): CastlingSide | undefined {
  if (token === 'O-O' || token === '0-0') return 'kingside';
  if (token === 'O-O-O' || token === '0-0-0') return 'queenside';
  return undefined;
}

/**
 * Split a cleaned, non-castling token into kind, destination and hints
 */
export function parseSanToken(token: string): SanToken | undefined {
  const capture = token.includes('x');
  let body = token.replace(/x/g, '');

  let promotion: PieceKind | undefined;
  const promo = PROMOTION_PATTERN.exec(body);
  if (promo?.[1] && promo[2]) {
    body = promo[1];
    promotion = PIECE_LETTERS[promo[2]];
  }

  const destination = body.slice(-2);
  if (!isSquare(destination)) return undefined;

  const lead = body.charAt(0);
  const hasPieceLetter = lead !== '' && lead !== lead.toLowerCase();
  const kind: PieceKind = hasPieceLetter ? (PIECE_LETTERS[lead] ?? 'pawn') : 'pawn';
  const prefix = body.slice(hasPieceLetter ? 1 : 0, -2);

  const parsed: SanToken = { kind, destination, capture };
  for (const char of prefix) {
    if (char >= 'a' && char <= 'h') parsed.fromFile = char.charCodeAt(0) - 97;
    else if (char >= '1' && char <= '8') parsed.fromRank = char.charCodeAt(0) - 49;
  }
  if (promotion) parsed.promotion = promotion;
  return parsed;
}

function matchesHints(square: Square, token: SanToken): boolean {
  const { file, rank } = squareCoords(square);
  if (token.fromFile !== undefined && token.fromFile !== file) return false;
  if (token.fromRank !== undefined && token.fromRank !== rank) return false;
  return true;
}

function isSanCandidate(board: Board, square: Square, token: SanToken, side: Side): boolean {
  if (!matchesHints(square, token)) return false;

  switch (token.kind) {
    case 'queen':
    case 'rook':
    case 'bishop':
      return isPathClear(board, square, token.destination);
    case 'pawn': {
      const capture =
        token.capture ||
        (token.fromFile !== undefined &&
          token.fromFile !== squareCoords(token.destination).file);
      return (
        isPawnAdvance(side, square, token.destination, capture) &&
        isPathClear(board, square, token.destination)
      );
    }
    default:
      return true;
  }
}

/**
 * Find the square of the piece making a move, scanning in file-major,
 * ascending-rank order. Ties on proximity go to the first square scanned.
 */
export function findSourceSquare(
  board: Board,
  token: SanToken,
  side: Side,
  mode: DisambiguationMode = 'san',
): Square | undefined {
  let best: Square | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const square of ALL_SQUARES) {
    if (square === token.destination) continue;
    const occupant = board.get(square);
    if (!occupant || occupant.kind !== token.kind || occupant.side !== side) continue;
    if (!isPlausibleMove(token.kind, square, token.destination)) continue;
    if (mode === 'san' && !isSanCandidate(board, square, token, side)) continue;

    const d = proximity(square, token.destination);
    if (d < bestDistance) {
      best = square;
      bestDistance = d;
    }
  }

  return best;
}

function applyCastling(
  board: Board,
  san: string,
  side: Side,
  castling: CastlingSide,
): MoveOutcome {
  const rank = side === 'white' ? 1 : 8;
  const kingFrom: Square = `e${rank}`;
  const kingTo: Square = castling === 'kingside' ? `g${rank}` : `c${rank}`;
  const rookFrom: Square = castling === 'kingside' ? `h${rank}` : `a${rank}`;
  const rookTo: Square = castling === 'kingside' ? `f${rank}` : `d${rank}`;

  const king = board.get(kingFrom);
  if (!king || king.kind !== 'king' || king.side !== side) {
    return { ok: false, error: new UnresolvedMoveError(san, side, 'castling-blocked') };
  }

  board.delete(kingFrom);
  board.set(kingTo, king);

  const rook = board.get(rookFrom);
  if (rook) {
    board.delete(rookFrom);
    board.set(rookTo, rook);
  }

  return { ok: true, move: { from: kingFrom, to: kingTo, piece: king, castling } };
}

/**
 * Apply one move token for `side` to the board.
 *
 * On failure the board is left untouched and the outcome carries an
 * UnresolvedMoveError.
 */
export function applySan(
  board: Board,
  san: string,
  side: Side,
  options: ResolveOptions = {},
): MoveOutcome {
  const token = cleanToken(san);

  const castling = castlingSide(token);
  if (castling) {
    return applyCastling(board, san, side, castling);
  }

  const parsed = parseSanToken(token);
  if (!parsed) {
    return { ok: false, error: new UnresolvedMoveError(san, side, 'invalid-destination') };
  }

  const from = findSourceSquare(board, parsed, side, options.disambiguation ?? 'san');
  const mover = from ? board.get(from) : undefined;
  if (!from || !mover) {
    return { ok: false, error: new UnresolvedMoveError(san, side, 'no-candidate') };
  }

  const captured = board.get(parsed.destination);
  if (parsed.capture) {
    board.delete(parsed.destination);
  }

  board.delete(from);
  board.set(parsed.destination, parsed.promotion ? piece(side, parsed.promotion) : mover);

  const move: ResolvedMove = { from, to: parsed.destination, piece: mover };
  if (captured) move.captured = captured;
  if (parsed.promotion) move.promotion = parsed.promotion;
  return { ok: true, move };
}
