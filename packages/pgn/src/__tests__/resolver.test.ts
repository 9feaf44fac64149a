import { describe, it, expect } from 'vitest';

import {
  STARTING_POSITION,
  applySan,
  castlingSide,
  cleanToken,
  createStartingBoard,
  diffBoards,
  findSourceSquare,
  parseSanToken,
  piece,
  type Board,
} from '../index.js';

function emptyBoard(): Board {
  return new Map();
}

describe('Notation Resolver', () => {
  describe('token parsing', () => {
    it('strips check, mate and annotation glyphs', () => {
      expect(cleanToken('Qxf7#')).toBe('Qxf7');
      expect(cleanToken('Nf3+')).toBe('Nf3');
      expect(cleanToken('e4!?')).toBe('e4');
      expect(cleanToken('Rd1??')).toBe('Rd1');
    });

    it('recognizes both castling spellings', () => {
      expect(castlingSide('O-O')).toBe('kingside');
      expect(castlingSide('0-0')).toBe('kingside');
      expect(castlingSide('O-O-O')).toBe('queenside');
      expect(castlingSide('0-0-0')).toBe('queenside');
      expect(castlingSide('Ke2')).toBeUndefined();
    });

    it('splits a token into kind, destination and hints', () => {
      expect(parseSanToken('Nbd7')).toEqual({
        kind: 'knight',
        destination: 'd7',
        capture: false,
        fromFile: 1,
      });
      expect(parseSanToken('exd5')).toEqual({
        kind: 'pawn',
        destination: 'd5',
        capture: true,
        fromFile: 4,
      });
      expect(parseSanToken('R1a3')).toEqual({
        kind: 'rook',
        destination: 'a3',
        capture: false,
        fromRank: 0,
      });
      expect(parseSanToken('e8=Q')).toEqual({
        kind: 'pawn',
        destination: 'e8',
        capture: false,
        promotion: 'queen',
      });
    });

    it('rejects tokens without a valid destination', () => {
      expect(parseSanToken('e9')).toBeUndefined();
      expect(parseSanToken('Zz')).toBeUndefined();
      expect(parseSanToken('')).toBeUndefined();
    });
  });

  describe('findSourceSquare', () => {
    it('finds the moving piece without touching the board', () => {
      const board = createStartingBoard();
      const knight = parseSanToken('Nf3');
      const stranded = parseSanToken('Nd5');
      if (!knight || !stranded) throw new Error('unparsed test token');

      expect(findSourceSquare(board, knight, 'white')).toBe('g1');
      expect(findSourceSquare(board, stranded, 'white')).toBeUndefined();
      expect(diffBoards(board, STARTING_POSITION)).toEqual([]);
    });
  });

  describe('applySan', () => {
    it('moves a pawn from the starting position', () => {
      const board = createStartingBoard();
      const outcome = applySan(board, 'e4', 'white');

      expect(outcome).toEqual({
        ok: true,
        move: { from: 'e2', to: 'e4', piece: { side: 'white', kind: 'pawn' } },
      });
      expect(board.get('e2')).toBeUndefined();
      expect(board.get('e4')).toEqual({ side: 'white', kind: 'pawn' });
    });

    it('develops a knight', () => {
      const board = createStartingBoard();
      const outcome = applySan(board, 'Nf3', 'white');

      expect(outcome.ok && outcome.move.from).toBe('g1');
      expect(board.get('f3')).toEqual({ side: 'white', kind: 'knight' });
    });

    it('removes a captured piece', () => {
      const board = emptyBoard();
      board.set('a1', piece('white', 'rook'));
      board.set('a5', piece('black', 'knight'));

      const outcome = applySan(board, 'Rxa5', 'white');

      expect(outcome.ok && outcome.move.captured).toEqual({ side: 'black', kind: 'knight' });
      expect(board.get('a5')).toEqual({ side: 'white', kind: 'rook' });
      expect(board.size).toBe(1);
    });

    it('captures with a pawn from the hinted file', () => {
      const board = createStartingBoard();
      applySan(board, 'e4', 'white');
      applySan(board, 'd5', 'black');

      const outcome = applySan(board, 'exd5', 'white');

      expect(outcome.ok && outcome.move.from).toBe('e4');
      expect(board.get('d5')).toEqual({ side: 'white', kind: 'pawn' });
      expect(board.get('e4')).toBeUndefined();
    });

    it('promotes a pawn reaching the last rank', () => {
      const board = emptyBoard();
      board.set('e7', piece('white', 'pawn'));

      const outcome = applySan(board, 'e8=Q+', 'white');

      expect(outcome.ok && outcome.move.promotion).toBe('queen');
      expect(board.get('e8')).toEqual({ side: 'white', kind: 'queen' });
      expect(board.has('e7')).toBe(false);
    });

    it('leaves the board untouched for an invalid destination', () => {
      const board = createStartingBoard();
      const outcome = applySan(board, 'Qz9', 'white');

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.reason).toBe('invalid-destination');
      expect(outcome.error.san).toBe('Qz9');
      expect(diffBoards(board, STARTING_POSITION)).toEqual([]);
    });

    it('leaves the board untouched when no piece can make the move', () => {
      const board = createStartingBoard();
      const outcome = applySan(board, 'Nd5', 'white');

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.reason).toBe('no-candidate');
      expect(outcome.error.side).toBe('white');
      expect(diffBoards(board, STARTING_POSITION)).toEqual([]);
    });
  });

  describe('castling', () => {
    it('castles kingside for White', () => {
      const board = createStartingBoard();
      board.delete('f1');
      board.delete('g1');

      const outcome = applySan(board, 'O-O', 'white');

      expect(outcome.ok && outcome.move).toEqual({
        from: 'e1',
        to: 'g1',
        piece: { side: 'white', kind: 'king' },
        castling: 'kingside',
      });
      expect(board.get('g1')).toEqual({ side: 'white', kind: 'king' });
      expect(board.get('f1')).toEqual({ side: 'white', kind: 'rook' });
      expect(board.has('e1')).toBe(false);
      expect(board.has('h1')).toBe(false);
    });

    it('castles queenside for Black', () => {
      const board = createStartingBoard();
      board.delete('b8');
      board.delete('c8');
      board.delete('d8');

      applySan(board, '0-0-0', 'black');

      expect(board.get('c8')).toEqual({ side: 'black', kind: 'king' });
      expect(board.get('d8')).toEqual({ side: 'black', kind: 'rook' });
      expect(board.has('a8')).toBe(false);
      expect(board.has('e8')).toBe(false);
    });

    it('does not castle a king that has left its home square', () => {
      const board = emptyBoard();
      board.set('f1', piece('white', 'king'));
      board.set('h1', piece('white', 'rook'));

      const outcome = applySan(board, 'O-O', 'white');

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.reason).toBe('castling-blocked');
      expect(board.get('f1')).toEqual({ side: 'white', kind: 'king' });
    });
  });

  describe('disambiguation', () => {
    it('breaks proximity ties by scan order', () => {
      const board = emptyBoard();
      board.set('b1', piece('white', 'knight'));
      board.set('f3', piece('white', 'knight'));

      const outcome = applySan(board, 'Nd2', 'white');
      expect(outcome.ok && outcome.move.from).toBe('b1');
    });

    it('honours a file hint in san mode and ignores it in geometric mode', () => {
      const san = emptyBoard();
      san.set('b1', piece('white', 'knight'));
      san.set('f3', piece('white', 'knight'));
      const geometric = new Map(san);

      const strict = applySan(san, 'Nfd2', 'white', { disambiguation: 'san' });
      const loose = applySan(geometric, 'Nfd2', 'white', { disambiguation: 'geometric' });

      expect(strict.ok && strict.move.from).toBe('f3');
      expect(loose.ok && loose.move.from).toBe('b1');
    });

    it('skips blocked sliders in san mode', () => {
      const board = emptyBoard();
      board.set('a1', piece('white', 'rook'));
      board.set('c1', piece('white', 'bishop'));
      board.set('h1', piece('white', 'rook'));
      const geometric = new Map(board);

      const strict = applySan(board, 'Rd1', 'white');
      const loose = applySan(geometric, 'Rd1', 'white', { disambiguation: 'geometric' });

      expect(strict.ok && strict.move.from).toBe('h1');
      expect(loose.ok && loose.move.from).toBe('a1');
    });

    it('lets a queen jump over pieces only in geometric mode', () => {
      const strict = applySan(createStartingBoard(), 'Qh5', 'white');
      const loose = applySan(createStartingBoard(), 'Qh5', 'white', {
        disambiguation: 'geometric',
      });

      expect(strict.ok).toBe(false);
      expect(loose.ok && loose.move.from).toBe('d1');
    });

    it('picks the closest pawn in geometric mode even when it cannot advance there', () => {
      const replay = (disambiguation: 'san' | 'geometric'): Board => {
        const board = createStartingBoard();
        applySan(board, 'd4', 'white', { disambiguation });
        applySan(board, 'd5', 'black', { disambiguation });
        applySan(board, 'c4', 'white', { disambiguation });
        return board;
      };

      const geometric = replay('geometric');
      expect(geometric.has('d4')).toBe(false);
      expect(geometric.get('c2')).toEqual({ side: 'white', kind: 'pawn' });
      expect(geometric.get('c4')).toEqual({ side: 'white', kind: 'pawn' });

      const san = replay('san');
      expect(san.get('d4')).toEqual({ side: 'white', kind: 'pawn' });
      expect(san.has('c2')).toBe(false);
      expect(san.get('c4')).toEqual({ side: 'white', kind: 'pawn' });
    });
  });
});
