import { loadGameSync } from '@pgnreplay/test-utils';
import { describe, it, expect } from 'vitest';

import {
  PgnReplayEngine,
  parsePgn,
  renderMoveContext,
  renderTags,
  serialize,
  serializeGame,
  wrapMoveText,
  type MoveRecord,
} from '../index.js';
import { renderTag } from '../renderer/pgn-renderer.js';

describe('PGN Renderer', () => {
  describe('serializeGame', () => {
    it('writes tags, a blank line, moves and the result', () => {
      const game = loadGameSync('opening.pgn');

      expect(serializeGame(game)).toBe(
        [
          '[Event "Club Championship"]',
          '[Site "Springfield"]',
          '[Date "2024.03.01"]',
          '[Round "1"]',
          '[White "Smith, Anna"]',
          '[Black "Jones, Ben"]',
          '[Result "*"]',
          '',
          '1. e4 e5 2. Nf3 Nc6 *',
        ].join('\n'),
      );
    });

    it('serializes the replay state the same way as the game', () => {
      const game = loadGameSync('opening.pgn');
      const engine = new PgnReplayEngine();
      engine.loadGame(game);
      engine.jumpTo(1);

      expect(serialize(engine.state)).toBe(serializeGame(game));
    });

    it('writes only present tags, in roster order', () => {
      const game = loadGameSync('annotated.pgn');

      expect(renderTags(game.metadata)).toBe(
        ['[Event "Annotated Example"]', '[White "Smith"]', '[Black "Jones"]', '[Result "1-0"]'].join(
          '\n',
        ),
      );
    });

    it('ends with * when the game has no result', () => {
      const [game] = parsePgn('1. e4 e5 2. Nf3');
      expect(game && serializeGame(game)).toBe('1. e4 e5 2. Nf3 *');
    });

    it('wraps move text at the configured length', () => {
      const game = loadGameSync('annotated.pgn');
      const lines = serializeGame(game, { maxLineLength: 20 }).split('\n');

      expect(lines.slice(-2)).toEqual(['1. e4 e5 2. Nf3 Nc6', '3. Bb5 a6 1-0']);
    });

    it('does not wrap when the line length is 0', () => {
      const game = loadGameSync('annotated.pgn');
      const lines = serializeGame(game, { maxLineLength: 0 }).split('\n');

      expect(lines[lines.length - 1]).toBe('1. e4 e5 2. Nf3 Nc6 3. Bb5 a6 1-0');
    });

    it('writes record comments in braces without closing braces inside', () => {
      const moves: MoveRecord[] = [
        { moveNumber: 1, white: 'e4', text: '1. e4', comment: 'main }line' },
      ];
      expect(serializeGame({ metadata: {}, moves })).toBe('1. e4 {main )line} *');
    });

    it('writes commented move text that parses back to the same moves', () => {
      const moves: MoveRecord[] = [
        { moveNumber: 1, white: 'e4', black: 'e5', text: '1. e4 e5', comment: 'main }line' },
        { moveNumber: 2, white: 'Nf3', text: '2. Nf3' },
      ];
      const text = serializeGame({ metadata: {}, moves });

      expect(text).toBe('1. e4 e5 {main )line} 2. Nf3 *');
      expect(parsePgn(text)[0]?.moves.map((m) => m.text)).toEqual(['1. e4 e5', '2. Nf3']);
    });
  });

  describe('renderTag', () => {
    it('escapes backslashes and quotes', () => {
      expect(renderTag('White', 'O"Brien \\ Co')).toBe('[White "O\\"Brien \\\\ Co"]');
    });
  });

  describe('renderMoveContext', () => {
    const [game] = parsePgn('1... e5 2. Nf3 Nc6 3. Bb5 *');
    const moves = game?.moves ?? [];

    it('cuts a record in half at an odd ply count', () => {
      expect(renderMoveContext({}, moves, 0)).toBe('');
      expect(renderMoveContext({}, moves, 1)).toBe('');
      expect(renderMoveContext({}, moves, 2)).toBe('1... e5');
      expect(renderMoveContext({}, moves, 3)).toBe('1... e5 2. Nf3');
      expect(renderMoveContext({}, moves, 5)).toBe('1... e5 2. Nf3 Nc6 3. Bb5');
    });

    it('puts tags before the moves', () => {
      expect(renderMoveContext({ white: 'Smith' }, moves, 2)).toBe('[White "Smith"]\n\n1... e5');
    });
  });

  describe('wrapMoveText', () => {
    it('never breaks inside a comment', () => {
      expect(wrapMoveText('1. e4 {a long comment here} e5', 10)).toBe(
        '1. e4\n{a long comment here}\ne5',
      );
    });

    it('returns the text unchanged when wrapping is disabled', () => {
      expect(wrapMoveText('1. e4 e5', 0)).toBe('1. e4 e5');
      expect(wrapMoveText('', 10)).toBe('');
    });
  });
});
