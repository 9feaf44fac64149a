/**
 * Command output tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';

import { PgnReplayEngine, UnreadableSourceError, auditReplay, parsePgn } from '@pgnreplay/pgn';
import { getFixturePath, loadGameSync, loadGamesSync, loadPgnSync } from '@pgnreplay/test-utils';
import { describe, it, expect } from 'vitest';

import { formatAuditReport, formatFinding } from '../commands/audit.js';
import { formatContext } from '../commands/context.js';
import { formatGameList } from '../commands/list.js';
import {
  decodeSource,
  describeUnresolved,
  readInput,
  readStream,
  replayGame,
  selectGame,
  writeOutput,
} from '../commands/shared.js';
import { formatShow } from '../commands/show.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { GameSelectionError, InputError } from '../errors/cli-errors.js';
import { ProgressReporter } from '../progress/reporter.js';

const silent = new ProgressReporter({ silent: true });

const OPENING_TAGS = [
  '[Event "Club Championship"]',
  '[Site "Springfield"]',
  '[Date "2024.03.01"]',
  '[Round "1"]',
  '[White "Smith, Anna"]',
  '[Black "Jones, Ben"]',
  '[Result "*"]',
];

describe('list', () => {
  it('should print one line per game', () => {
    expect(formatGameList(loadGamesSync('multi-game.pgn')).split('\n')).toEqual([
      '1. Alpha vs Beta (1-0) | Rapid Open | ????.??.?? | 4 moves',
      '2. Gamma vs Delta (0-1) | Rapid Open | ????.??.?? | 2 moves',
      '3. Epsilon vs Zeta (1/2-1/2) | Rapid Open | ????.??.?? | 2 moves',
    ]);
  });
});

describe('selectGame', () => {
  const games = loadGamesSync('multi-game.pgn');

  it('should pick games by 1-based index', () => {
    expect(selectGame(games).metadata.white).toBe('Alpha');
    expect(selectGame(games, 2).metadata.white).toBe('Gamma');
  });

  it('should reject indexes past the end', () => {
    expect(() => selectGame(games, 4)).toThrow(GameSelectionError);
    expect(() => selectGame(games, 4)).toThrow('Game 4 not found');
  });
});

describe('replayGame', () => {
  it('should stop at the final position by default', () => {
    const engine = replayGame(loadGameSync('opening.pgn'), DEFAULT_CONFIG, silent);
    expect(engine.cursor).toBe(2);
  });

  it('should jump to the requested cursor', () => {
    const engine = replayGame(loadGameSync('opening.pgn'), DEFAULT_CONFIG, silent, 0.5);
    expect(engine.currentPosition().lastMove).toEqual({ from: 'e2', to: 'e4' });
  });
});

describe('describeUnresolved', () => {
  it('should name the move and why it failed', () => {
    const [game] = parsePgn('1. e4 e5 2. Ke3 Nc6 *');
    if (!game) throw new Error('no game in test input');
    const engine = new PgnReplayEngine();
    engine.loadGame(game);
    engine.last();

    const [error] = engine.unresolvedMoves();
    if (!error) throw new Error('expected an unresolved move');
    expect(describeUnresolved(error, game)).toBe(
      '2. Ke3: no white piece could make this move (no-candidate)',
    );
  });
});

describe('show', () => {
  it('should print the title, position label and board', () => {
    const game = loadGameSync('opening.pgn');
    const engine = replayGame(game, DEFAULT_CONFIG, silent, 0.5);
    const lines = formatShow(game, engine, 'white').split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Smith, Anna vs Jones, Ben - Club Championship 2024.03.01',
      "Position: after White's move 1, last move e2-e4; black to move",
      '',
      '   a   b   c   d   e   f   g   h',
    ]);
    expect(lines[8]).toBe('4  .   .   .   .  *P*  .   .   .   4');
    expect(lines).toHaveLength(13);
  });
});

describe('context', () => {
  it('should print tags, moves and position details without the board', () => {
    const engine = replayGame(loadGameSync('opening.pgn'), DEFAULT_CONFIG, silent, 1);
    const config = { ...DEFAULT_CONFIG, context: { includeBoard: false, recentMoves: 0 } };

    expect(formatContext(engine, config)).toBe(
      [
        ...OPENING_TAGS,
        '',
        '1. e4 e5',
        '',
        'FEN: rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w - - 0 2',
        'Side to move: White',
        'Last move: e7-e5',
      ].join('\n'),
    );
  });

  it('should append the board by default', () => {
    const engine = replayGame(loadGameSync('opening.pgn'), DEFAULT_CONFIG, silent, 1);
    const lines = formatContext(engine, DEFAULT_CONFIG).split('\n');

    expect(lines[lines.length - 11]).toBe('Board:');
    expect(lines[lines.length - 1]).toBe('   a   b   c   d   e   f   g   h');
  });
});

describe('audit', () => {
  it('should report clean games with their length', () => {
    const game = selectGame(loadGamesSync('multi-game.pgn'));
    expect(formatAuditReport(auditReplay(game), game, 0)).toBe(
      'Game 1: Alpha vs Beta - Rapid Open: clean (7 half-moves)',
    );
  });

  it('should list each finding under its game', () => {
    const game = loadGameSync('en-passant.pgn');
    const report = auditReplay(game);

    expect(formatAuditReport(report, game, 1).split('\n')).toEqual([
      'Game 2: Smith vs Jones - En Passant Example: 1 finding',
      '  3. exf6 [mismatch] Board differs from the rules reference on f5',
    ]);
  });

  it('should mark Black moves with three dots', () => {
    expect(
      formatFinding({
        kind: 'unresolved',
        ply: 3,
        moveNumber: 2,
        side: 'black',
        san: 'Qz9',
        message: 'Unresolved black move "Qz9" (invalid-destination)',
      }),
    ).toBe('  2... Qz9 [unresolved] Unresolved black move "Qz9" (invalid-destination)');
  });
});

describe('input and output', () => {
  it('should decode UTF-8 and reject other bytes', () => {
    expect(decodeSource(new TextEncoder().encode('1. e4 *'), 'game.pgn')).toBe('1. e4 *');
    expect(() => decodeSource(new Uint8Array([0xff, 0xfe, 0x31]), 'game.pgn')).toThrow(
      UnreadableSourceError,
    );
  });

  it('should decode piped bytes split across chunks', async () => {
    const bytes = Buffer.from('[White "Müller"]\n\n1. e4 *', 'utf-8');
    const split = bytes.indexOf(0xc3) + 1;
    const stream = Readable.from([bytes.subarray(0, split), bytes.subarray(split)]);

    expect(await readStream(stream, 'stdin')).toBe('[White "Müller"]\n\n1. e4 *');
  });

  it('should reject piped bytes that are not UTF-8', async () => {
    const stream = Readable.from([Buffer.from([0x31, 0x2e, 0xff])]);

    await expect(readStream(stream, 'stdin')).rejects.toThrow(UnreadableSourceError);
  });

  it('should read an input file', async () => {
    expect(await readInput(getFixturePath('opening.pgn'))).toBe(loadPgnSync('opening.pgn'));
  });

  it('should reject a missing input file', async () => {
    await expect(readInput(path.join(os.tmpdir(), 'pgnreplay-missing.pgn'))).rejects.toThrow(
      InputError,
    );
  });

  it('should round-trip a file through readInput and writeOutput', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pgnreplay-'));
    const file = path.join(dir, 'out.pgn');
    try {
      writeOutput('1. e4 e5 *', file);
      expect(await readInput(file)).toBe('1. e4 e5 *\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
