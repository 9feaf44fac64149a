import { randomUUID } from 'node:crypto';

import type { Game, GameMetadata, MoveRecord } from '../index.js';

import { splitPgnGames } from './pgn-splitter.js';

/**
 * Game termination markers
 */
export const RESULT_TOKENS = ['1-0', '0-1', '1/2-1/2', '*'] as const;
export type ResultToken = (typeof RESULT_TOKENS)[number];

export function isResultToken(token: string): token is ResultToken {
  return RESULT_TOKENS.some((result) => result === token);
}

/**
 * Tag names kept in GameMetadata; any other tag is dropped
 */
const RECOGNIZED_TAGS = new Map<string, keyof GameMetadata>([
  ['Event', 'event'],
  ['Site', 'site'],
  ['Date', 'date'],
  ['Round', 'round'],
  ['White', 'white'],
  ['Black', 'black'],
  ['Result', 'result'],
]);

const TAG_LINE = /^\[([A-Za-z0-9_]+)\s+"((?:[^"\\]|\\.)*)"\s*\]$/;
const MOVE_NUMBER = /^(\d+)(\.+)(.*)$/;
const NAG = /^\$\d+$/;

/**
 * Metadata and moves of a single game span
 */
export interface ParsedGameText {
  metadata: GameMetadata;
  moves: MoveRecord[];
}

function unescapeTagValue(value: string): string {
  return value.replace(/\\(["\\])/g, '$1');
}

/**
 * Record a tag line's value when it is well-formed and recognized
 */
function readTagLine(line: string, metadata: GameMetadata): void {
  const match = TAG_LINE.exec(line);
  if (!match?.[1] || match[2] === undefined) {
    return;
  }
  const field = RECOGNIZED_TAGS.get(match[1]);
  if (field) {
    metadata[field] = unescapeTagValue(match[2]);
  }
}

/**
 * Drop brace comments, `;` rest-of-line comments and (possibly nested)
 * variations from move text in a single left-to-right scan. Inside braces a
 * `;` is comment text; outside them it runs to the end of the line.
 */
function stripCommentary(moveText: string): string {
  let out = '';
  let depth = 0;
  let i = 0;

  while (i < moveText.length) {
    const char = moveText.charAt(i);

    if (char === '{') {
      const end = moveText.indexOf('}', i + 1);
      i = end === -1 ? moveText.length : end + 1;
      out += ' ';
    } else if (char === ';') {
      const end = moveText.indexOf('\n', i + 1);
      i = end === -1 ? moveText.length : end;
    } else if (char === '(' || char === ')') {
      depth = char === '(' ? depth + 1 : Math.max(0, depth - 1);
      out += ' ';
      i++;
    } else {
      if (depth === 0) out += char;
      i++;
    }
  }

  return out;
}

export function renderMoveText(moveNumber: number, white?: string, black?: string): string {
  if (white === undefined) {
    return `${moveNumber}... ${black ?? ''}`.trimEnd();
  }
  return black === undefined ? `${moveNumber}. ${white}` : `${moveNumber}. ${white} ${black}`;
}

function createRecord(moveNumber: number, white?: string, black?: string): MoveRecord {
  const record: { moveNumber: number; white?: string; black?: string; text: string } = {
    moveNumber,
    text: renderMoveText(moveNumber, white, black),
  };
  if (white !== undefined) record.white = white;
  if (black !== undefined) record.black = black;
  return record;
}

/**
 * Walk move-text tokens and group them into numbered White/Black records
 */
export function parseMoveTokens(tokens: readonly string[]): MoveRecord[] {
  const moves: MoveRecord[] = [];
  let moveNumber = 1;
  let pendingWhite: string | undefined;
  let blackOnly = false;

  const flush = (): void => {
    if (pendingWhite !== undefined) {
      moves.push(createRecord(moveNumber, pendingWhite));
    }
    pendingWhite = undefined;
    blackOnly = false;
  };

  const takeMove = (token: string): void => {
    if (blackOnly) {
      moves.push(createRecord(moveNumber, undefined, token));
      moveNumber++;
      blackOnly = false;
    } else if (pendingWhite === undefined) {
      pendingWhite = token;
    } else {
      moves.push(createRecord(moveNumber, pendingWhite, token));
      moveNumber++;
      pendingWhite = undefined;
    }
  };

  for (const token of tokens) {
    if (!token || isResultToken(token) || NAG.test(token)) {
      continue;
    }

    if (/^\.+$/.test(token)) {
      // "1. ... e5": the White half is missing
      if (pendingWhite === undefined) blackOnly = true;
      continue;
    }

    const marker = MOVE_NUMBER.exec(token);
    if (marker?.[1] && marker[2]) {
      const number = parseInt(marker[1], 10);
      const continuesWithBlack = marker[2].length > 1;

      if (continuesWithBlack) {
        // "N..." right after White's move N just resumes the same record
        if (!(pendingWhite !== undefined && number === moveNumber)) {
          flush();
          moveNumber = number;
          blackOnly = true;
        }
      } else {
        flush();
        moveNumber = number;
      }

      if (marker[3]) takeMove(marker[3]);
      continue;
    }

    takeMove(token);
  }

  flush();
  return moves;
}

/**
 * Parse one game's text into metadata and move records.
 *
 * Best effort: unknown or malformed tag lines are skipped, and a game whose
 * move text cannot be read still yields its metadata.
 */
export function parseGameText(text: string): ParsedGameText {
  const metadata: GameMetadata = {};
  const moveLines: string[] = [];

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('%')) continue;

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      readTagLine(trimmed, metadata);
    } else {
      moveLines.push(trimmed);
    }
  }

  const tokens = stripCommentary(moveLines.join('\n')).split(/\s+/);
  return { metadata, moves: parseMoveTokens(tokens) };
}

/**
 * Parse text holding any number of games
 *
 * @param pgnString - raw PGN content, one or more games
 * @returns one Game per game span, each with a freshly generated id
 */
export function parsePgn(pgnString: string): Game[] {
  return splitPgnGames(pgnString).map((raw) => {
    const { metadata, moves } = parseGameText(raw);
    return { id: randomUUID(), metadata, moves, raw };
  });
}
export const loadText = parsePgn;
