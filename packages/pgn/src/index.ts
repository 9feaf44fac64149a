/**
 * @pgnreplay/pgn - PGN ingestion and board replay
 *
 * This package handles:
 * - Splitting multi-game PGN text into games
 * - Tag and move-text parsing
 * - Replaying algebraic moves on a board, ply by ply
 * - Move-context and full PGN rendering
 */

export const VERSION = '0.1.0';

/**
 * Game metadata from PGN tags
 */
export interface GameMetadata {
  event?: string;
  site?: string;
  date?: string;
  round?: string;
  white?: string;
  black?: string;
  /** One of 1-0, 0-1, 1/2-1/2 or * in well-formed input */
  result?: string;
}

/**
 * One numbered move: White's half, Black's reply, or both
 */
export interface MoveRecord {
  /** 1-based */
  readonly moveNumber: number;
  /** Absent when the game text starts with "N..." */
  readonly white?: string;
  /** Absent when the game ends on White's move */
  readonly black?: string;
  /** Display form: "N. w b", "N. w" or "N... b" */
  readonly text: string;
  /** Reserved; the parser never sets it */
  readonly comment?: string;
}

/**
 * A parsed game
 */
export interface Game {
  /** Generated at parse time */
  readonly id: string;
  readonly metadata: Readonly<GameMetadata>;
  readonly moves: readonly MoveRecord[];
  /** The game's span of the source text */
  readonly raw: string;
}

// Parsing
export { splitPgnGames, normalizeLineEndings } from './parser/pgn-splitter.js';
export {
  parsePgn,
  loadText,
  parseGameText,
  parseMoveTokens,
  isResultToken,
  RESULT_TOKENS,
} from './parser/pgn-parser.js';
export type { ParsedGameText, ResultToken } from './parser/pgn-parser.js';
export { gameTitle, gameSummary } from './parser/game-labels.js';

// Notation
export {
  applySan,
  cleanToken,
  castlingSide,
  parseSanToken,
  findSourceSquare,
} from './notation/notation-resolver.js';
export type {
  DisambiguationMode,
  ResolveOptions,
  CastlingSide,
  MoveHighlight,
  ResolvedMove,
  MoveOutcome,
  SanToken,
} from './notation/notation-resolver.js';

// Replay
export { PgnReplayEngine, finalPly, halfMoveAt } from './replay/replay-engine.js';
export type { GameState, Position, ReplayOptions } from './replay/replay-engine.js';

// Rendering
export {
  serializeGame,
  serialize,
  renderMoveContext,
  renderTags,
  wrapMoveText,
  DEFAULT_MAX_LINE_LENGTH,
} from './renderer/pgn-renderer.js';
export type { RenderOptions, SerializableGame } from './renderer/pgn-renderer.js';

// Board model, visualization and audit
export * from './chess/index.js';

// Errors
export {
  UnreadableSourceError,
  MalformedTagError,
  UnresolvedMoveError,
  NotImplementedError,
  InvalidFenError,
  IllegalMoveError,
} from './errors.js';
export type { UnresolvedReason } from './errors.js';
