/**
 * Configuration schema types
 */

/**
 * How an ambiguous move's source square is chosen
 */
export type Disambiguation = 'san' | 'geometric';

/**
 * Board orientation
 */
export type Perspective = 'white' | 'black';

/**
 * Replay configuration
 */
export interface ReplayConfigSchema {
  /** san: honour SAN hints, clear paths and pawn direction; geometric: proximity only */
  disambiguation: Disambiguation;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Wrap exported move text at this length (0 disables wrapping) */
  maxLineLength: number;
  /** Side shown at the bottom of rendered boards */
  perspective: Perspective;
}

/**
 * Move-context configuration
 */
export interface ContextConfigSchema {
  /** Append the ASCII board to the move context */
  includeBoard: boolean;
  /** Also list this many recent move records (0 = off) */
  recentMoves: number;
}

/**
 * Complete configuration
 */
export interface PgnReplayConfig {
  replay: ReplayConfigSchema;
  output: OutputConfigSchema;
  context: ContextConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Input PGN file path (undefined = stdin) */
  input?: string;
  /** Output file path (undefined = stdout) */
  output?: string;
  /** Path to config file */
  config?: string;
  /** Disambiguation mode; validated with the rest of the config */
  disambiguation?: string;
  /** Board orientation; validated with the rest of the config */
  perspective?: string;
  maxLineLength?: number;
  recentMoves?: number;
  /** false when --no-board is given */
  board?: boolean;
  /** 1-based game index */
  game?: number;
  /** Cursor to show (multiple of 0.5) */
  ply?: number;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
