/**
 * Shared types for the progress reporter
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Command phases shown with a spinner
 */
export type CommandPhase = 'loading' | 'auditing' | 'writing';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<CommandPhase, string> = {
  loading: 'Loading PGN',
  auditing: 'Auditing replay',
  writing: 'Writing output',
};

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}
