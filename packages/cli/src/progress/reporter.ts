/**
 * Progress reporter with ora spinners.
 *
 * Everything goes to stderr; stdout carries the command's own output.
 */

import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import { formatDuration } from './formatters.js';
import {
  type ColorFunctions,
  type CommandPhase,
  type ProgressReporterOptions,
  PHASE_NAMES,
} from './types.js';

export type { CommandPhase, ProgressReporterOptions } from './types.js';

/**
 * Build colour helpers, or identity functions when colour is off
 */
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Start a phase with a spinner
   */
  startPhase(phase: CommandPhase, detail?: string): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    if (this.spinner) {
      this.spinner.stop();
    }

    const text = detail ? `${PHASE_NAMES[phase]} ${this.c.dim(detail)}` : PHASE_NAMES[phase];
    const oraOptions: { text: string; color?: Color } = { text };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: CommandPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';
    const line = `${PHASE_NAMES[phase]}${detailStr}${durationStr}`;

    if (this.spinner) {
      this.spinner.succeed(line);
      this.spinner = null;
    } else {
      console.error(`${this.c.green('✓')} ${line}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: CommandPhase, error: string): void {
    if (this.silent) return;

    const line = `${PHASE_NAMES[phase]}: ${error}`;
    if (this.spinner) {
      this.spinner.fail(line);
      this.spinner = null;
    } else {
      console.error(`${this.c.red('✗')} ${line}`);
    }
  }

  /**
   * Print a warning, pausing the spinner around it
   */
  warn(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      console.error(this.c.yellow(`⚠ ${message}`));
      this.spinner.start(currentText);
    } else {
      console.error(this.c.yellow(`⚠ ${message}`));
    }
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.error(this.c.green(`✓ ${message}`));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    console.error(this.c.red(`✗ ${message}`));
  }

  /**
   * Print output file location
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    console.error(`Output written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
