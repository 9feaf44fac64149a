/**
 * Progress module exports
 */

export type { CommandPhase, ProgressReporterOptions } from './reporter.js';
export { ProgressReporter } from './reporter.js';
export {
  formatConfigDisplay,
  formatCursor,
  formatDuration,
  formatFileSize,
  pluralize,
} from './formatters.js';
