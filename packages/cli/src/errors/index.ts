/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  GameSelectionError,
  AuditFailedError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError } from './handler.js';
