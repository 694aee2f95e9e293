/**
 * CLI Common Type Definitions
 */

export { getErrorMessage } from '../../lib/errors';

/**
 * Exit codes for CLI commands
 */
export enum ExitCode {
  SUCCESS = 0,
  NO_MATCH = 1,
  CONFIG_ERROR = 2,
  UNEXPECTED_ERROR = 99,
}

/**
 * Options shared by every command
 */
export interface DbOptions {
  /** Database path (overrides RC_DB_PATH) */
  db?: string;
}

/**
 * Options for show command
 */
export interface ShowOptions extends DbOptions {
  /** Print the configuration as JSON */
  json?: boolean;
}

/**
 * Options for apply command
 */
export interface ApplyOptions extends DbOptions {
  /** Print debug output */
  verbose?: boolean;
}

/**
 * Options for match command
 */
export type MatchOptions = DbOptions;
