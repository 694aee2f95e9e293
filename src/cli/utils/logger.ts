/**
 * CLI Logger with colored output
 */

export interface LoggerOptions {
  /** Enable verbose/debug output */
  verbose?: boolean;
}

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

/**
 * CLI Logger with colored output
 */
export class CLILogger {
  private verbose: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  /**
   * Log info message
   */
  info(message: string): void {
    console.log(`${colors.blue}[INFO]${colors.reset} ${message}`);
  }

  /**
   * Log success message with checkmark
   */
  success(message: string): void {
    console.log(`${colors.green}[✓]${colors.reset} ${message}`);
  }

  /**
   * Log warning message
   */
  warn(message: string): void {
    console.log(`${colors.yellow}[WARN]${colors.reset} ${message}`);
  }

  /**
   * Log error message to stderr
   */
  error(message: string): void {
    console.error(`${colors.red}[ERROR]${colors.reset} ${message}`);
  }

  /**
   * Log debug message (only when verbose is enabled)
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${colors.gray}[DEBUG]${colors.reset} ${message}`);
    }
  }
}
