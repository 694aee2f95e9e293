/**
 * Structured logging utility
 *
 * Features:
 * - Sensitive data filtering (sanitize)
 * - Log level and format control via RC_LOG_LEVEL / RC_LOG_FORMAT
 * - Request ID generation
 *
 * @example
 * ```typescript
 * const logger = createLogger('config-store');
 * logger.debug('load:start');
 *
 * const log = logger.withContext({ source: 'cli', requestId: generateRequestId() });
 * log.info('submission:applied', { rules: 2 });
 * ```
 */

import { randomUUID } from 'crypto';
import { getLogConfig, type LogLevel } from './env';

export type { LogLevel };

// ============================================================
// Type Definitions
// ============================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  module: string;
  action: string;
  data?: Record<string, unknown>;
  timestamp: string;
  source?: string;
  requestId?: string;
}

/**
 * Logger context
 */
export interface LoggerContext {
  /** Host surface that triggered the action (e.g. 'cli') */
  source?: string;
  requestId?: string;
}

/**
 * Logger instance type
 */
export interface Logger {
  debug: (action: string, data?: Record<string, unknown>) => void;
  info: (action: string, data?: Record<string, unknown>) => void;
  warn: (action: string, data?: Record<string, unknown>) => void;
  error: (action: string, data?: Record<string, unknown>) => void;
  /** Generate context-attached logger */
  withContext: (context: LoggerContext) => Logger;
}

// ============================================================
// Sensitive Data Filtering
// ============================================================

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Bearer token
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi, replacement: 'Bearer [REDACTED]' },
  // Password related
  { pattern: /(password|passwd|pwd)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
  // Token/secret related
  { pattern: /(token|secret|api_key|apikey|auth)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
  // Authorization header
  { pattern: /Authorization:\s*\S+/gi, replacement: 'Authorization: [REDACTED]' },
];

const SENSITIVE_KEY_PATTERN = /password|secret|token|key|auth/i;

/**
 * Sanitize value (mask sensitive data)
 */
function sanitize(value: unknown): unknown {
  if (typeof value === 'string') {
    let sanitized = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (typeof value === 'object' && value !== null) {
    if (Array.isArray(value)) {
      return value.map(sanitize);
    }
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (SENSITIVE_KEY_PATTERN.test(k)) {
        result[k] = '[REDACTED]';
      } else {
        result[k] = sanitize(v);
      }
    }
    return result;
  }

  return value;
}

/**
 * Sanitize a log data record, keeping its record shape
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = SENSITIVE_KEY_PATTERN.test(k) ? '[REDACTED]' : sanitize(v);
  }
  return result;
}

// ============================================================
// Log Level Control
// ============================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================
// Log Output
// ============================================================

/**
 * Format log entry
 */
function formatLogEntry(entry: LogEntry, format: 'json' | 'text'): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, module, action, data, source, requestId } = entry;
  const sourceStr = source ? ` [${source}]` : '';
  const requestIdStr = requestId ? ` (${requestId.slice(0, 8)})` : '';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';

  return `[${timestamp}] [${level.toUpperCase()}] [${module}]${sourceStr}${requestIdStr} ${action}${dataStr}`;
}

/**
 * Execute log output
 */
function log(
  level: LogLevel,
  module: string,
  action: string,
  data?: Record<string, unknown>,
  context?: LoggerContext
): void {
  const config = getLogConfig();
  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
    return;
  }

  const sanitizedData = data ? sanitizeData(data) : undefined;

  const entry: LogEntry = {
    level,
    module,
    action,
    timestamp: new Date().toISOString(),
    ...context,
    ...(sanitizedData && { data: sanitizedData }),
  };

  const formatted = formatLogEntry(entry, config.format);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

// ============================================================
// Request ID Generation
// ============================================================

/**
 * Generate request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

// ============================================================
// Logger Factory
// ============================================================

/**
 * Create module-specific logger
 *
 * @param module - Module name (e.g., 'config-store', 'db-migrations')
 */
export function createLogger(module: string): Logger {
  const createLoggerWithContext = (context?: LoggerContext): Logger => ({
    debug: (action, data) => log('debug', module, action, data, context),
    info: (action, data) => log('info', module, action, data, context),
    warn: (action, data) => log('warn', module, action, data, context),
    error: (action, data) => log('error', module, action, data, context),
    withContext: (newContext) => createLoggerWithContext({ ...context, ...newContext }),
  });

  return createLoggerWithContext();
}
