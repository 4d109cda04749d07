/**
 * JSON logging with secret redaction
 *
 * Security requirements:
 * - Never log tokens or generated passwords in plaintext
 * - Redact sensitive headers (Authorization)
 * - Support structured JSON logging for CI/automation
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Structured fields (logger fields merged with call context) */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
}

/**
 * Line sink, console by default
 */
export type LogSink = (level: LogLevel, line: string) => void;

// =============================================================================
// Constants
// =============================================================================

const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Generic secrets
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
  /token[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Object keys (lower-cased) whose values are always redacted
 */
const SENSITIVE_KEYS = new Set([
  'authorization',
  'password',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'credentials',
  'private_key',
  'privatekey',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_REDACT_DEPTH = 10;

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('abcd1234efgh5678') // 'abcd...5678'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values anywhere inside a JSON-like value
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_REDACT_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  if (value !== null && typeof value === 'object') {
    return redactRecord(Object.fromEntries(Object.entries(value)), depth + 1);
  }
  return value;
}

/**
 * Redact a record of structured fields
 */
export function redactRecord(
  record: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = redactValue(value, depth);
    } else if (typeof value === 'string' && value.length > 0) {
      result[key] = redactString(value);
    } else if (value !== null && value !== undefined) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = value;
    }
  }
  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      // stdout is reserved for command results
      console.error(line);
  }
};

/**
 * Secure logger with JSON output, structured fields and secret redaction
 */
export class ApiLogger {
  private readonly config: Required<LoggerConfig>;

  constructor(
    config: LoggerConfig = {},
    private readonly fields: Record<string, unknown> = {},
    private readonly sink: LogSink = consoleSink
  ) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.fields, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactRecord(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  format(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.sink(level, this.format(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(method: string, url: string, headers?: Record<string, string>): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: headers ? redactRecord(headers) : undefined,
    });
  }

  /**
   * Log an HTTP response; failures are logged at warn
   */
  response(status: number, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
      status,
      durationMs,
    });
  }

  /**
   * Create a child logger that adds fields to every entry
   */
  child(fields: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.fields, ...fields }, this.sink);
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

/**
 * Default logger instance
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.SCF_LOG_LEVEL),
  json: process.env.SCF_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}, sink?: LogSink): ApiLogger {
  return new ApiLogger(config, {}, sink);
}
