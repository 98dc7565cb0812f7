/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Environment-based configuration
 * - Sensitive data sanitization
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test';

/**
 * Pino configuration options
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // JSON in production and tests, pretty print in development
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

/**
 * The slice of a logger that components receive through their constructors.
 * Any pino logger satisfies it; tests pass plain spies.
 */
export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

export type LogLayer = 'cache' | 'rag' | 'llm' | 'config';

/**
 * Create a child logger for a specific layer and service
 */
export function createLayerLogger(layer: LogLayer, service?: string): Logger {
  return logger.child(service ? { layer, service } : { layer });
}

// =============================================================================
// Sanitization Utilities
// =============================================================================

/**
 * Maximum length for text content in logs
 */
const MAX_TEXT_LENGTH = 200;

/**
 * Patterns for detecting sensitive data
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9]{20,}/g, // OpenAI API keys
  /rediss?:\/\/[^@\s]*@/g, // Redis URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /password[=:]\s*["']?[^"'\s]+/gi, // Password values
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi, // API key values
];

/**
 * Sanitize a string by redacting sensitive patterns
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

/**
 * Render an unknown thrown value as a log-safe message.
 */
export function describeError(error: unknown): string {
  return sanitizeString(error instanceof Error ? error.message : String(error));
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, this.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = this.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  /**
   * Get total elapsed time
   */
  elapsed(): number {
    return this.now() - this.startTime;
  }

  /**
   * Get all durations as an object
   */
  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }
}
