/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types emitted by the parser
 */
export type LogEventType =
  // Registration
  | 'argument_registered'
  | 'argument_replaced'
  | 'help_section_added'
  // Classification
  | 'arguments_classified'
  | 'unknown_argument'
  // Rendering
  | 'help_rendered'
  | 'version_rendered'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Display name of the program whose arguments are parsed */
  program?: string;
  /** Argument token the event refers to */
  argument?: string;
  [key: string]: unknown;
}

export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context metadata merged into all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all emitted events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
      return 'error';
    case 'warn':
    case 'argument_replaced':
      return 'warn';
    case 'info':
    case 'unknown_argument':
      return 'info';
    default:
      return 'debug';
  }
}
