/**
 * Console Logger implementation
 * Writes every event to stderr so stdout stays reserved for help text
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
} from '../types/logger';

export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  // Shared with children so a parent sees what its children logged
  private readonly events: LogEvent[];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}, sink: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'warn';
    this.events = sink;
    this.options = {
      includeTimestamp: false,
      jsonOutput: false,
      ...options,
    };
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options, this.events);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: { ...this.context, ...metadata },
    };

    this.events.push(event);

    if (this.options.jsonOutput) {
      console.error(JSON.stringify(event));
    } else {
      this.outputPretty(event);
    }
  }

  private outputPretty(event: LogEvent): void {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    // Event type (if not a basic level)
    if (!['debug', 'info', 'warn', 'error'].includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { program, argument } = event.metadata;
    const metaParts: string[] = [];
    if (program) metaParts.push(`program=${program}`);
    if (argument !== undefined) metaParts.push(`argument=${argument}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    const line = parts.join(' ');

    if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '🔍';
      case 'info':
        return 'ℹ️';
      case 'warn':
        return '⚠️';
      case 'error':
        return '❌';
      default:
        return '•';
    }
  }
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
