/**
 * Types module - shared interfaces and types
 */

// Result type for validation outcomes
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription, isSuccessExitCode } from './exit-codes';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { compareLogLevels, shouldLog, getEventLevel } from './logger';

// Output writer interface
export type { OutputWriter } from './output-writer';
