/**
 * flagcheck
 *
 * Registers command-line flags, checks the process arguments against them
 * and renders help/version screens.
 */

export {
  ArgumentParser,
  ArgumentRegistry,
  classifyArguments,
  getHelpText,
  getVersionText,
  getUnknownArgumentText,
  formatOptionRows,
  HELP_FLAGS,
  VERSION_FLAGS,
  isHelpFlag,
  isVersionFlag,
  isReservedFlag,
} from './cli';
export type {
  ArgumentSpec,
  RegistrationOutcome,
  Classification,
  HelpFlag,
  VersionFlag,
  ReservedFlag,
  HelpRow,
  HelpSection,
  HelpScreen,
} from './cli';

export { ParserConfigError, validateParserSettings, resolveParserOptions } from './config';
export type { HelpConfig, ParserSettings, ParserOptions, ResolvedParserOptions } from './config';

export { ExitCode, getExitCodeDescription, isSuccessExitCode, ok, err, isOk, isErr } from './types';
export type { Result, Ok, Err, Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions, OutputWriter } from './types';

export { ConsoleLogger, createConsoleLogger, BufferLogger, createBufferLogger } from './logging';
export { StreamOutput, createStdoutOutput, createStderrOutput, BufferOutput, createBufferOutput } from './io';
