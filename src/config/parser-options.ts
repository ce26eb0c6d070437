/**
 * Parser Options
 * Help metadata and switches supplied at construction, validated with Zod
 */

import { z } from 'zod';
import { Logger } from '../types/logger';
import { OutputWriter } from '../types/output-writer';
import { Result, ok, err } from '../types/result';
import { createConsoleLogger } from '../logging/console-logger';
import { createStdoutOutput, createStderrOutput } from '../io/stream-output';

// Unrecognized keys are stripped, not rejected
const helpConfigSchema = z.object({
  /** Usage banner, printed first and as given */
  usage: z.string().default(''),
  /** Program display name */
  name: z.string().default(''),
  /** One-line program description */
  description: z.string().default(''),
  /** Version string */
  version: z.string().default(''),
});

const parserSettingsSchema = z.object({
  help: helpConfigSchema.default({}),
  defaultArguments: z.boolean().default(true),
});

/** Help screen metadata; every field defaults to an empty string */
export type HelpConfig = z.infer<typeof helpConfigSchema>;

/** Validated, serializable part of the options */
export type ParserSettings = z.infer<typeof parserSettingsSchema>;

/**
 * Options accepted by the ArgumentParser constructor
 */
export interface ParserOptions {
  help?: Partial<HelpConfig>;
  /** Recognize the built-in --help/-h and --version/-v flags (default: true) */
  defaultArguments?: boolean;
  /** Defaults to a ConsoleLogger that only reports warnings */
  logger?: Logger;
  /** Where help and version screens go (default: process.stdout) */
  stdout?: OutputWriter;
  /** Where error messages go (default: process.stderr) */
  stderr?: OutputWriter;
}

export interface ResolvedParserOptions extends ParserSettings {
  logger: Logger;
  stdout: OutputWriter;
  stderr: OutputWriter;
}

/**
 * Thrown when options fail validation. Only reachable from untyped callers.
 */
export class ParserConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid parser options: ${issues.join('; ')}`);
    this.name = 'ParserConfigError';
  }
}

/**
 * Validate the serializable part of the parser options
 */
export function validateParserSettings(data: unknown): Result<ParserSettings, string[]> {
  const result = parserSettingsSchema.safeParse(data);
  if (result.success) {
    return ok(result.data);
  }
  return err(result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`));
}

/**
 * Fill in defaults for every option
 */
export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  const settings = validateParserSettings({
    help: options.help,
    defaultArguments: options.defaultArguments,
  });
  if (!settings.ok) {
    throw new ParserConfigError(settings.error);
  }

  return {
    ...settings.value,
    logger: options.logger ?? createConsoleLogger(),
    stdout: options.stdout ?? createStdoutOutput(),
    stderr: options.stderr ?? createStderrOutput(),
  };
}
