/**
 * CLI Argument Parser
 *
 * Registers flags, classifies the captured argument vector against them
 * and renders the help, version and error screens.
 */

import { basename } from 'path';
import { ParserOptions, ResolvedParserOptions, HelpConfig, resolveParserOptions } from '../config/parser-options';
import { ExitCode } from '../types/exit-codes';
import { Logger } from '../types/logger';
import { ArgumentRegistry, ArgumentSpec } from './argument-registry';
import { Classification, classifyArguments } from './classify';
import { getHelpText, getUnknownArgumentText, getVersionText } from './help';
import { isHelpFlag, isReservedFlag, isVersionFlag, RESERVED_FLAG_ROWS } from './reserved-flags';
import { HelpRow, HelpSection } from './types';

/**
 * Argument parser bound to one argument vector.
 *
 * The vector is captured once and frozen, so every query within a run sees
 * the same input. Queries read the registry as it is at call time: finish
 * registering arguments before asking about them. Instances are not meant
 * to be shared between workers.
 *
 * @example
 * const args = ArgumentParser.fromProcess({
 *   help: { usage: 'Usage: demo [OPTION]...', name: 'Demo', version: 'v1.0' },
 * });
 * args.addArgument('--print-stuff', 'display "stuff"');
 *
 * if (args.noArgumentsPassed()) {
 *   args.displayHelpScreen();
 * } else if (!args.defaultArgumentsPassed() && !args.wrongArgumentsPassed()) {
 *   if (args.passed('--print-stuff')) console.log('stuff');
 * }
 *
 * process.exit(args.pars());
 */
export class ArgumentParser {
  /** Raw argument vector; index 0 is the program name */
  readonly argumentsPassed: readonly string[];

  /** Basename of the program slot, empty when the vector is empty */
  readonly programName: string;

  private readonly registry = new ArgumentRegistry();
  private readonly sections: HelpSection[] = [];
  private readonly options: ResolvedParserOptions;
  private readonly logger: Logger;

  constructor(argv: readonly string[], options: ParserOptions = {}) {
    this.argumentsPassed = Object.freeze([...argv]);
    this.programName = argv.length > 0 ? basename(argv[0]) : '';
    this.options = resolveParserOptions(options);
    this.logger = this.options.logger.child({ program: this.programName });
  }

  /**
   * Capture the current process's arguments. The node binary is dropped so
   * that index 0 is the script path.
   */
  static fromProcess(options?: ParserOptions): ArgumentParser {
    return new ArgumentParser(process.argv.slice(1), options);
  }

  get help(): Readonly<HelpConfig> {
    return this.options.help;
  }

  addArgument(name: string, description: string): void {
    const outcome = this.registry.register(name, description);
    if (outcome === 'replaced') {
      this.logger.event('argument_replaced', `Argument ${name} registered twice; description replaced`, {
        argument: name,
      });
    } else {
      this.logger.event('argument_registered', `Registered argument ${name}`, { argument: name });
    }
  }

  addHelpSection(title: string, content: string): void {
    this.sections.push({ title, content });
    this.logger.event('help_section_added', `Added help section ${title}`);
  }

  /** Registered arguments in registration order */
  registeredArguments(): ArgumentSpec[] {
    return this.registry.list();
  }

  /**
   * Whether a token is a registered argument or an enabled built-in flag
   */
  isRecognized(token: string): boolean {
    return this.registry.has(token) || (this.options.defaultArguments && isReservedFlag(token));
  }

  noArgumentsPassed(): boolean {
    return this.argumentsPassed.length <= 1;
  }

  /**
   * Whether the exact token was passed. The name does not need to be registered.
   */
  passed(name: string): boolean {
    return this.argumentsPassed.indexOf(name, 1) !== -1;
  }

  /**
   * Whether a built-in help or version flag was passed
   */
  defaultArgumentsPassed(): boolean {
    if (!this.options.defaultArguments) {
      return false;
    }
    return this.classify().tokens.some((token) => isHelpFlag(token) || isVersionFlag(token));
  }

  wrongArgumentsPassed(): boolean {
    return this.classify().unknown.length > 0;
  }

  /** Unrecognized tokens in input order */
  unknownArguments(): string[] {
    return [...this.classify().unknown];
  }

  renderHelp(): string {
    const rows: HelpRow[] = this.registry
      .list()
      .map((spec) => ({ label: spec.name, description: spec.description }));
    if (this.options.defaultArguments) {
      rows.push(...RESERVED_FLAG_ROWS);
    }
    return getHelpText({ help: this.options.help, rows, sections: [...this.sections] });
  }

  renderVersion(): string {
    return getVersionText(this.options.help);
  }

  displayHelpScreen(): void {
    this.options.stdout.write(this.renderHelp());
    this.logger.event('help_rendered', 'Displayed help screen');
  }

  displayVersionScreen(): void {
    this.options.stdout.write(this.renderVersion());
    this.logger.event('version_rendered', 'Displayed version screen');
  }

  /**
   * Report an unrecognized argument on stderr
   */
  displayErrorMessage(argument: string): void {
    this.options.stderr.write(
      getUnknownArgumentText(argument, this.programName, this.options.defaultArguments)
    );
  }

  /**
   * Settle the exit code for this run.
   *
   * Reports the first unknown argument, or shows the help/version screens
   * when their flags were passed. The caller decides whether to exit.
   */
  pars(): ExitCode {
    const classification = this.classify();
    this.logger.event('arguments_classified', `Classified ${classification.tokens.length} argument(s)`, {
      unknown: classification.unknown.length,
    });

    if (classification.noArguments) {
      return ExitCode.SUCCESS;
    }

    if (classification.unknown.length > 0) {
      const [first] = classification.unknown;
      this.logger.event('unknown_argument', `Unknown argument ${first}`, { argument: first });
      this.displayErrorMessage(first);
      return ExitCode.UNKNOWN_ARGUMENT;
    }

    if (this.options.defaultArguments) {
      if (classification.tokens.some(isHelpFlag)) {
        this.displayHelpScreen();
      }
      if (classification.tokens.some(isVersionFlag)) {
        this.displayVersionScreen();
      }
    }

    return ExitCode.SUCCESS;
  }

  private classify(): Classification {
    return classifyArguments(this.argumentsPassed, (token) => this.isRecognized(token));
  }
}
