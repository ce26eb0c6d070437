/**
 * Demo program showing the intended call sequence
 */

import { basename } from 'path';
import { ArgumentParser } from './cli/arg-parser';
import { ParserOptions } from './config/parser-options';
import { ExitCode } from './types/exit-codes';

/**
 * Run the demo against an argument vector whose index 0 is the program path
 */
export function runDemo(argv: readonly string[], options: Omit<ParserOptions, 'help'> = {}): ExitCode {
  const program = argv.length > 0 ? basename(argv[0]) : 'flagcheck-demo';
  const args = new ArgumentParser(argv, {
    ...options,
    help: {
      usage: `Usage: ${program} [OPTION]...`,
      name: 'Test App',
      description: 'This is a test description',
      version: 'v1.0',
    },
  });
  const stdout = options.stdout;
  const print = (line: string): void => {
    if (stdout) {
      stdout.write(line + '\n');
    } else {
      console.log(line);
    }
  };

  args.addHelpSection('EXAMPLES:', `  ${program} --print-stuff`);
  args.addArgument('--print-stuff', 'display "stuff"');
  args.addArgument('--print-args', 'display every argument passed');

  if (args.noArgumentsPassed()) {
    args.displayHelpScreen();
  } else if (args.defaultArgumentsPassed() || args.wrongArgumentsPassed()) {
    // pars() renders the built-in screens and reports unknown arguments
  } else {
    if (args.passed('--print-stuff')) {
      print('stuff');
    }
    if (args.passed('--print-args')) {
      print(args.argumentsPassed.slice(1).join(' '));
    }
  }

  return args.pars();
}
