/**
 * Process exit codes
 * The parser only ever settles on one of two terminal states.
 */

/**
 * Exit codes returned by ArgumentParser.pars()
 */
export const ExitCode = {
  /** No arguments, default arguments handled, or all arguments recognized */
  SUCCESS: 0,
  /** At least one argument was not recognized */
  UNKNOWN_ARGUMENT: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNKNOWN_ARGUMENT:
      return 'Unrecognized argument passed';
    default:
      return 'Unknown exit code';
  }
}

/**
 * Check if an exit code indicates success
 */
export function isSuccessExitCode(code: number): boolean {
  return code === ExitCode.SUCCESS;
}
