/**
 * Argument Classification
 *
 * A single pass over the captured vector. Index 0 holds the program name
 * and is never classified.
 */

export interface Classification {
  /** True when only the program-name slot is present, or the vector is empty */
  noArguments: boolean;
  /** Tokens after the program name, in input order */
  tokens: readonly string[];
  /** Tokens that are not recognized, in input order (duplicates kept) */
  unknown: readonly string[];
}

/**
 * Classify an argument vector against a recognizer
 */
export function classifyArguments(
  argv: readonly string[],
  isKnown: (token: string) => boolean
): Classification {
  const tokens = argv.slice(1);
  return {
    noArguments: argv.length <= 1,
    tokens,
    unknown: tokens.filter((token) => !isKnown(token)),
  };
}
