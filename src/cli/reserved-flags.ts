/**
 * Built-in flags recognized without registration
 */

export const HELP_FLAGS = ['--help', '-h'] as const;
export const VERSION_FLAGS = ['--version', '-v'] as const;

export type HelpFlag = (typeof HELP_FLAGS)[number];
export type VersionFlag = (typeof VERSION_FLAGS)[number];
export type ReservedFlag = HelpFlag | VersionFlag;

const RESERVED_FLAGS: ReadonlySet<string> = new Set<string>([...HELP_FLAGS, ...VERSION_FLAGS]);

export function isHelpFlag(token: string): token is HelpFlag {
  return token === '--help' || token === '-h';
}

export function isVersionFlag(token: string): token is VersionFlag {
  return token === '--version' || token === '-v';
}

export function isReservedFlag(token: string): token is ReservedFlag {
  return RESERVED_FLAGS.has(token);
}

/** Help screen rows for the built-in flags, listed after registered arguments */
export const RESERVED_FLAG_ROWS: ReadonlyArray<{ label: string; description: string }> = [
  { label: '-h, --help', description: 'Show this help message' },
  { label: '-v, --version', description: 'Show version number' },
];
