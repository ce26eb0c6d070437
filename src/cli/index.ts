/**
 * CLI Module
 *
 * Exports for the CLI argument parsing module
 */

export { ArgumentParser } from './arg-parser';
export { ArgumentRegistry } from './argument-registry';
export type { ArgumentSpec, RegistrationOutcome } from './argument-registry';
export { classifyArguments } from './classify';
export type { Classification } from './classify';
export { getHelpText, getVersionText, getUnknownArgumentText, formatOptionRows } from './help';
export {
  HELP_FLAGS,
  VERSION_FLAGS,
  isHelpFlag,
  isVersionFlag,
  isReservedFlag,
} from './reserved-flags';
export type { HelpFlag, VersionFlag, ReservedFlag } from './reserved-flags';
export type { HelpRow, HelpSection, HelpScreen } from './types';
