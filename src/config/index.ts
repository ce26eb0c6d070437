/**
 * Config module - parser option resolution
 */

export type { HelpConfig, ParserSettings, ParserOptions, ResolvedParserOptions } from './parser-options';
export {
  ParserConfigError,
  validateParserSettings,
  resolveParserOptions,
} from './parser-options';
