/**
 * CLI Types
 *
 * Type definitions for help screen rendering
 */

import type { HelpConfig } from '../config/parser-options';

/** One aligned line of the options table */
export interface HelpRow {
  label: string;
  description: string;
}

/** Extra titled block appended after the options table */
export interface HelpSection {
  title: string;
  content: string;
}

/** Everything the help screen is rendered from */
export interface HelpScreen {
  help: HelpConfig;
  rows: HelpRow[];
  sections: HelpSection[];
}
