/**
 * CLI Help Text
 *
 * Help, version and error text. Every function returns newline-terminated
 * text and writes nothing.
 */

import type { HelpConfig } from '../config/parser-options';
import { HelpRow, HelpScreen } from './types';

/** Gap between the longest label and its description */
const COLUMN_GAP = 2;

/**
 * Format option rows as an aligned two-column table
 */
export function formatOptionRows(rows: HelpRow[]): string[] {
  const width = Math.max(0, ...rows.map((row) => row.label.length)) + COLUMN_GAP;
  return rows.map((row) => `  ${row.label.padEnd(width)}${row.description}`);
}

/** Get the help screen text */
export function getHelpText(screen: HelpScreen): string {
  const { help, rows, sections } = screen;
  const lines: string[] = [help.usage, '', help.name, help.description];

  if (rows.length > 0) {
    lines.push('', 'Options:', ...formatOptionRows(rows));
  }

  for (const section of sections) {
    lines.push('', section.title, section.content);
  }

  lines.push('', help.version);
  return lines.join('\n') + '\n';
}

/** Get the version screen text */
export function getVersionText(help: HelpConfig): string {
  return `${help.name} version: ${help.version}\n`;
}

/**
 * Get the message for an unrecognized argument
 * @param suggestHelp - add the "Try ... --help" hint (only when --help is recognized)
 */
export function getUnknownArgumentText(argument: string, program: string, suggestHelp: boolean): string {
  let text = `Error: Unknown option: '${argument}'\n`;
  if (suggestHelp) {
    text += `Try '${program} --help' for more information.\n`;
  }
  return text;
}
