/**
 * Usage text rendering: option tables, subcommand lists and usage lines.
 */

import { CLI_CONFIG } from '../config/defaults';
import { ArgumentSlot, LeafCommand, OptionDefault, OptionSpec, VARIADIC } from '../types/spec';
import { wrapText } from './wrap';

const INDENT = '  ';
const STACKED_INDENT = '      ';

/**
 * Format option flags, e.g. "-o", "--output" or "-o, --output"
 */
export function optionFlagText(option: OptionSpec): string {
  if (option.short && option.long) {
    return `-${option.short}, --${option.long}`;
  }
  if (option.long) {
    return `--${option.long}`;
  }
  return option.short ? `-${option.short}` : '';
}

function formatDefault(value: OptionDefault): string {
  return Array.isArray(value) ? value.join(',') : String(value);
}

export function optionHelpText(option: OptionSpec): string {
  if (option.default !== undefined && option.help.length > 0) {
    return `${option.help} [default: ${formatDefault(option.default)}]`;
  }
  return option.help;
}

/**
 * Width of the flag column: the longest flag text across all options.
 */
export function optionColumnWidth(options: readonly OptionSpec[]): number {
  return options.reduce((max, option) => Math.max(max, optionFlagText(option).length), 0);
}

/**
 * Usable line width for the given terminal width.
 * Wide terminals are capped, unknown or tiny ones fall back to the default.
 */
export function resolveLineWidth(columns: number | undefined): number {
  if (columns === undefined || columns < CLI_CONFIG.MIN_LINE_LENGTH) {
    return CLI_CONFIG.LINE_LENGTH;
  }
  return columns < CLI_CONFIG.LINE_LENGTH ? columns - 1 : CLI_CONFIG.LINE_LENGTH;
}

function formatOptionLine(option: OptionSpec, column: number, lineWidth: number): string {
  const flags = optionFlagText(option);
  const help = optionHelpText(option);

  if (help.length === 0) {
    return `${INDENT}${flags}\n`;
  }

  if (column < Math.floor(lineWidth / 2)) {
    const [head = '', ...tail] = wrapText(lineWidth - column - 3, help);
    const continuation = ' '.repeat(column + 3);
    const pad = ' '.repeat(column - flags.length + 1);
    return `${INDENT}${flags}${pad}${head}${tail.map((line) => `\n${continuation}${line}`).join('')}\n`;
  }

  const lines = wrapText(lineWidth - STACKED_INDENT.length, help);
  return `${INDENT}${flags}${lines.map((line) => `\n${STACKED_INDENT}${line}`).join('')}\n`;
}

/**
 * Two-column option table followed by a blank line. Help text sits beside the
 * flags when the flag column fits in half the line, and below them otherwise.
 */
export function renderOptionTable(options: readonly OptionSpec[], lineWidth: number): string {
  if (options.length === 0) {
    return '';
  }
  const column = optionColumnWidth(options) + 1;
  return `${options.map((option) => formatOptionLine(option, column, lineWidth)).join('')}\n`;
}

export function renderSubcommands(names: readonly string[]): string {
  if (names.length === 0) {
    return '';
  }
  return `Available subcommands: \n\n${names.map((name) => `${INDENT}${name}\n`).join('')}\n`;
}

export function renderCommandLine(script: string, commandPath: string): string {
  return `Usage: ${script} ${commandPath} [options]\n\n`;
}

export function renderFooter(script: string): string {
  return `For help on any individual command run \`${script} COMMAND -h\`\n`;
}

/**
 * "<name>" for each named slot, "[...]" for the variadic marker.
 */
export function argumentPlaceholders(slots: readonly ArgumentSlot[]): string[] {
  const variadicAt = slots.indexOf(VARIADIC);
  const named = variadicAt === -1 ? slots : slots.slice(0, variadicAt);
  const placeholders = named.map((slot) => `<${slot}>`);
  return variadicAt === -1 ? placeholders : [...placeholders, '[...]'];
}

/**
 * Usage scoped to a single leaf command
 */
export function renderCommandUsage(
  script: string,
  path: readonly string[],
  command: LeafCommand,
  lineWidth: number
): string {
  const commandLine = [...path, command.name, ...argumentPlaceholders(command.args)].join(' ');
  return renderCommandLine(script, commandLine) + renderOptionTable(command.options, lineWidth);
}

/**
 * Usage for the root of the tree or a collection within it. The placeholder
 * always follows the path after a space, so the root line carries two spaces
 * after the script name.
 */
export function renderUsage(
  script: string,
  path: readonly string[],
  options: readonly OptionSpec[],
  subcommands: readonly string[],
  lineWidth: number
): string {
  const commandLine = `${path.join(' ')} ${CLI_CONFIG.SCRIPT_PLACEHOLDER_PATH}`;
  return (
    renderCommandLine(script, commandLine) +
    renderOptionTable(options, lineWidth) +
    renderSubcommands(subcommands) +
    renderFooter(script)
  );
}
