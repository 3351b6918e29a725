/**
 * Central defaults for cmdtree
 *
 * Constant values with environment variable overrides. Imported by the
 * dispatcher, the usage renderer and the logger.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'warn';
}

export const CLI_CONFIG = {
  COMPONENT_NAME: 'cmdtree',

  // Usage rendering
  LINE_LENGTH: 75,
  MIN_LINE_LENGTH: 20,
  SCRIPT_PLACEHOLDER_PATH: '<command> [<arg>]',

  // Logging
  LOG_LEVEL: parseLogLevel(process.env.CMDTREE_LOG_LEVEL),
  LOG_FILE: process.env.CMDTREE_LOG_FILE || undefined,

  // Universal option text
  HELP_TEXT: 'Print this help.',
  VERSION_TEXT: 'Print the version and exit.'
} as const;

export type { LogLevel };
