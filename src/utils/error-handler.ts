/**
 * cmdtree Error Handling Utilities
 *
 * Error classes raised by the toolkit and the formatters that turn them into
 * the fixed-format messages printed before the process halts.
 */

export class CmdtreeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by an option parser for unknown flags, missing values or values of the
 * wrong type.
 */
export class OptionParseError extends CmdtreeError {}

export class ConfigLoadError extends CmdtreeError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to load ${filePath}: ${describeError(cause)}`, { cause });
    this.filePath = filePath;
  }
}

/**
 * Raised when a script declaration cannot be dispatched at all.
 */
export class CommandSpecError extends CmdtreeError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid command specification:\n  ${problems.join('\n  ')}`);
    this.problems = problems;
  }
}

/**
 * Message of an Error, or the value itself for anything else thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Standard error formatter, prefixing an optional context
 */
export function formatError(error: unknown, context?: string): string {
  const errorMessage = describeError(error);
  return context ? `${context}: ${errorMessage}` : errorMessage;
}

/**
 * Wrap any thrown value into a CmdtreeError subclass, keeping the original as cause
 */
export function toCmdtreeError(
  error: unknown,
  ErrorClass: new (message: string, options?: { cause?: unknown }) => CmdtreeError
): CmdtreeError {
  if (error instanceof CmdtreeError) {
    return error;
  }
  return new ErrorClass(describeError(error), { cause: error });
}

/**
 * Fatal message for an option sequence the parser rejected
 */
export function formatOptionParseFailure(error: CmdtreeError): string {
  return `${formatError(error, 'Invalid option sequence given')}\n`;
}

/**
 * Fatal message for a config file that exists but cannot be loaded
 */
export function formatConfigLoadFailure(error: CmdtreeError): string {
  return `${error.message}\n`;
}
