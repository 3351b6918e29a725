/**
 * cmdtree - Process Entry
 *
 * Runs a dispatch against process.argv and turns terminal outcomes into
 * process exit codes.
 */

import chalk from 'chalk';
import { DispatchOutcome } from '../types/dispatch';
import { ScriptSpec } from '../types/spec';
import { Dispatcher, DispatcherOptions } from './dispatcher';

/**
 * Terminate the process with the given status
 */
export function halt(code: number): never {
  process.exit(code);
}

/**
 * Print a message and terminate. Status 0 prints to stdout, anything else to
 * stderr in red.
 */
export function haltWith(message: string, code: number = 1): never {
  const line = message.endsWith('\n') ? message : `${message}\n`;
  if (code === 0) {
    process.stdout.write(line);
  } else {
    process.stderr.write(chalk.red(line));
  }
  return halt(code);
}

/**
 * Dispatch an invocation for a script. Usage, version and fatal outcomes halt
 * the process; a dispatched handler's result is awaited and returned.
 */
export async function start(
  spec: ScriptSpec,
  argv: readonly string[] = process.argv.slice(2),
  options: DispatcherOptions = {}
): Promise<unknown> {
  const outcome: DispatchOutcome = new Dispatcher(spec, options).dispatch(argv);

  if (outcome.kind === 'dispatched') {
    return await outcome.result;
  }
  return halt(outcome.exitCode);
}
