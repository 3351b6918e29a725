/**
 * Builders and validation for script declarations.
 */

import { CLI_CONFIG } from '../config/defaults';
import {
  ArgumentSlot,
  CommandCollection,
  CommandHandler,
  CommandSpec,
  LeafCommand,
  OptionSpec,
  ScriptSpec,
  VARIADIC
} from '../types/spec';

export const HELP_OPTION: OptionSpec = {
  name: 'help',
  short: 'h',
  long: 'help',
  help: CLI_CONFIG.HELP_TEXT
};

export const VERSION_OPTION: OptionSpec = {
  name: 'version',
  short: 'v',
  long: 'version',
  help: CLI_CONFIG.VERSION_TEXT
};

export interface CommandDefinition {
  args?: readonly ArgumentSlot[];
  options?: readonly OptionSpec[];
  handler: CommandHandler;
}

export function command(name: string, definition: CommandDefinition): LeafCommand {
  return {
    kind: 'command',
    name,
    args: definition.args ?? [],
    handler: definition.handler,
    options: definition.options ?? []
  };
}

export function collection(name: string, children: readonly CommandSpec[]): CommandCollection {
  return { kind: 'collection', name, children };
}

export function option(name: string, spec: Omit<OptionSpec, 'name'>): OptionSpec {
  return { name, ...spec };
}

export interface SpecReport {
  errors: string[];
  warnings: string[];
}

function validateOptions(where: string, options: readonly OptionSpec[], report: SpecReport): void {
  for (const spec of options) {
    if (!spec.name) {
      report.errors.push(`${where}: option without a name`);
    }
    if (!spec.short && !spec.long) {
      report.errors.push(`${where}: option '${spec.name}' needs a short or long flag`);
    }
    if (spec.short !== undefined && spec.short.length !== 1) {
      report.errors.push(`${where}: option '${spec.name}' short flag must be a single character`);
    }
  }
}

function validateLevel(commands: readonly CommandSpec[], path: readonly string[], report: SpecReport): void {
  const seen = new Set<string>();

  for (const spec of commands) {
    const where = [...path, spec.name].join(' ') || '<root>';

    if (!spec.name) {
      report.errors.push(`${path.join(' ') || '<root>'}: command without a name`);
    } else if (spec.name.startsWith('-')) {
      report.errors.push(`${where}: command names cannot start with '-'`);
    }

    if (seen.has(spec.name)) {
      report.warnings.push(`${where}: shadowed by an earlier sibling with the same name`);
    }
    seen.add(spec.name);

    if (spec.kind === 'collection') {
      validateLevel(spec.children, [...path, spec.name], report);
      continue;
    }

    const variadicAt = spec.args.indexOf(VARIADIC);
    if (variadicAt !== -1 && variadicAt !== spec.args.length - 1) {
      report.errors.push(`${where}: '${VARIADIC}' must be the last argument slot`);
    }
    validateOptions(where, spec.options, report);
  }
}

/**
 * Check a script declaration. Errors make the tree undispatchable; warnings
 * flag declarations that are legal but probably unintended.
 */
export function validateSpec(spec: ScriptSpec): SpecReport {
  const report: SpecReport = { errors: [], warnings: [] };

  if (!spec.script) {
    report.errors.push("'script' must be a non-empty string");
  }
  validateLevel(spec.commands, [], report);

  return report;
}
