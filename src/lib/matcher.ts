/**
 * Command tree matching
 *
 * Resolves the leading positional tokens of an invocation against the declared
 * command tree. Siblings are scanned in declaration order and the first one
 * whose name equals the token wins, so a later sibling with a duplicate name
 * is never reachable.
 */

import { MatchResult, SplitTargets } from '../types/dispatch';
import {
  ArgumentSlot,
  BindingValue,
  Bindings,
  CommandCollection,
  CommandSpec,
  VARIADIC,
  VARIADIC_BINDING
} from '../types/spec';

/**
 * Split argv at the first flag-like token.
 */
export function splitTargets(argv: readonly string[]): SplitTargets {
  const flagAt = argv.findIndex((token) => token.startsWith('-'));
  if (flagAt === -1) {
    return { targets: [...argv], rest: [] };
  }
  return { targets: argv.slice(0, flagAt), rest: argv.slice(flagAt) };
}

/**
 * Bind positional tokens to argument slots. Returns undefined when a named slot
 * has no token left, or tokens remain after the last slot and there is no
 * variadic marker to take them.
 */
export function bindArguments(
  slots: readonly ArgumentSlot[],
  tokens: readonly string[]
): Bindings | undefined {
  const bindings = new Map<string, BindingValue>();

  for (const [index, slot] of slots.entries()) {
    if (slot === VARIADIC) {
      bindings.set(VARIADIC_BINDING, tokens.slice(index));
      return bindings;
    }
    const token = tokens[index];
    if (token === undefined) {
      return undefined;
    }
    bindings.set(slot, token);
  }

  return tokens.length === slots.length ? bindings : undefined;
}

function matchLevel(
  commands: readonly CommandSpec[],
  targets: readonly string[],
  path: readonly string[],
  parent: CommandCollection | undefined
): MatchResult {
  const [target, ...rest] = targets;
  const node = target === undefined ? undefined : commands.find((command) => command.name === target);

  if (!node) {
    return parent ? { kind: 'partial', node: parent, path } : { kind: 'no-match', path };
  }

  if (node.kind === 'collection') {
    return matchLevel(node.children, rest, [...path, node.name], node);
  }

  const bindings = bindArguments(node.args, rest);
  return bindings
    ? { kind: 'resolved', command: node, bindings, path }
    : { kind: 'partial', node, path };
}

/**
 * Walk the command tree with the given positional tokens.
 */
export function matchCommand(commands: readonly CommandSpec[], targets: readonly string[]): MatchResult {
  return matchLevel(commands, targets, [], undefined);
}

/**
 * Names of the children of the collection at `path`, or of the root commands
 * when `path` is empty or does not lead to a collection. Shadowed duplicates
 * are listed once.
 */
export function subcommandNames(commands: readonly CommandSpec[], path: readonly string[]): string[] {
  let level = commands;
  for (const segment of path) {
    const node = level.find((command) => command.name === segment);
    if (!node || node.kind !== 'collection') {
      return uniqueNames(commands);
    }
    level = node.children;
  }
  return uniqueNames(level);
}

function uniqueNames(commands: readonly CommandSpec[]): string[] {
  return [...new Set(commands.map((command) => command.name))];
}
