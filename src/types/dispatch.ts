/**
 * cmdtree - Dispatch Types
 *
 * Results produced while resolving and dispatching a single invocation.
 */

import {
  Bindings,
  CommandContext,
  CommandSpec,
  ConfigEntry,
  LeafCommand,
  OptionSpec,
  ParsedOptions
} from './spec';
import { CmdtreeError } from '../utils/error-handler';

// ===== Matching =====

export type MatchResult =
  | { kind: 'resolved'; command: LeafCommand; bindings: Bindings; path: readonly string[] }
  | { kind: 'partial'; node: CommandSpec; path: readonly string[] }
  | { kind: 'no-match'; path: readonly string[] };

export interface SplitTargets {
  targets: string[];                   // Leading tokens up to the first flag
  rest: string[];                      // First flag and everything after it
}

// ===== Option Delegate =====

export type OptionParseResult =
  | { success: true; options: ParsedOptions; extra: string[] }
  | { success: false; error: CmdtreeError };

export interface OptionParser {
  parse(specs: readonly OptionSpec[], tokens: readonly string[]): OptionParseResult;
}

export type ConfigLoaderFn = (filePath: string) => ConfigEntry[];

// ===== Outcomes =====

export type DispatchOutcome =
  | { kind: 'usage'; text: string; exitCode: 0 }
  | { kind: 'version'; text: string; exitCode: 0 }
  | { kind: 'dispatched'; result: unknown; context: CommandContext }
  | { kind: 'fatal'; message: string; error: CmdtreeError; exitCode: 1 };

export interface OutputStream {
  write(chunk: string): unknown;
}
