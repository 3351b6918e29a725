/**
 * cmdtree - Dispatcher
 *
 * Resolves an invocation against a script declaration and either displays
 * usage, help or version text, reports a fatal error, or runs the resolved
 * command's handler. Every path ends in a DispatchOutcome; nothing here exits
 * the process.
 */

import chalk from 'chalk';
import { Logger } from 'winston';
import { ConfigLoader } from '../config/config-loader';
import { CLI_CONFIG } from '../config/defaults';
import { createContext, invokeHandler } from '../lib/context';
import { HELP_OPTION, VERSION_OPTION, validateSpec } from '../lib/define';
import { matchCommand, splitTargets, subcommandNames } from '../lib/matcher';
import { renderCommandUsage, renderUsage, resolveLineWidth } from '../lib/usage';
import {
  ConfigLoaderFn,
  DispatchOutcome,
  MatchResult,
  OptionParser,
  OutputStream
} from '../types/dispatch';
import { LeafCommand, OptionSpec, ParsedOptions, ScriptSpec } from '../types/spec';
import {
  CmdtreeError,
  CommandSpecError,
  ConfigLoadError,
  formatConfigLoadFailure,
  formatOptionParseFailure
} from '../utils/error-handler';
import { createLogger } from '../utils/logger';
import { YargsOptionParser } from './yargs-parser';

export interface DispatcherOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  columns?: number;                    // Terminal width; read from stdout when omitted
  optionParser?: OptionParser;
  configLoader?: ConfigLoaderFn;
  logger?: Logger;
}

const TOP_LEVEL_OPTIONS: readonly OptionSpec[] = [HELP_OPTION, VERSION_OPTION];

export class Dispatcher {
  private readonly spec: ScriptSpec;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly columns: number | undefined;
  private readonly optionParser: OptionParser;
  private readonly configLoader: ConfigLoaderFn;
  private readonly logger: Logger;

  constructor(spec: ScriptSpec, options: DispatcherOptions = {}) {
    this.spec = spec;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.columns = options.columns ?? process.stdout.columns;
    this.optionParser = options.optionParser ?? new YargsOptionParser();
    this.configLoader = options.configLoader ?? ((filePath) => ConfigLoader.load(filePath));
    this.logger = options.logger ?? createLogger({ componentName: CLI_CONFIG.COMPONENT_NAME });

    const report = validateSpec(spec);
    for (const warning of report.warnings) {
      this.logger.debug(`Spec warning: ${warning}`);
    }
    if (report.errors.length > 0) {
      throw new CommandSpecError(report.errors);
    }
  }

  /**
   * Resolve and dispatch one invocation (argv without the node and script paths)
   */
  dispatch(argv: readonly string[]): DispatchOutcome {
    const { targets, rest } = splitTargets(argv);
    const match = matchCommand(this.spec.commands, targets);
    this.logger.debug(`Matched ${match.kind}`, { targets, path: match.path });

    switch (match.kind) {
      case 'resolved':
        return this.dispatchResolved(match, rest);
      case 'partial':
        if (match.node.kind === 'command') {
          return this.displayCommandUsage(match.path, match.node);
        }
        return this.dispatchTopLevel(match.path, rest);
      case 'no-match':
        return this.dispatchTopLevel(match.path, rest);
    }
  }

  private dispatchResolved(
    match: Extract<MatchResult, { kind: 'resolved' }>,
    rest: readonly string[]
  ): DispatchOutcome {
    const { command, bindings, path } = match;

    const parsed = this.optionParser.parse([HELP_OPTION, ...command.options], rest);
    if (!parsed.success) {
      return this.fatal(formatOptionParseFailure(parsed.error), parsed.error);
    }

    let options: ParsedOptions = parsed.options;
    if (this.spec.configFile !== undefined) {
      try {
        const entries = this.configLoader(this.spec.configFile);
        this.logger.debug(`Config overlay from ${this.spec.configFile}`, { keys: entries.map(([key]) => key) });
        options = ConfigLoader.overlay(options, entries);
      } catch (error) {
        const loadError = error instanceof CmdtreeError
          ? error
          : new ConfigLoadError(this.spec.configFile, error);
        return this.fatal(formatConfigLoadFailure(loadError), loadError);
      }
    }

    if (options.get(HELP_OPTION.name) === true) {
      return this.displayCommandUsage(path, command);
    }

    const context = createContext([...path, command.name], bindings, options);
    this.logger.debug(`Dispatching ${context.path.join(' ')}`);
    return { kind: 'dispatched', result: invokeHandler(command.handler, context), context };
  }

  private dispatchTopLevel(path: readonly string[], rest: readonly string[]): DispatchOutcome {
    const parsed = this.optionParser.parse(TOP_LEVEL_OPTIONS, rest);
    if (!parsed.success) {
      return this.fatal(formatOptionParseFailure(parsed.error), parsed.error);
    }

    if (parsed.options.get(VERSION_OPTION.name) === true) {
      const text = `${this.spec.script} ${this.spec.version}\n`;
      this.stdout.write(text);
      return { kind: 'version', text, exitCode: 0 };
    }

    // Only the root lists the universal options; a collection lists its children alone
    const text = renderUsage(
      this.spec.script,
      path,
      path.length === 0 ? TOP_LEVEL_OPTIONS : [],
      subcommandNames(this.spec.commands, path),
      this.lineWidth()
    );
    return this.display(text);
  }

  private displayCommandUsage(path: readonly string[], command: LeafCommand): DispatchOutcome {
    return this.display(renderCommandUsage(this.spec.script, path, command, this.lineWidth()));
  }

  private display(text: string): DispatchOutcome {
    this.stdout.write(text);
    return { kind: 'usage', text, exitCode: 0 };
  }

  private fatal(message: string, error: CmdtreeError): DispatchOutcome {
    this.logger.debug('Fatal dispatch error', { error: error.name });
    this.stderr.write(chalk.red(message));
    return { kind: 'fatal', message, error, exitCode: 1 };
  }

  private lineWidth(): number {
    return resolveLineWidth(this.columns);
  }
}
