/**
 * cmdtree - Public API
 */

export { Dispatcher } from './cli/dispatcher';
export type { DispatcherOptions } from './cli/dispatcher';
export { halt, haltWith, start } from './cli/start';
export { YargsOptionParser } from './cli/yargs-parser';
export { ConfigLoader } from './config/config-loader';
export { CLI_CONFIG } from './config/defaults';
export { createContext } from './lib/context';
export {
  HELP_OPTION,
  VERSION_OPTION,
  collection,
  command,
  option,
  validateSpec
} from './lib/define';
export type { CommandDefinition, SpecReport } from './lib/define';
export { bindArguments, matchCommand, splitTargets, subcommandNames } from './lib/matcher';
export {
  argumentPlaceholders,
  optionColumnWidth,
  optionFlagText,
  optionHelpText,
  renderCommandUsage,
  renderOptionTable,
  renderUsage,
  resolveLineWidth
} from './lib/usage';
export { wrapLines, wrapText } from './lib/wrap';
export * from './types/dispatch';
export * from './types/spec';
export {
  CmdtreeError,
  CommandSpecError,
  ConfigLoadError,
  OptionParseError,
  formatError
} from './utils/error-handler';
export { createLogger } from './utils/logger';
export type { LoggerOptions } from './utils/logger';
