/**
 * cmdtree - Command Specification Types
 *
 * Static declaration of a script: its command tree, positional slots and options.
 */

// ===== Argument Slots =====

/** Marker slot that captures every remaining positional token. */
export const VARIADIC = '...';

/** Identifier the variadic capture is bound under. */
export const VARIADIC_BINDING = 'others';

export type ArgumentSlot = string;     // '...' is the variadic marker, anything else a named slot

// ===== Options =====

export type OptionType = 'string' | 'number' | 'integer' | 'boolean';

export type OptionDefault = string | number | boolean | readonly string[];

export type OptionValue =
  | string
  | number
  | boolean
  | null
  | OptionValue[]
  | { [key: string]: OptionValue };

export interface OptionSpec {
  name: string;                        // Key the parsed value is stored under
  short?: string;                      // 'o' for -o
  long?: string;                       // 'output' for --output
  type?: OptionType;                   // Omitted with no default: a presence flag
  default?: OptionDefault;
  help: string;
}

// ===== Commands =====

export interface CommandContext {
  readonly path: readonly string[];    // Collections traversed plus the leaf name
  readonly bindings: Bindings;
  readonly options: ParsedOptions;
  binding(key: string): BindingValue | undefined;
  opt(key: string): OptionValue | undefined;
  opt(key: string, fallback: OptionValue): OptionValue;
}

export type HandlerFunction = (context: CommandContext) => unknown;

export type CommandHandler = HandlerFunction | { run: HandlerFunction };

export interface LeafCommand {
  kind: 'command';
  name: string;
  args: readonly ArgumentSlot[];
  handler: CommandHandler;
  options: readonly OptionSpec[];
}

export interface CommandCollection {
  kind: 'collection';
  name: string;
  children: readonly CommandSpec[];
}

export type CommandSpec = LeafCommand | CommandCollection;

export interface ScriptSpec {
  script: string;                      // Display name used in usage text
  version: string;
  configFile?: string;                 // JSON file overlaid onto parsed options
  commands: readonly CommandSpec[];
}

// ===== Invocation State =====

export type BindingValue = string | readonly string[];

export type Bindings = ReadonlyMap<string, BindingValue>;

export type ParsedOptions = ReadonlyMap<string, OptionValue>;

export type ConfigEntry = readonly [key: string, value: OptionValue];
