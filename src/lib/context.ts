import {
  BindingValue,
  Bindings,
  CommandContext,
  CommandHandler,
  OptionValue,
  ParsedOptions
} from '../types/spec';

class InvocationContext implements CommandContext {
  constructor(
    readonly path: readonly string[],
    readonly bindings: Bindings,
    readonly options: ParsedOptions
  ) {}

  binding(key: string): BindingValue | undefined {
    return this.bindings.get(key);
  }

  opt(key: string): OptionValue | undefined;
  opt(key: string, fallback: OptionValue): OptionValue;
  opt(key: string, fallback?: OptionValue): OptionValue | undefined {
    return this.options.has(key) ? this.options.get(key) : fallback;
  }
}

export function createContext(
  path: readonly string[],
  bindings: Bindings,
  options: ParsedOptions
): CommandContext {
  return new InvocationContext(path, bindings, options);
}

export function invokeHandler(handler: CommandHandler, context: CommandContext): unknown {
  return typeof handler === 'function' ? handler(context) : handler.run(context);
}
