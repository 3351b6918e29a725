/**
 * cmdtree - Yargs Option Parser
 *
 * Option delegate that turns the tokens following a command path into parsed
 * option values, using yargs with its built-in help and version handling off.
 */

import yargs, { Options } from 'yargs';
import { OptionParseResult, OptionParser } from '../types/dispatch';
import { OptionSpec, OptionType, OptionValue } from '../types/spec';
import { OptionParseError, toCmdtreeError } from '../utils/error-handler';
import { optionFlagText } from '../lib/usage';

export class YargsOptionParser implements OptionParser {
  /**
   * Parse tokens against the given option specs. Unknown flags, flags missing
   * their value and values of the wrong type are reported as failures.
   */
  parse(specs: readonly OptionSpec[], tokens: readonly string[]): OptionParseResult {
    const definitions: Record<string, Options> = {};
    for (const spec of specs) {
      definitions[YargsOptionParser.flagKey(spec)] = YargsOptionParser.toYargsOption(spec);
    }

    try {
      const argv = yargs([...tokens])
        .help(false)
        .version(false)
        .exitProcess(false)
        .showHelpOnFail(false)
        .parserConfiguration({
          'camel-case-expansion': false,
          'duplicate-arguments-array': false,
          'strip-aliased': true
        })
        .options(definitions)
        .strictOptions()
        .fail((message, error) => {
          if (error) {
            throw error;
          }
          const flag = YargsOptionParser.undeclaredFlag(specs, tokens);
          throw new OptionParseError(flag === undefined ? message : `Unknown option ${flag}`);
        })
        .parseSync();

      const options = new Map<string, OptionValue>();
      for (const spec of specs) {
        const value = YargsOptionParser.toOptionValue(argv[YargsOptionParser.flagKey(spec)]);
        if (value === undefined || (YargsOptionParser.isFlag(spec) && value !== true)) {
          continue;
        }
        options.set(spec.name, value);
      }

      return { success: true, options, extra: argv._.map(String) };
    } catch (error) {
      return { success: false, error: toCmdtreeError(error, OptionParseError) };
    }
  }

  /**
   * Key an option is registered under: its long flag, else its short one.
   * The option's name only labels the parsed value and is never a flag itself.
   */
  static flagKey(spec: OptionSpec): string {
    return spec.long ?? spec.short ?? spec.name;
  }

  /**
   * First token, as typed, naming a flag that none of the specs declare
   */
  static undeclaredFlag(specs: readonly OptionSpec[], tokens: readonly string[]): string | undefined {
    const longs = new Map<string, OptionSpec>();
    const shorts = new Map<string, OptionSpec>();
    for (const spec of specs) {
      if (spec.long !== undefined) longs.set(spec.long, spec);
      if (spec.short !== undefined) shorts.set(spec.short, spec);
    }

    for (const token of tokens) {
      if (token === '--') {
        return undefined;
      }

      if (token.startsWith('--')) {
        const [name = ''] = token.slice(2).split('=');
        const negated = name.startsWith('no-') ? longs.get(name.slice(3)) : undefined;
        const declared = longs.has(name) || shorts.has(name) || (negated !== undefined && this.takesNoValue(negated));
        if (!declared) {
          return token;
        }
        continue;
      }

      // Negative numbers are values, not flags
      if (!token.startsWith('-') || /^-\d/.test(token)) {
        continue;
      }

      // Grouped short flags: every letter must be declared up to the first
      // one that takes a value, which swallows the rest of the token
      for (const letter of token.slice(1)) {
        const spec = shorts.get(letter);
        if (spec === undefined) {
          return token;
        }
        if (!this.takesNoValue(spec)) {
          break;
        }
      }
    }

    return undefined;
  }

  /**
   * An option that takes no value: present means true, absent leaves no key
   */
  static isFlag(spec: OptionSpec): boolean {
    return spec.type === undefined && spec.default === undefined;
  }

  static resolveType(spec: OptionSpec): OptionType | undefined {
    if (spec.type !== undefined || spec.default === undefined) {
      return spec.type;
    }
    switch (typeof spec.default) {
      case 'number':
        return 'number';
      case 'boolean':
        return 'boolean';
      default:
        return 'string';
    }
  }

  private static takesNoValue(spec: OptionSpec): boolean {
    const type = this.resolveType(spec);
    return type === undefined || type === 'boolean';
  }

  private static toYargsOption(spec: OptionSpec): Options {
    const key = this.flagKey(spec);
    const aliases = [spec.short, spec.long].filter(
      (alias): alias is string => alias !== undefined && alias !== key
    );
    const definition: Options = { alias: aliases, describe: spec.help };
    const type = this.resolveType(spec);

    if (spec.default !== undefined) {
      definition.default = spec.default;
    }

    switch (type) {
      case undefined:
      case 'boolean':
        definition.type = 'boolean';
        break;
      case 'string':
        definition.type = 'string';
        definition.requiresArg = true;
        break;
      case 'number':
      case 'integer':
        definition.type = 'number';
        definition.requiresArg = true;
        definition.coerce = this.numberCoercion(spec, type === 'integer');
        break;
    }

    return definition;
  }

  private static numberCoercion(spec: OptionSpec, integer: boolean): (value: unknown) => unknown {
    const expected = integer ? 'an integer' : 'a number';
    return (value: unknown) => {
      if (value === undefined) {
        return value;
      }
      if (typeof value !== 'number' || Number.isNaN(value) || (integer && !Number.isInteger(value))) {
        throw new OptionParseError(`Invalid value for ${optionFlagText(spec)}: expected ${expected}`);
      }
      return value;
    };
  }

  private static toOptionValue(value: unknown): OptionValue | undefined {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(String);
    }
    return undefined;
  }
}
