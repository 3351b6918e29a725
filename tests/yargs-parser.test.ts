/**
 * Tests for the yargs option delegate
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';
import { YargsOptionParser } from '../src/cli/yargs-parser';
import { HELP_OPTION, option } from '../src/lib/define';
import { OptionParseResult } from '../src/types/dispatch';
import { OptionParseError } from '../src/utils/error-handler';

const specs = [
  HELP_OPTION,
  option('verbose', { short: 'V', long: 'verbose', help: 'Print more detail.' }),
  option('output', { short: 'o', long: 'output', type: 'string', help: 'Output format.' }),
  option('count', { short: 'c', long: 'count', type: 'integer', default: 10, help: 'How many.' })
];

function parsedOptions(result: OptionParseResult): Record<string, unknown> {
  if (!result.success) {
    throw result.error;
  }
  return Object.fromEntries(result.options);
}

function failureMessage(result: OptionParseResult): string {
  if (result.success) {
    throw new Error('expected the parse to fail');
  }
  expect(result.error).to.be.instanceOf(OptionParseError);
  return result.error.message;
}

describe('YargsOptionParser', () => {
  const parser = new YargsOptionParser();

  it('should apply defaults and leave absent flags unset', () => {
    expect(parsedOptions(parser.parse(specs, []))).to.deep.equal({ count: 10 });
  });

  it('should parse long and short flags with values', () => {
    const result = parser.parse(specs, ['--verbose', '-o', 'table', '--count', '5']);
    expect(parsedOptions(result)).to.deep.equal({ verbose: true, output: 'table', count: 5 });
  });

  it('should parse the help flag by its short name', () => {
    expect(parsedOptions(parser.parse(specs, ['-h'])).help).to.equal(true);
  });

  it('should return leftover positional tokens', () => {
    const result = parser.parse(specs, ['--verbose', 'stray']);
    expect(result.success && result.extra).to.deep.equal(['stray']);
  });

  it('should reject an unknown long flag, naming it as typed', () => {
    expect(failureMessage(parser.parse(specs, ['--bogus']))).to.equal('Unknown option --bogus');
  });

  it('should reject an unknown short flag, naming it as typed', () => {
    expect(failureMessage(parser.parse(specs, ['-V', '-q']))).to.equal('Unknown option -q');
  });

  it('should name the whole group when a grouped short flag is unknown', () => {
    expect(failureMessage(parser.parse(specs, ['-Vq']))).to.equal('Unknown option -Vq');
  });

  describe('option names that differ from their flags', () => {
    const limit = option('count', { long: 'limit', type: 'integer', help: 'How many.' });

    it('should key the parsed value by the option name', () => {
      expect(parsedOptions(parser.parse([limit], ['--limit', '3']))).to.deep.equal({ count: 3 });
    });

    it('should reject the option name used as a flag', () => {
      expect(failureMessage(parser.parse([limit], ['--count', '3']))).to.equal('Unknown option --count');
    });

    it('should accept the short flag of a short-only option', () => {
      const quiet = option('silence', { short: 'q', help: 'Say nothing.' });
      expect(parsedOptions(parser.parse([quiet], ['-q']))).to.deep.equal({ silence: true });
    });
  });

  describe('undeclaredFlag', () => {
    it('should stop at the end-of-options marker', () => {
      expect(YargsOptionParser.undeclaredFlag(specs, ['--', '--bogus'])).to.equal(undefined);
    });

    it('should accept a short flag carrying its value', () => {
      expect(YargsOptionParser.undeclaredFlag(specs, ['-otable', '-c=4'])).to.equal(undefined);
    });

    it('should treat negative numbers as values', () => {
      expect(YargsOptionParser.undeclaredFlag(specs, ['--count', '-5'])).to.equal(undefined);
    });
  });

  it('should reject a non-integer value for an integer option', () => {
    expect(failureMessage(parser.parse(specs, ['--count', 'abc']))).to.contain('expected an integer');
  });

  it('should reject a value option given without its value', () => {
    expect(failureMessage(parser.parse(specs, ['--output']))).to.contain('output');
  });

  describe('resolveType', () => {
    it('should infer the type from the default', () => {
      expect(YargsOptionParser.resolveType(option('n', { short: 'n', default: 3, help: '' }))).to.equal('number');
      expect(YargsOptionParser.resolveType(option('s', { short: 's', default: 'x', help: '' }))).to.equal('string');
    });

    it('should treat an option with neither type nor default as a flag', () => {
      const flag = option('q', { short: 'q', help: '' });
      expect(YargsOptionParser.resolveType(flag)).to.equal(undefined);
      expect(YargsOptionParser.isFlag(flag)).to.equal(true);
    });
  });
});
