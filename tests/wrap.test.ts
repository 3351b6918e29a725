/**
 * Tests for the help text wrapper
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';
import { wrapLines, wrapText } from '../src/lib/wrap';

describe('Text Wrapper', () => {
  it('should return short text unchanged as a single line', () => {
    expect(wrapText(20, 'short text')).to.deep.equal(['short text']);
  });

  it('should return no lines for empty text', () => {
    expect(wrapText(10, '')).to.deep.equal([]);
  });

  it('should break before the last word that does not fit', () => {
    expect(wrapText(14, 'Write the output in the given format')).to.deep.equal([
      'Write the',
      'output in the',
      'given format'
    ]);
  });

  it('should break on whitespace exactly at the width', () => {
    expect(wrapText(5, 'hello world')).to.deep.equal(['hello', 'world']);
  });

  it('should drop whole whitespace runs at a break', () => {
    expect(wrapText(6, 'ab    cd efgh')).to.deep.equal(['ab', 'cd', 'efgh']);
  });

  it('should break on tabs', () => {
    expect(wrapText(5, 'abc\tdefg')).to.deep.equal(['abc', 'defg']);
  });

  it('should keep a word longer than the width whole on its own line', () => {
    expect(wrapText(5, 'a supercalifragilistic word')).to.deep.equal([
      'a',
      'supercalifragilistic',
      'word'
    ]);
  });

  it('should not truncate a single overlong token', () => {
    expect(wrapText(4, 'abcdefgh')).to.deep.equal(['abcdefgh']);
  });

  it('should yield lines lazily and only once', () => {
    const lines = wrapLines(5, 'hello world');
    expect(lines.next().value).to.equal('hello');
    expect([...lines]).to.deep.equal(['world']);
    expect([...lines]).to.deep.equal([]);
  });
});
