/**
 * Tests for the example notes CLI
 */

import { describe, it, beforeEach } from 'mocha';
import { expect } from 'chai';
import { notesSpec } from '../examples/notes-cli';
import { Dispatcher } from '../src/cli/dispatcher';
import { MemoryStream, silentLogger } from './helpers';

describe('Example: notes CLI', () => {
  let stdout: MemoryStream;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    stdout = new MemoryStream();
    dispatcher = new Dispatcher(notesSpec, {
      stdout,
      stderr: new MemoryStream(),
      columns: 120,
      configLoader: () => [],
      logger: silentLogger()
    });
  });

  it('should list the tag subcommands', () => {
    dispatcher.dispatch(['tag']);

    expect(stdout.text).to.equal(
      'Usage: notes tag <command> [<arg>] [options]\n\n' +
      'Available subcommands: \n\n  add\n  remove\n\n' +
      'For help on any individual command run `notes COMMAND -h`\n'
    );
  });

  it('should show list options with their defaults', () => {
    dispatcher.dispatch(['list', '-h']);

    expect(stdout.text).to.equal(
      'Usage: notes list [options]\n\n' +
      '  -f, --format  Output format: text or json [default: text]\n' +
      '  -l, --limit   Maximum number of notes to show [default: 20]\n' +
      '\n'
    );
  });

  it('should show add usage with its variadic placeholder', () => {
    dispatcher.dispatch(['add']);
    expect(stdout.text).to.equal('Usage: notes add <title> [...] [options]\n\n');
  });

  it('should print the version', () => {
    dispatcher.dispatch(['-v']);
    expect(stdout.text).to.equal('notes 1.2.0\n');
  });

  it('should add a tag through a function handler', () => {
    const outcome = dispatcher.dispatch(['tag', 'add', '1', 'house']);

    expect(outcome.kind).to.equal('dispatched');
    const result = outcome.kind === 'dispatched' ? outcome.result : undefined;
    expect(result).to.deep.include({ id: 1, title: 'Renew passport' });
    expect(result).to.have.property('tags').that.includes('house');
  });

  it('should remove a tag through an object handler', () => {
    const outcome = dispatcher.dispatch(['tag', 'remove', '2', 'urgent']);

    expect(outcome.kind).to.equal('dispatched');
    const result = outcome.kind === 'dispatched' ? outcome.result : undefined;
    expect(result).to.have.property('tags').that.deep.equals(['house']);
  });
});
