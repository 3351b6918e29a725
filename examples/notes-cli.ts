#!/usr/bin/env node

/**
 * Example host program: a small note-taking CLI declared with cmdtree.
 *
 *   notes add "Buy milk" groceries urgent
 *   notes list --format json --limit 5
 *   notes tag add 3 groceries
 *   notes tag remove 3 groceries
 */

import chalk from 'chalk';
import {
  CommandContext,
  ScriptSpec,
  VARIADIC,
  VARIADIC_BINDING,
  collection,
  command,
  haltWith,
  option,
  start
} from '../src';

interface Note {
  id: number;
  title: string;
  tags: string[];
}

const notes: Note[] = [
  { id: 1, title: 'Renew passport', tags: ['admin'] },
  { id: 2, title: 'Call the plumber', tags: ['house', 'urgent'] }
];

function findNote(context: CommandContext): Note {
  const id = Number(context.binding('id'));
  const note = notes.find((candidate) => candidate.id === id);
  if (!note) {
    return haltWith(`No note with id ${String(context.binding('id'))}`);
  }
  return note;
}

function addNote(context: CommandContext): Note {
  const tags = context.binding(VARIADIC_BINDING) ?? [];
  const note: Note = {
    id: notes.length + 1,
    title: String(context.binding('title')),
    tags: typeof tags === 'string' ? [tags] : [...tags]
  };
  notes.push(note);
  console.log(chalk.green(`✓ Added note ${note.id}`));
  return note;
}

function listNotes(context: CommandContext): Note[] {
  const limit = Number(context.opt('limit', 20));
  const shown = notes.slice(0, limit);

  if (context.opt('format') === 'json') {
    console.log(JSON.stringify(shown, null, 2));
  } else {
    for (const note of shown) {
      console.log(`${note.id}. ${note.title} ${chalk.gray(note.tags.join(', '))}`);
    }
  }
  return shown;
}

export const notesSpec: ScriptSpec = {
  script: 'notes',
  version: '1.2.0',
  configFile: '~/.config/notes/config.json',
  commands: [
    command('add', {
      args: ['title', VARIADIC],
      handler: addNote
    }),
    command('list', {
      handler: listNotes,
      options: [
        option('format', { short: 'f', long: 'format', type: 'string', default: 'text', help: 'Output format: text or json' }),
        option('limit', { short: 'l', long: 'limit', type: 'integer', default: 20, help: 'Maximum number of notes to show' })
      ]
    }),
    collection('tag', [
      command('add', {
        args: ['id', 'tag'],
        handler: (context) => {
          const note = findNote(context);
          note.tags.push(String(context.binding('tag')));
          return note;
        }
      }),
      command('remove', {
        args: ['id', 'tag'],
        handler: {
          run: (context) => {
            const note = findNote(context);
            note.tags = note.tags.filter((tag) => tag !== context.binding('tag'));
            return note;
          }
        }
      })
    ])
  ]
};

if (require.main === module) {
  start(notesSpec).catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
