import { Command } from 'commander';
import chalk from 'chalk';
import type { Tracker } from '@deadline-tracker/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createNoteCommand(tracker: Tracker): Command {
  const noteCommand = new Command('note')
    .description('Create and view notes');

  noteCommand.addCommand(
    new Command('add')
      .description('Create a note')
      .argument('<title>', 'Note title')
      .requiredOption('-c, --content <text>', 'Note body')
      .option('-p, --priority <level>', 'Priority: low, medium, high', 'medium')
      .option('-t, --tags <tags>', 'Comma-separated tags')
      .action((title: string, opts: { content: string; priority: string; tags?: string }) => $try(() => {
        const note = tracker.notes.create({
          title,
          content: opts.content,
          priority: opts.priority.toLowerCase(),
          tags: opts.tags ?? [],
        });
        out.success(`Note created (ID: ${note.id})`);
      })),
  );

  noteCommand.addCommand(
    new Command('list')
      .description('List all notes')
      .action(() => $try(() => {
        const notes = tracker.notes.getAll();
        if (notes.length === 0) {
          out.info('No notes found');
          return;
        }

        out.heading(`Notes (${notes.length} total)`);
        for (const note of notes) {
          console.log(`${chalk.dim(`(${note.id})`)} ${chalk.bold(note.title)} ${out.formatNotePriority(note.priority)}`);
          if (note.content) console.log(`     ${out.truncate(note.content, 72)}`);
          console.log(chalk.dim(`     Created: ${out.formatDateTime(note.createdAt)}`));
          if (note.tags.length > 0) console.log(`     ${out.formatTags(note.tags)}`);
        }
      })),
  );

  return noteCommand;
}
