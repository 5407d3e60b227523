import { Command } from 'commander';
import type { Tracker } from '@deadline-tracker/core';

import { createNoteCommand } from './commands/note.js';
import { createAssignmentCommand } from './commands/assignment.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createSummaryCommand } from './commands/summary.js';
import { createBackupCommand } from './commands/backup.js';

/** Build the CLI program around an opened tracker */
export function createProgram(tracker: Tracker): Command {
  const program = new Command()
    .name('tracker')
    .description('Notes and assignment deadline tracker')
    .version('1.0.0');

  program.addCommand(createNoteCommand(tracker));
  program.addCommand(createAssignmentCommand(tracker));
  program.addCommand(createAnalyzeCommand(tracker));
  program.addCommand(createSummaryCommand(tracker));
  program.addCommand(createBackupCommand(tracker));

  // Default action (no command): show the summary
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'summary')?.parse([], { from: 'user' });
  });

  return program;
}
