import { Command } from 'commander';
import chalk from 'chalk';
import { summarize } from '@deadline-tracker/core';
import type { Tracker } from '@deadline-tracker/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSummaryCommand(tracker: Tracker): Command {
  return new Command('summary')
    .description('Show counts of notes and assignments')
    .action(() => $try(() => {
      const s = summarize(tracker.notes.getAll(), tracker.assignments.getAll());

      out.heading('Summary');
      console.log(`  Notes: ${chalk.bold(String(s.noteCount))}`);
      console.log(`  Assignments: ${chalk.bold(String(s.assignmentCount))}`);
      console.log(`  Completed assignments: ${chalk.green(String(s.completedCount))}`);
      console.log(`  Pending assignments: ${chalk.yellow(String(s.pendingCount))}`);
      if (s.pendingCount > 0) {
        console.log(`  Total estimated work: ${s.pendingEstimatedHours.toFixed(1)} hours`);
      }
    }));
}
