import { Command } from 'commander';
import chalk from 'chalk';
import { AssignmentStatus, AssignmentStatusName, SubjectName } from '@deadline-tracker/core';
import type { Assignment, Tracker } from '@deadline-tracker/core';
import * as out from '../output.js';
import {
  $try, parseDueDate, parseId, parseIntegerArg, parseNumberArg, parseStatus,
} from '../helpers.js';

interface AddOptions {
  due: string;
  description?: string;
  subject: string;
  priority: string;
  hours: string;
}

export function createAssignmentCommand(tracker: Tracker): Command {
  const assignmentCommand = new Command('assignment')
    .alias('as')
    .description('Create, view and update assignments');

  assignmentCommand.addCommand(
    new Command('add')
      .description('Create an assignment')
      .argument('<title>', 'Assignment title')
      .requiredOption('--due <date>', 'Due date (YYYY-MM-DD)')
      .option('-d, --description <text>', 'Description')
      .option('-s, --subject <subject>', 'Subject: math, science, computer_science, other', 'other')
      .option('-p, --priority <n>', 'Priority from 1 to 10', '5')
      .option('-e, --hours <n>', 'Estimated hours', '1.0')
      .action((title: string, opts: AddOptions) => $try(() => {
        const assignment = tracker.assignments.create({
          title,
          description: opts.description ?? '',
          subject: opts.subject.toLowerCase(),
          dueDate: parseDueDate(opts.due),
          priority: parseIntegerArg('assignment', 'priority', opts.priority),
          estimatedHours: parseNumberArg('assignment', 'estimatedHours', opts.hours),
        });
        out.success(`Assignment created (ID: ${assignment.id})`);
      })),
  );

  assignmentCommand.addCommand(
    new Command('list')
      .description('List all assignments')
      .option('--pending', 'Show only assignments that are not completed')
      .action((opts: { pending?: boolean }) => $try(() => {
        const all = tracker.assignments.getAll();
        const assignments = opts.pending
          ? all.filter(a => a.status !== AssignmentStatus.Completed)
          : all;

        if (assignments.length === 0) {
          out.info('No assignments found');
          return;
        }

        out.heading(`Assignments (${assignments.length} total)`);
        for (const a of assignments) {
          displayAssignment(a);
        }
      })),
  );

  assignmentCommand.addCommand(
    new Command('complete')
      .description('Mark one or more assignments as completed')
      .argument('<ids...>', 'The id(s) of the assignment(s)')
      .action((ids: string[]) => $try(() => {
        for (const raw of ids) {
          setStatus(tracker, raw, AssignmentStatus.Completed);
        }
      })),
  );

  assignmentCommand.addCommand(
    new Command('status')
      .description('Set the status of an assignment')
      .argument('<status>', 'The status to set: not-started, in-progress, completed')
      .argument('<id>', 'The id of the assignment')
      .action((statusStr: string, raw: string) => $try(() => {
        const status = parseStatus(statusStr);
        if (status == null) {
          out.error(`Unknown status: '${statusStr}'. Use: not-started, in-progress, completed`);
          process.exitCode = 1;
          return;
        }
        setStatus(tracker, raw, status);
      })),
  );

  return assignmentCommand;
}

function setStatus(tracker: Tracker, raw: string, status: AssignmentStatus): void {
  const id = parseId(raw);
  if (id == null) {
    out.error(`Invalid id: '${raw}'`);
    process.exitCode = 1;
    return;
  }
  if (tracker.assignments.updateStatus(id, status)) {
    out.success(`Assignment ${id} marked as ${status.replace('_', ' ')}`);
  } else {
    out.error(`Could not find assignment with id ${id}`);
    process.exitCode = 1;
  }
}

function displayAssignment(a: Assignment): void {
  const done = a.status === AssignmentStatus.Completed;
  const title = done ? chalk.dim.strikethrough(a.title) : chalk.bold(a.title);
  const due = done ? chalk.dim(`Due: ${out.formatDate(a.dueDate)}`) : out.formatDueLabel(a.dueDate);

  console.log(`${chalk.dim(`(${a.id})`)} ${out.formatStatusIcon(a.status)} ${title}  ${due}`);
  console.log(chalk.dim(`     ${SubjectName[a.subject]} | Priority: ${a.priority}/10 | ${out.formatHours(a.estimatedHours)} | ${AssignmentStatusName[a.status]}`));
  if (a.description) console.log(`     ${out.truncate(a.description, 72)}`);
}
