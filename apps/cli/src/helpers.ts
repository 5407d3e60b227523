/**
 * CLI helpers: argument parsing and error handling.
 */

import {
  AssignmentStatus, ValidationError, parseIsoTimestamp,
} from '@deadline-tracker/core';
import * as out from './output.js';

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a status string into an AssignmentStatus value.
 */
export function parseStatus(status: string): AssignmentStatus | null {
  switch (status.toLowerCase()) {
    case 'not-started': case 'not_started': case 'notstarted': case 'todo': case 'pending':
      return AssignmentStatus.NotStarted;
    case 'in-progress': case 'in_progress': case 'inprogress': case 'wip':
      return AssignmentStatus.InProgress;
    case 'completed': case 'complete': case 'done':
      return AssignmentStatus.Completed;
    default:
      return null;
  }
}

/** Parse a YYYY-MM-DD due date as local midnight */
export function parseDueDate(value: string): Date {
  const trimmed = value.trim();
  const parsed = DATE_ONLY_RE.test(trimmed) ? parseIsoTimestamp(trimmed) : null;
  if (parsed === null) {
    throw ValidationError.single('assignment', 'dueDate', `Invalid date '${value}'. Use YYYY-MM-DD`);
  }
  return parsed;
}

export function parseIntegerArg(entity: string, field: string, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw ValidationError.single(entity, field, `'${value}' is not a whole number`);
  }
  return Number(trimmed);
}

export function parseNumberArg(entity: string, field: string, value: string): number {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw ValidationError.single(entity, field, `'${value}' is not a number`);
  }
  return n;
}

/** Assignment IDs are positive integers */
export function parseId(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return id > 0 ? id : null;
}

/**
 * Run a command action, printing any error instead of letting it escape.
 * Sets a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    process.exitCode = 1;
    if (err instanceof ValidationError) {
      out.error(`Invalid ${err.entity}:`);
      for (const fe of err.fieldErrors) {
        out.error(`  ${fe.field}: ${fe.message}`);
      }
    } else if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}
