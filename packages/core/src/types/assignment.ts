import type { Subject } from './subject.js';
import type { AssignmentStatus } from './assignment-status.js';

export type AssignmentId = number;

export interface Assignment {
  readonly id: AssignmentId;
  readonly title: string;
  readonly description: string;
  readonly subject: Subject;
  readonly dueDate: Date;
  readonly status: AssignmentStatus;
  /** 1 (lowest) to 10 (highest) */
  readonly priority: number;
  readonly estimatedHours: number;
  readonly createdAt: Date;
}

/** On-disk shape of an assignment in assignments.json */
export interface AssignmentRecord {
  id: number;
  title: string;
  description: string;
  subject: Subject;
  due_date: string;
  status: AssignmentStatus;
  priority: number;
  estimated_hours: number;
  created_at: string;
}

const MS_PER_DAY = 86_400_000;

export function serializeAssignment(assignment: Assignment): AssignmentRecord {
  return {
    id: assignment.id,
    title: assignment.title,
    description: assignment.description,
    subject: assignment.subject,
    due_date: assignment.dueDate.toISOString(),
    status: assignment.status,
    priority: assignment.priority,
    estimated_hours: assignment.estimatedHours,
    created_at: assignment.createdAt.toISOString(),
  };
}

/** Return a copy of the assignment with a new status */
export function withStatus(assignment: Assignment, status: AssignmentStatus): Assignment {
  return { ...assignment, status };
}

/** Local wall-clock reading of a date as if it were UTC, so DST shifts drop out */
function wallClockMs(d: Date): number {
  return Date.UTC(
    d.getFullYear(), d.getMonth(), d.getDate(),
    d.getHours(), d.getMinutes(), d.getSeconds(), d.getMilliseconds(),
  );
}

/**
 * Whole days left until the due date, floored, counted on the local wall
 * clock. Overdue assignments report 0, so they are indistinguishable from
 * ones due today.
 */
export function daysUntilDue(assignment: Pick<Assignment, 'dueDate'>, now: Date = new Date()): number {
  const days = Math.floor((wallClockMs(assignment.dueDate) - wallClockMs(now)) / MS_PER_DAY);
  return Math.max(0, days);
}
