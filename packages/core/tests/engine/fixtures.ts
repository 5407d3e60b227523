import type { Assignment } from '../../src/types/assignment.js';
import { AssignmentStatus } from '../../src/types/assignment-status.js';
import { Subject } from '../../src/types/subject.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export function dueIn(days: number, hours = 0): Date {
  return new Date(NOW.getTime() + days * DAY_MS + hours * HOUR_MS);
}

export function makeAssignment(overrides: Partial<Assignment> = {}): Assignment {
  return {
    id: 1,
    title: 'Assignment',
    description: '',
    subject: Subject.Other,
    dueDate: dueIn(7),
    status: AssignmentStatus.NotStarted,
    priority: 5,
    estimatedHours: 1,
    createdAt: new Date('2026-03-01T08:00:00.000Z'),
    ...overrides,
  };
}
