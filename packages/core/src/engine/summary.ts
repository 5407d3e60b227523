import type { Note } from '../types/note.js';
import type { Assignment } from '../types/assignment.js';
import { AssignmentStatus } from '../types/assignment-status.js';

export interface TrackerSummary {
  readonly noteCount: number;
  readonly assignmentCount: number;
  readonly completedCount: number;
  readonly pendingCount: number;
  /** Sum of estimates over assignments not yet completed */
  readonly pendingEstimatedHours: number;
}

export function summarize(notes: readonly Note[], assignments: readonly Assignment[]): TrackerSummary {
  const pending = assignments.filter(a => a.status !== AssignmentStatus.Completed);
  return {
    noteCount: notes.length,
    assignmentCount: assignments.length,
    completedCount: assignments.length - pending.length,
    pendingCount: pending.length,
    pendingEstimatedHours: pending.reduce((sum, a) => sum + a.estimatedHours, 0),
  };
}
