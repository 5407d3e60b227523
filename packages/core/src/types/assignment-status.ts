export const AssignmentStatus = {
  NotStarted: 'not_started',
  InProgress: 'in_progress',
  Completed: 'completed',
} as const;

export type AssignmentStatus = (typeof AssignmentStatus)[keyof typeof AssignmentStatus];

/** Reverse mapping for display purposes */
export const AssignmentStatusName: Record<AssignmentStatus, string> = {
  [AssignmentStatus.NotStarted]: 'Not started',
  [AssignmentStatus.InProgress]: 'In progress',
  [AssignmentStatus.Completed]: 'Completed',
};
