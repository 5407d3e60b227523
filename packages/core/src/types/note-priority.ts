export const NotePriority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type NotePriority = (typeof NotePriority)[keyof typeof NotePriority];
