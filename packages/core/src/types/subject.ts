export const Subject = {
  Math: 'math',
  Science: 'science',
  ComputerScience: 'computer_science',
  Other: 'other',
} as const;

export type Subject = (typeof Subject)[keyof typeof Subject];

/** Reverse mapping for display purposes */
export const SubjectName: Record<Subject, string> = {
  [Subject.Math]: 'Math',
  [Subject.Science]: 'Science',
  [Subject.ComputerScience]: 'Computer Science',
  [Subject.Other]: 'Other',
};
