export { NotePriority } from './note-priority.js';
export { Subject, SubjectName } from './subject.js';
export { AssignmentStatus, AssignmentStatusName } from './assignment-status.js';
export { RiskLevel } from './risk-level.js';
export type { NoteId, Note, NoteRecord } from './note.js';
export { serializeNote } from './note.js';
export type { AssignmentId, Assignment, AssignmentRecord } from './assignment.js';
export { serializeAssignment, withStatus, daysUntilDue } from './assignment.js';
export type { Result, FieldError, ValidationResult } from './results.js';
export { Ok, Err, unwrap, isOk, isErr } from './results.js';
