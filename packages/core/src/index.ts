// Types
export {
  NotePriority, Subject, SubjectName, AssignmentStatus, AssignmentStatusName, RiskLevel,
  serializeNote, serializeAssignment, withStatus, daysUntilDue,
  Ok, Err, unwrap, isOk, isErr,
} from './types/index.js';
export type {
  NoteId, Note, NoteRecord, AssignmentId, Assignment, AssignmentRecord,
  Result, FieldError, ValidationResult,
} from './types/index.js';

// Errors
export { TrackerError, ValidationError, formatFieldErrors } from './errors.js';
export type { ErrorCode } from './errors.js';

// Logging
export { silentLogger, MemoryLogger } from './logger.js';
export type { Logger, LogLevel, LogEntry } from './logger.js';

// Schemas and validation
export { parseIsoTimestamp, TimestampSchema, TagsInputSchema } from './schema/common.js';
export type { RawInput } from './schema/common.js';
export { NoteRecordSchema, CreateNoteInputSchema, NotePrioritySchema } from './schema/note.js';
export type { CreateNoteInput, ParsedNoteInput } from './schema/note.js';
export {
  AssignmentRecordSchema, CreateAssignmentInputSchema,
  SubjectSchema, AssignmentStatusSchema, AssignmentPrioritySchema, EstimatedHoursSchema,
} from './schema/assignment.js';
export type { CreateAssignmentInput, ParsedAssignmentInput } from './schema/assignment.js';
export {
  validateNoteRecord, validateAssignmentRecord,
  validateNoteInput, validateAssignmentInput, toFieldErrors,
} from './validation/index.js';

// Storage
export * from './storage/index.js';

// Repositories
export * from './repositories/index.js';

// Engine
export * from './engine/index.js';

// Backup
export * from './backup/index.js';

// Config
export { loadConfig, getDefaultDataDir, resolveTrackerPaths } from './config.js';
export type { TrackerConfig, TrackerPaths } from './config.js';
export { openTracker } from './tracker.js';
export type { Tracker, OpenTrackerOptions } from './tracker.js';
