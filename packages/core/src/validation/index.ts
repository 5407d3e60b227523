/**
 * Schema checks that return a Result instead of throwing, so callers can
 * skip-and-log or report field errors without touching the filesystem.
 */

import type { ZodError, ZodTypeAny, output } from 'zod';
import { Ok, Err } from '../types/results.js';
import type { FieldError, ValidationResult } from '../types/results.js';
import type { Note } from '../types/note.js';
import type { Assignment } from '../types/assignment.js';
import { NoteRecordSchema, CreateNoteInputSchema } from '../schema/note.js';
import type { ParsedNoteInput } from '../schema/note.js';
import { AssignmentRecordSchema, CreateAssignmentInputSchema } from '../schema/assignment.js';
import type { ParsedAssignmentInput } from '../schema/assignment.js';

export function toFieldErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(record)',
    message: issue.message,
  }));
}

export function validateWith<S extends ZodTypeAny>(schema: S, raw: unknown): ValidationResult<output<S>> {
  const parsed = schema.safeParse(raw);
  return parsed.success ? Ok(parsed.data) : Err(toFieldErrors(parsed.error));
}

export function validateNoteRecord(raw: unknown): ValidationResult<Note> {
  return validateWith(NoteRecordSchema, raw);
}

export function validateAssignmentRecord(raw: unknown): ValidationResult<Assignment> {
  return validateWith(AssignmentRecordSchema, raw);
}

export function validateNoteInput(raw: unknown): ValidationResult<ParsedNoteInput> {
  return validateWith(CreateNoteInputSchema, raw);
}

export function validateAssignmentInput(raw: unknown): ValidationResult<ParsedAssignmentInput> {
  return validateWith(CreateAssignmentInputSchema, raw);
}
