/**
 * Typed error class for tracker operations.
 */

import type { FieldError } from './types/results.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'CONFIG_ERROR';

export class TrackerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
  }

  static notFound(entity: string, id: string | number): TrackerError {
    return new TrackerError('NOT_FOUND', `${entity} not found: ${id}`);
  }

  static io(message: string): TrackerError {
    return new TrackerError('IO_ERROR', message);
  }

  static config(message: string): TrackerError {
    return new TrackerError('CONFIG_ERROR', message);
  }
}

/** Raised when creation input is rejected; nothing has been written */
export class ValidationError extends TrackerError {
  readonly entity: string;
  readonly fieldErrors: readonly FieldError[];

  constructor(entity: string, fieldErrors: readonly FieldError[]) {
    super('VALIDATION_ERROR', `Invalid ${entity}: ${formatFieldErrors(fieldErrors)}`);
    this.name = 'ValidationError';
    this.entity = entity;
    this.fieldErrors = fieldErrors;
  }

  static single(entity: string, field: string, message: string): ValidationError {
    return new ValidationError(entity, [{ field, message }]);
  }
}

export function formatFieldErrors(errors: readonly FieldError[]): string {
  return errors.map(e => `${e.field}: ${e.message}`).join('; ');
}
