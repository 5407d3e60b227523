/**
 * Zod schemas for assignments: the stored record and the creation input.
 */

import { z } from 'zod';
import { Subject } from '../types/subject.js';
import { AssignmentStatus } from '../types/assignment-status.js';
import type { Assignment } from '../types/assignment.js';
import { RecordIdSchema, TimestampSchema } from './common.js';

export const SubjectSchema = z.nativeEnum(Subject);
export const AssignmentStatusSchema = z.nativeEnum(AssignmentStatus);
export const AssignmentPrioritySchema = z.number().int().min(1).max(10);
export const EstimatedHoursSchema = z.number().finite().nonnegative();

export const AssignmentRecordSchema = z
  .object({
    id: RecordIdSchema,
    title: z.string().min(1, 'Title must not be empty'),
    description: z.string().default(''),
    subject: SubjectSchema,
    due_date: TimestampSchema,
    status: AssignmentStatusSchema,
    priority: AssignmentPrioritySchema,
    estimated_hours: EstimatedHoursSchema,
    created_at: TimestampSchema,
  })
  .transform((r): Assignment => ({
    id: r.id,
    title: r.title,
    description: r.description,
    subject: r.subject,
    dueDate: r.due_date,
    status: r.status,
    priority: r.priority,
    estimatedHours: r.estimated_hours,
    createdAt: r.created_at,
  }));

export const CreateAssignmentInputSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  description: z.string().default(''),
  subject: SubjectSchema.default(Subject.Other),
  // A Date passes through untouched; only strings are parsed
  dueDate: z.union([z.date(), TimestampSchema], {
    errorMap: () => ({ message: 'Due date must be a Date or an ISO-8601 date string' }),
  }),
  status: AssignmentStatusSchema.default(AssignmentStatus.NotStarted),
  priority: AssignmentPrioritySchema.default(5),
  estimatedHours: EstimatedHoursSchema.default(1.0),
});

export type CreateAssignmentInput = z.input<typeof CreateAssignmentInputSchema>;
export type ParsedAssignmentInput = z.output<typeof CreateAssignmentInputSchema>;
