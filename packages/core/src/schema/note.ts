/**
 * Zod schemas for notes: the stored record and the creation input.
 */

import { z } from 'zod';
import { NotePriority } from '../types/note-priority.js';
import type { Note } from '../types/note.js';
import { RecordIdSchema, TagsInputSchema, TimestampSchema } from './common.js';

export const NotePrioritySchema = z.nativeEnum(NotePriority);

export const NoteRecordSchema = z
  .object({
    id: RecordIdSchema,
    title: z.string().min(1, 'Title must not be empty'),
    content: z.string(),
    priority: NotePrioritySchema,
    created_at: TimestampSchema,
    updated_at: TimestampSchema,
    tags: z.array(z.string().min(1, 'Tags must not be empty')).default([]),
  })
  .transform((r): Note => ({
    id: r.id,
    title: r.title,
    content: r.content,
    priority: r.priority,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    tags: r.tags,
  }));

export const CreateNoteInputSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  content: z.string(),
  priority: NotePrioritySchema.default(NotePriority.Medium),
  tags: TagsInputSchema.default([]),
});

export type CreateNoteInput = z.input<typeof CreateNoteInputSchema>;
export type ParsedNoteInput = z.output<typeof CreateNoteInputSchema>;
