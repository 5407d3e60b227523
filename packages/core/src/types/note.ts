import type { NotePriority } from './note-priority.js';

export type NoteId = number;

export interface Note {
  readonly id: NoteId;
  readonly title: string;
  readonly content: string;
  readonly priority: NotePriority;
  readonly createdAt: Date;
  /** Set once at creation; nothing refreshes it afterwards */
  readonly updatedAt: Date;
  readonly tags: readonly string[];
}

/** On-disk shape of a note in notes.json */
export interface NoteRecord {
  id: number;
  title: string;
  content: string;
  priority: NotePriority;
  created_at: string;
  updated_at: string;
  tags: string[];
}

export function serializeNote(note: Note): NoteRecord {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    priority: note.priority,
    created_at: note.createdAt.toISOString(),
    updated_at: note.updatedAt.toISOString(),
    tags: [...note.tags],
  };
}
