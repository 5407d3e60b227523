import type { Note, NoteRecord } from '../types/note.js';
import { serializeNote } from '../types/note.js';
import type { ValidationResult } from '../types/results.js';
import type { CreateNoteInput } from '../schema/note.js';
import type { RawInput } from '../schema/common.js';
import { validateNoteRecord, validateNoteInput } from '../validation/index.js';
import { ValidationError } from '../errors.js';
import { JsonRepository } from './json-repository.js';

export class NoteRepository extends JsonRepository<Note, NoteRecord> {
  protected readonly entityName = 'note';

  /**
   * Validate the input, assign the next ID and persist the whole collection.
   * Throws ValidationError without writing when the input is rejected.
   */
  create(input: CreateNoteInput | RawInput): Note {
    const parsed = validateNoteInput(input);
    if (!parsed.ok) throw new ValidationError(this.entityName, parsed.error);

    const notes = this.getAll();
    const now = this.now();
    const note: Note = {
      id: this.nextId(notes),
      title: parsed.value.title,
      content: parsed.value.content,
      priority: parsed.value.priority,
      createdAt: now,
      updatedAt: now,
      tags: parsed.value.tags,
    };

    this.persist([...notes, note]);
    this.logger.info(`Created note with ID: ${note.id}`);
    return note;
  }

  protected validate(raw: unknown): ValidationResult<Note> {
    return validateNoteRecord(raw);
  }

  protected serialize(note: Note): NoteRecord {
    return serializeNote(note);
  }
}
