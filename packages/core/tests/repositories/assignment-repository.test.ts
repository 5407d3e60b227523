import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonStore } from '../../src/storage/json-store.js';
import { AssignmentRepository } from '../../src/repositories/assignment-repository.js';
import { MemoryLogger } from '../../src/logger.js';
import { ValidationError } from '../../src/errors.js';
import { AssignmentStatus } from '../../src/types/assignment-status.js';
import { Subject } from '../../src/types/subject.js';

const NOW = new Date('2026-03-10T09:30:00.000Z');

let tmpDir: string;
let filePath: string;
let logger: MemoryLogger;
let repo: AssignmentRepository;

function assignmentRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1,
    title: 'Problem set 3',
    description: 'Chapters 4-5',
    subject: 'math',
    due_date: '2026-03-15T23:59:00.000Z',
    status: 'not_started',
    priority: 7,
    estimated_hours: 4.5,
    created_at: '2026-03-01T08:00:00.000Z',
    ...overrides,
  };
}

function writeRecords(records: unknown[]): void {
  writeFileSync(filePath, JSON.stringify(records));
}

function fieldsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ValidationError) return err.fieldErrors.map(e => e.field);
    throw err;
  }
  return [];
}

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'tracker-assignments-test-'));
  filePath = join(tmpDir, 'assignments.json');
  logger = new MemoryLogger();
  repo = new AssignmentRepository(new JsonStore(filePath, { logger }), { logger, now: () => NOW });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('AssignmentRepository', () => {
  describe('create', () => {
    it('applies defaults for omitted fields', () => {
      const due = new Date('2026-03-20T00:00:00.000Z');
      const assignment = repo.create({ title: 'Essay draft', dueDate: due });

      expect(assignment).toEqual({
        id: 1,
        title: 'Essay draft',
        description: '',
        subject: Subject.Other,
        dueDate: due,
        status: AssignmentStatus.NotStarted,
        priority: 5,
        estimatedHours: 1,
        createdAt: NOW,
      });
    });

    it('keeps a Date due date at the same instant', () => {
      const due = new Date(2026, 3, 1, 17, 45, 12, 345);
      expect(repo.create({ title: 'Lab', dueDate: due }).dueDate.getTime()).toBe(due.getTime());
    });

    it('parses an ISO timestamp string', () => {
      const assignment = repo.create({ title: 'Lab', dueDate: '2026-03-20T17:00:00.000Z' });
      expect(assignment.dueDate.toISOString()).toBe('2026-03-20T17:00:00.000Z');
    });

    it('reads a bare date string as local midnight', () => {
      const assignment = repo.create({ title: 'Lab', dueDate: '2026-03-20' });
      expect(assignment.dueDate.getTime()).toBe(new Date(2026, 2, 20).getTime());
    });

    it('assigns one more than the highest existing ID', () => {
      writeRecords([assignmentRecord({ id: 2 }), assignmentRecord({ id: 11 })]);
      expect(repo.create({ title: 'Quiz', dueDate: NOW }).id).toBe(12);
    });

    it('persists the stored record shape', () => {
      repo.create({
        title: 'Compiler project',
        description: 'Parser milestone',
        subject: 'computer_science',
        dueDate: new Date('2026-04-02T12:00:00.000Z'),
        status: 'in_progress',
        priority: 9,
        estimatedHours: 12.5,
      });

      expect(JSON.parse(readFileSync(filePath, 'utf8'))).toEqual([{
        id: 1,
        title: 'Compiler project',
        description: 'Parser milestone',
        subject: 'computer_science',
        due_date: '2026-04-02T12:00:00.000Z',
        status: 'in_progress',
        priority: 9,
        estimated_hours: 12.5,
        created_at: '2026-03-10T09:30:00.000Z',
      }]);
    });

    it('round-trips every field through getAll', () => {
      const assignment = repo.create({
        title: 'Lab report',
        subject: 'science',
        dueDate: '2026-03-18T10:15:30.250Z',
        priority: 3,
        estimatedHours: 2.25,
      });
      expect(repo.getAll()).toEqual([assignment]);
    });

    it('rejects out-of-range and unknown values', () => {
      expect(fieldsOf(() => repo.create({ title: 'Lab', dueDate: NOW, priority: 11 }))).toEqual(['priority']);
      expect(fieldsOf(() => repo.create({ title: 'Lab', dueDate: NOW, priority: 2.5 }))).toEqual(['priority']);
      expect(fieldsOf(() => repo.create({ title: 'Lab', dueDate: NOW, subject: 'history' }))).toEqual(['subject']);
      expect(fieldsOf(() => repo.create({ title: 'Lab', dueDate: NOW, estimatedHours: -1 }))).toEqual(['estimatedHours']);
      expect(fieldsOf(() => repo.create({ title: 'Lab', dueDate: 'next week' }))).toEqual(['dueDate']);
      expect(fieldsOf(() => repo.create({ title: 'Lab' }))).toEqual(['dueDate']);
      expect(repo.getAll()).toEqual([]);
    });
  });

  describe('getAll', () => {
    it('skips records with an invalid status', () => {
      writeRecords([assignmentRecord(), assignmentRecord({ id: 2, status: 'done' })]);

      expect(repo.getAll().map(a => a.id)).toEqual([1]);
      expect(logger.messages('warn')).toHaveLength(1);
      expect(logger.messages('warn')[0]).toContain('Skipping invalid assignment at position 1');
    });

    it('skips records missing a required field', () => {
      const { subject: _omit, ...withoutSubject } = assignmentRecord({ id: 2 });
      writeRecords([withoutSubject, assignmentRecord({ id: 3 })]);
      expect(repo.getAll().map(a => a.id)).toEqual([3]);
    });

    it('accepts timestamps without an offset as local time', () => {
      writeRecords([assignmentRecord({ due_date: '2026-03-20T00:00:00', created_at: '2026-03-01T12:00:00' })]);
      const [loaded] = repo.getAll();
      expect(loaded?.dueDate.getTime()).toBe(new Date(2026, 2, 20).getTime());
      expect(loaded?.createdAt.getTime()).toBe(new Date(2026, 2, 1, 12).getTime());
    });

    it('accepts an hour-only due timestamp', () => {
    writeRecords([assignmentRecord({ due_date: '2026-03-20T10' })]);
    expect(repo.getAll()[0]?.dueDate.getTime()).toBe(new Date(2026, 2, 20, 10).getTime());
  });

  it('defaults a missing description to empty', () => {
      const { description: _omit, ...withoutDescription } = assignmentRecord();
      writeRecords([withoutDescription]);
      expect(repo.getAll()[0]?.description).toBe('');
    });
  });

  describe('updateStatus', () => {
    it('changes only the matching assignment and persists it', () => {
      repo.create({ title: 'First', dueDate: NOW });
      repo.create({ title: 'Second', dueDate: NOW });

      expect(repo.updateStatus(2, AssignmentStatus.Completed)).toBe(true);

      const [first, second] = repo.getAll();
      expect(first?.status).toBe(AssignmentStatus.NotStarted);
      expect(second?.status).toBe(AssignmentStatus.Completed);
    });

    it('returns false and leaves the file untouched for an unknown ID', () => {
      repo.create({ title: 'Only', dueDate: NOW });
      const before = readFileSync(filePath, 'utf8');

      expect(repo.updateStatus(99, AssignmentStatus.Completed)).toBe(false);
      expect(readFileSync(filePath, 'utf8')).toBe(before);
    });
  });
});
