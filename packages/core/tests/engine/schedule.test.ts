import { describe, it, expect } from 'vitest';
import { recommendWorkSchedule, urgencyScore, totalAllocatedHours } from '../../src/engine/schedule.js';
import { MemoryLogger } from '../../src/logger.js';
import { AssignmentStatus } from '../../src/types/assignment-status.js';
import { NOW, dueIn, makeAssignment } from './fixtures.js';

describe('urgencyScore', () => {
  it('blends risk with the inverse of the days left', () => {
    const a = makeAssignment({ dueDate: dueIn(1), priority: 10, estimatedHours: 10 });
    // risk 0.86, imminence 1
    expect(urgencyScore(a, NOW)).toBeCloseTo(0.902, 10);
  });

  it('counts overdue work as one day out', () => {
    const overdue = makeAssignment({ dueDate: dueIn(-2), priority: 3, estimatedHours: 2 });
    const today = makeAssignment({ dueDate: dueIn(0), priority: 3, estimatedHours: 2 });
    expect(urgencyScore(overdue, NOW)).toBe(urgencyScore(today, NOW));
  });
});

describe('recommendWorkSchedule', () => {
  it('returns nothing without pending work', () => {
    expect(recommendWorkSchedule([], 8, { now: NOW })).toEqual([]);
    const done = makeAssignment({ status: AssignmentStatus.Completed, estimatedHours: 5 });
    expect(recommendWorkSchedule([done], 8, { now: NOW })).toEqual([]);
  });

  it('serves the most urgent assignment first', () => {
    const relaxed = makeAssignment({ id: 1, title: 'B', dueDate: dueIn(30), priority: 1, estimatedHours: 1 });
    const pressing = makeAssignment({ id: 2, title: 'A', dueDate: dueIn(1), priority: 10, estimatedHours: 10 });

    const schedule = recommendWorkSchedule([relaxed, pressing], 8, { now: NOW });

    expect(schedule.map(e => e.assignment.id)).toEqual([2, 1]);
    expect(schedule[0]?.allocatedHours).toBe(6);
    expect(schedule[0]?.riskLevel).toBe('high');
    expect(schedule[1]?.allocatedHours).toBeCloseTo(0.6, 10);
    expect(schedule[1]?.riskLevel).toBe('low');
    expect(totalAllocatedHours(schedule)).toBeCloseTo(6.6, 10);
  });

  it('stops once the budget is used up', () => {
    const assignments = [
      makeAssignment({ id: 1, dueDate: dueIn(1), priority: 10, estimatedHours: 10 }),
      makeAssignment({ id: 2, dueDate: dueIn(2), priority: 10, estimatedHours: 10 }),
      makeAssignment({ id: 3, dueDate: dueIn(3), priority: 10, estimatedHours: 10 }),
    ];

    const schedule = recommendWorkSchedule(assignments, 8, { now: NOW });

    expect(schedule.map(e => [e.assignment.id, e.allocatedHours])).toEqual([[1, 6], [2, 2]]);
  });

  it('skips allocations of half an hour or less and logs them', () => {
    const logger = new MemoryLogger();
    const small = makeAssignment({ id: 1, dueDate: dueIn(1), priority: 10, estimatedHours: 0.5 });
    const big = makeAssignment({ id: 2, dueDate: dueIn(20), priority: 2, estimatedHours: 5 });

    const schedule = recommendWorkSchedule([small, big], 8, { now: NOW, logger });

    expect(schedule.map(e => e.assignment.id)).toEqual([2]);
    expect(schedule[0]?.allocatedHours).toBeCloseTo(3, 10);
    expect(logger.messages('info')).toEqual(['Skipping assignment 1: 0.30h is too short to schedule']);
  });

  it('skips an assignment when only a sliver of budget is left', () => {
    const logger = new MemoryLogger();
    const first = makeAssignment({ id: 1, dueDate: dueIn(1), priority: 10, estimatedHours: 10 });
    const second = makeAssignment({ id: 2, dueDate: dueIn(20), priority: 2, estimatedHours: 2 });

    const schedule = recommendWorkSchedule([first, second], 6.4, { now: NOW, logger });

    expect(schedule.map(e => e.assignment.id)).toEqual([1]);
    expect(logger.messages('info')).toEqual(['Skipping assignment 2: 0.40h is too short to schedule']);
  });

  it('never exceeds the available hours', () => {
    const assignments = [4, 9, 1.5, 12, 0.7, 3].map((hours, i) =>
      makeAssignment({ id: i + 1, dueDate: dueIn(i), priority: 10 - i, estimatedHours: hours }),
    );

    const schedule = recommendWorkSchedule(assignments, 5, { now: NOW });

    expect(totalAllocatedHours(schedule)).toBeLessThanOrEqual(5);
    for (const entry of schedule) expect(entry.allocatedHours).toBeGreaterThan(0.5);
  });

  it('keeps input order for equal urgency', () => {
    const a = makeAssignment({ id: 1, estimatedHours: 2 });
    const b = makeAssignment({ id: 2, estimatedHours: 2 });

    expect(recommendWorkSchedule([a, b], 8, { now: NOW }).map(e => e.assignment.id)).toEqual([1, 2]);
    expect(recommendWorkSchedule([b, a], 8, { now: NOW }).map(e => e.assignment.id)).toEqual([2, 1]);
  });

  it('defaults to eight available hours', () => {
    const assignments = [1, 2, 3].map(id => makeAssignment({ id, estimatedHours: 10 }));
    const schedule = recommendWorkSchedule(assignments, undefined, { now: NOW });
    expect(totalAllocatedHours(schedule)).toBe(8);
  });

  it('includes in-progress work and leaves completed work out', () => {
    const assignments = [
      makeAssignment({ id: 1, status: AssignmentStatus.Completed, estimatedHours: 3 }),
      makeAssignment({ id: 2, status: AssignmentStatus.InProgress, estimatedHours: 3 }),
    ];
    expect(recommendWorkSchedule(assignments, 8, { now: NOW }).map(e => e.assignment.id)).toEqual([2]);
  });
});
