import { describe, it, expect } from 'vitest';
import {
  predictCompletionRisk, classifyRisk, riskFactors, assessPendingRisks,
} from '../../src/engine/risk.js';
import { daysUntilDue } from '../../src/types/assignment.js';
import { AssignmentStatus } from '../../src/types/assignment-status.js';
import { NOW, dueIn, makeAssignment } from './fixtures.js';

describe('daysUntilDue', () => {
  it('floors partial days', () => {
    expect(daysUntilDue({ dueDate: dueIn(2, 23) }, NOW)).toBe(2);
    expect(daysUntilDue({ dueDate: dueIn(0, 23) }, NOW)).toBe(0);
  });

  it('counts local calendar days across daylight-saving changes', () => {
    for (let day = 0; day < 365; day++) {
      const now = new Date(2026, 0, 1 + day, 12);
      const due = new Date(2026, 0, 3 + day, 12);
      expect(daysUntilDue({ dueDate: due }, now)).toBe(2);
    }
  });

  it('clamps overdue deadlines to zero', () => {
    expect(daysUntilDue({ dueDate: dueIn(0, -1) }, NOW)).toBe(0);
    expect(daysUntilDue({ dueDate: dueIn(-12) }, NOW)).toBe(0);
  });
});

describe('riskFactors', () => {
  it('normalises each factor to [0, 1]', () => {
    const f = riskFactors({ dueDate: dueIn(2), priority: 9, estimatedHours: 15 }, NOW);
    expect(f.days).toBeCloseTo(0.8, 10);
    expect(f.priority).toBeCloseTo(0.9, 10);
    expect(f.hours).toBeCloseTo(0.75, 10);
  });

  it('saturates the hours factor at 20 hours', () => {
    expect(riskFactors({ dueDate: dueIn(2), priority: 5, estimatedHours: 40 }, NOW).hours).toBe(1);
  });

  it('drops the days factor to zero beyond ten days', () => {
    expect(riskFactors({ dueDate: dueIn(10), priority: 5, estimatedHours: 1 }, NOW).days).toBe(0);
    expect(riskFactors({ dueDate: dueIn(45), priority: 5, estimatedHours: 1 }, NOW).days).toBe(0);
  });
});

describe('predictCompletionRisk', () => {
  it('rates a near, important, heavy assignment as high', () => {
    const risk = predictCompletionRisk({ dueDate: dueIn(2), priority: 9, estimatedHours: 15 }, NOW);
    expect(risk.score).toBeCloseTo(0.83, 10);
    expect(risk.level).toBe('high');
  });

  it('rates a middling assignment as medium', () => {
    const risk = predictCompletionRisk({ dueDate: dueIn(5), priority: 5, estimatedHours: 4 }, NOW);
    expect(risk.score).toBeCloseTo(0.44, 10);
    expect(risk.level).toBe('medium');
  });

  it('rates a distant, minor, light assignment as low', () => {
    const risk = predictCompletionRisk({ dueDate: dueIn(30), priority: 1, estimatedHours: 1 }, NOW);
    expect(risk.score).toBeCloseTo(0.05, 10);
    expect(risk.level).toBe('low');
  });

  it('treats overdue the same as due today', () => {
    const overdue = predictCompletionRisk({ dueDate: dueIn(-3), priority: 4, estimatedHours: 2 }, NOW);
    const today = predictCompletionRisk({ dueDate: dueIn(0), priority: 4, estimatedHours: 2 }, NOW);
    expect(overdue).toEqual(today);
  });

  it('clamps the score to 1', () => {
    const risk = predictCompletionRisk({ dueDate: dueIn(0), priority: 12, estimatedHours: 50 }, NOW);
    expect(risk.score).toBe(1);
    expect(risk.level).toBe('high');
  });

  it('gives the same answer for the same inputs', () => {
    const input = { dueDate: dueIn(4), priority: 6, estimatedHours: 7 };
    expect(predictCompletionRisk(input, NOW)).toEqual(predictCompletionRisk(input, NOW));
  });
});

describe('classifyRisk', () => {
  it('uses 0.3 and 0.7 as lower bounds of medium and high', () => {
    expect(classifyRisk(0)).toBe('low');
    expect(classifyRisk(0.2999)).toBe('low');
    expect(classifyRisk(0.3)).toBe('medium');
    expect(classifyRisk(0.6999)).toBe('medium');
    expect(classifyRisk(0.7)).toBe('high');
    expect(classifyRisk(1)).toBe('high');
  });
});

describe('assessPendingRisks', () => {
  it('skips completed assignments and keeps input order', () => {
    const assignments = [
      makeAssignment({ id: 1, status: AssignmentStatus.InProgress }),
      makeAssignment({ id: 2, status: AssignmentStatus.Completed }),
      makeAssignment({ id: 3 }),
    ];
    expect(assessPendingRisks(assignments, NOW).map(r => r.assignment.id)).toEqual([1, 3]);
  });
});
