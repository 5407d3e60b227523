/**
 * Completion-risk heuristic: a fixed weighted sum of deadline proximity,
 * declared priority and estimated workload.
 */

import type { Assignment } from '../types/assignment.js';
import { daysUntilDue } from '../types/assignment.js';
import { AssignmentStatus } from '../types/assignment-status.js';
import { RiskLevel } from '../types/risk-level.js';

/** Days before the due date at which urgency starts to grow */
const DAYS_HORIZON = 10;
/** Workload at which the hours factor saturates */
const HOURS_CAP = 20;

const DAYS_WEIGHT = 0.4;
const PRIORITY_WEIGHT = 0.4;
const HOURS_WEIGHT = 0.2;

const MEDIUM_THRESHOLD = 0.3;
const HIGH_THRESHOLD = 0.7;

export type RiskInput = Pick<Assignment, 'dueDate' | 'priority' | 'estimatedHours'>;

export interface RiskAssessment {
  readonly level: RiskLevel;
  /** In [0, 1] */
  readonly score: number;
}

export interface RiskFactors {
  readonly days: number;
  readonly priority: number;
  readonly hours: number;
}

export function riskFactors(assignment: RiskInput, now: Date = new Date()): RiskFactors {
  const days = daysUntilDue(assignment, now);
  return {
    days: Math.max(0, DAYS_HORIZON - days) / DAYS_HORIZON,
    priority: assignment.priority / 10,
    hours: Math.min(assignment.estimatedHours / HOURS_CAP, 1),
  };
}

/** score < 0.3 is low, below 0.7 medium, anything else high */
export function classifyRisk(score: number): RiskLevel {
  if (score < MEDIUM_THRESHOLD) return RiskLevel.Low;
  if (score < HIGH_THRESHOLD) return RiskLevel.Medium;
  return RiskLevel.High;
}

export function predictCompletionRisk(assignment: RiskInput, now: Date = new Date()): RiskAssessment {
  const f = riskFactors(assignment, now);
  const raw = f.days * DAYS_WEIGHT + f.priority * PRIORITY_WEIGHT + f.hours * HOURS_WEIGHT;
  const score = Math.max(0, Math.min(1, raw));
  return { level: classifyRisk(score), score };
}

export interface PendingRisk extends RiskAssessment {
  readonly assignment: Assignment;
}

/** Risk for every assignment not yet completed, in input order */
export function assessPendingRisks(assignments: readonly Assignment[], now: Date = new Date()): PendingRisk[] {
  return assignments
    .filter(a => a.status !== AssignmentStatus.Completed)
    .map(a => ({ assignment: a, ...predictCompletionRisk(a, now) }));
}
