/**
 * Greedy split of a daily time budget across pending assignments,
 * most urgent first.
 */

import type { Assignment } from '../types/assignment.js';
import { daysUntilDue } from '../types/assignment.js';
import { AssignmentStatus } from '../types/assignment-status.js';
import type { RiskLevel } from '../types/risk-level.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { predictCompletionRisk } from './risk.js';

export const DEFAULT_AVAILABLE_HOURS = 8.0;

/** Share of an assignment's estimate offered in one session */
const SESSION_FRACTION = 0.6;
/** Allocations at or below this are dropped */
const MIN_ALLOCATION_HOURS = 0.5;

const RISK_WEIGHT = 0.7;
const IMMINENCE_WEIGHT = 0.3;

export interface ScheduleEntry {
  readonly assignment: Assignment;
  readonly allocatedHours: number;
  readonly riskLevel: RiskLevel;
}

export interface ScheduleOptions {
  now?: Date;
  logger?: Logger;
}

interface Ranked {
  readonly assignment: Assignment;
  readonly urgency: number;
  readonly riskLevel: RiskLevel;
}

/** Risk blended with the inverse of the days left; dominates for very close deadlines */
export function urgencyScore(assignment: Assignment, now: Date = new Date()): number {
  const { score } = predictCompletionRisk(assignment, now);
  return score * RISK_WEIGHT + (1 / Math.max(1, daysUntilDue(assignment, now))) * IMMINENCE_WEIGHT;
}

export function recommendWorkSchedule(
  assignments: readonly Assignment[],
  availableHours: number = DEFAULT_AVAILABLE_HOURS,
  options: ScheduleOptions = {},
): ScheduleEntry[] {
  const now = options.now ?? new Date();
  const logger = options.logger ?? silentLogger;

  const pending = assignments.filter(a => a.status !== AssignmentStatus.Completed);
  if (pending.length === 0) return [];

  // Array#sort is stable: equal urgency keeps input order
  const ranked: Ranked[] = pending
    .map(a => ({
      assignment: a,
      urgency: urgencyScore(a, now),
      riskLevel: predictCompletionRisk(a, now).level,
    }))
    .sort((a, b) => b.urgency - a.urgency);

  const schedule: ScheduleEntry[] = [];
  let remaining = availableHours;

  for (const { assignment, riskLevel } of ranked) {
    if (remaining <= 0) break;

    const allocated = Math.min(assignment.estimatedHours * SESSION_FRACTION, remaining);
    if (allocated > MIN_ALLOCATION_HOURS) {
      schedule.push({ assignment, allocatedHours: allocated, riskLevel });
      remaining -= allocated;
    } else {
      logger.info(`Skipping assignment ${assignment.id}: ${allocated.toFixed(2)}h is too short to schedule`);
    }
  }

  return schedule;
}

export function totalAllocatedHours(schedule: readonly ScheduleEntry[]): number {
  return schedule.reduce((sum, entry) => sum + entry.allocatedHours, 0);
}
