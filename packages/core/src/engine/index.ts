export { predictCompletionRisk, classifyRisk, riskFactors, assessPendingRisks } from './risk.js';
export type { RiskInput, RiskAssessment, RiskFactors, PendingRisk } from './risk.js';
export { recommendWorkSchedule, urgencyScore, totalAllocatedHours, DEFAULT_AVAILABLE_HOURS } from './schedule.js';
export type { ScheduleEntry, ScheduleOptions } from './schedule.js';
export { summarize } from './summary.js';
export type { TrackerSummary } from './summary.js';
