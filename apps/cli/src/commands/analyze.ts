import { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_AVAILABLE_HOURS, RiskLevel, assessPendingRisks, recommendWorkSchedule, totalAllocatedHours,
} from '@deadline-tracker/core';
import type { Tracker } from '@deadline-tracker/core';
import * as out from '../output.js';
import { $try, parseNumberArg } from '../helpers.js';

function riskIcon(level: RiskLevel): string {
  switch (level) {
    case RiskLevel.High: return chalk.red('●');
    case RiskLevel.Medium: return chalk.yellow('●');
    default: return chalk.green('●');
  }
}

export function createAnalyzeCommand(tracker: Tracker): Command {
  return new Command('analyze')
    .description('Show completion risk and a recommended work schedule for pending assignments')
    .option('-H, --hours <n>', 'Hours available for the schedule', String(DEFAULT_AVAILABLE_HOURS))
    .action((opts: { hours: string }) => $try(() => {
      const availableHours = parseNumberArg('schedule', 'hours', opts.hours);
      const assignments = tracker.assignments.getAll();
      const now = new Date();
      const risks = assessPendingRisks(assignments, now);

      if (risks.length === 0) {
        out.info('No pending assignments for analysis');
        return;
      }

      out.heading(`Risk Analysis (${risks.length} pending)`);
      for (const r of risks) {
        console.log(`${riskIcon(r.level)} ${r.assignment.title}: ${out.formatRiskLevel(r.level)} (score: ${out.formatScore(r.score)})`);
      }
      console.log();

      out.heading(`Recommended Work Schedule (${out.formatHours(availableHours)} available)`);
      const schedule = recommendWorkSchedule(assignments, availableHours, { now, logger: tracker.logger });
      if (schedule.length === 0) {
        out.info('Nothing fits in the available time');
        return;
      }

      schedule.forEach((entry, i) => {
        console.log(`${i + 1}. ${entry.assignment.title}: ${out.formatHours(entry.allocatedHours)} (risk: ${out.formatRiskLevel(entry.riskLevel)})`);
      });
      console.log(chalk.dim(`Total: ${out.formatHours(totalAllocatedHours(schedule))}`));
    }));
}
