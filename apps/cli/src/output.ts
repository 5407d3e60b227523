/**
 * chalk-based console output and the console logger handed to the core.
 */

import chalk from 'chalk';
import { AssignmentStatus, NotePriority, RiskLevel } from '@deadline-tracker/core';
import type { Logger, LogLevel } from '@deadline-tracker/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatStatusIcon(status: AssignmentStatus): string {
  switch (status) {
    case AssignmentStatus.Completed: return chalk.green('✓');
    case AssignmentStatus.InProgress: return chalk.yellow('◐');
    default: return chalk.gray('○');
  }
}

export function formatRiskLevel(level: RiskLevel): string {
  switch (level) {
    case RiskLevel.High: return chalk.red.bold(level);
    case RiskLevel.Medium: return chalk.yellow(level);
    default: return chalk.green(level);
  }
}

export function formatNotePriority(priority: NotePriority): string {
  switch (priority) {
    case NotePriority.High: return chalk.red.bold(priority);
    case NotePriority.Medium: return chalk.yellow(priority);
    default: return chalk.blue(priority);
  }
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  return tags.map(t => tagColor(t)(`#${t}`)).join(' ');
}

/** Relative due label for an open assignment; overdue shows the day count */
export function formatDueLabel(dueDate: Date, now: Date = new Date()): string {
  const dueD = new Date(dueDate.getFullYear(), dueDate.getMonth(), dueDate.getDate());
  const todayD = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const diff = Math.round((dueD.getTime() - todayD.getTime()) / 86400000);

  if (diff < 0) return chalk.red(`OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('Due: Today');
  if (diff === 1) return chalk.dim('Due: Tomorrow');
  return chalk.dim(`Due: ${formatDate(dueDate)}`);
}

/** yyyy-MM-dd in local time */
export function formatDate(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** yyyy-MM-dd HH:mm in local time */
export function formatDateTime(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

export function formatHours(hours: number): string {
  return `${hours.toFixed(1)}h`;
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function heading(message: string): void {
  console.log(chalk.bold.underline(message));
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}

export function getTimeAgo(time: Date, now: Date = new Date()): string {
  const mins = (now.getTime() - time.getTime()) / 60000;
  if (mins < 1) return 'just now';
  if (mins < 60) return `${Math.floor(mins)}m ago`;
  const hours = mins / 60;
  if (hours < 24) return `${Math.floor(hours)}h ago`;
  const days = hours / 24;
  if (days < 7) return `${Math.floor(days)}d ago`;
  return formatDate(time);
}

// --- Logger ---

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

/** Diagnostics go to stderr so they never mix with command output */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const enabled = (l: LogLevel) => LEVEL_RANK[l] >= LEVEL_RANK[level];
  return {
    info: (message) => { if (enabled('info')) console.error(chalk.dim(message)); },
    warn: (message) => { if (enabled('warn')) console.error(chalk.yellow(`warning: ${message}`)); },
    error: (message) => { if (enabled('error')) console.error(chalk.red(`error: ${message}`)); },
  };
}
