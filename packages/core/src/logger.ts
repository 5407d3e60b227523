/**
 * Diagnostics sink passed explicitly to stores, repositories and the scheduler.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

const MAX_ENTRIES = 200;

/** Keeps the most recent entries in memory; used by tests to capture warnings */
export class MemoryLogger implements Logger {
  private readonly buffer: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = MAX_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  info(message: string): void {
    this.push('info', message);
  }

  warn(message: string): void {
    this.push('warn', message);
  }

  error(message: string): void {
    this.push('error', message);
  }

  get entries(): readonly LogEntry[] {
    return [...this.buffer];
  }

  messages(level?: LogLevel): string[] {
    return this.buffer
      .filter(e => level === undefined || e.level === level)
      .map(e => e.message);
  }

  clear(): void {
    this.buffer.length = 0;
  }

  private push(level: LogLevel, message: string): void {
    this.buffer.push({ timestamp: Date.now(), level, message });
    if (this.buffer.length > this.maxEntries) this.buffer.shift();
  }
}
