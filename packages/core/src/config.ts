/**
 * Environment-driven configuration and data-directory layout.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { TrackerError } from './errors.js';
import type { LogLevel } from './logger.js';

const APP_DIR = 'deadline-tracker';

export interface TrackerConfig {
  readonly dataDir: string;
  readonly backupsEnabled: boolean;
  readonly logLevel: LogLevel;
}

export interface TrackerPaths {
  readonly dataDir: string;
  readonly notesFile: string;
  readonly assignmentsFile: string;
  readonly backupDir: string;
}

/** Returns the platform-appropriate default data directory */
export function getDefaultDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

export function resolveTrackerPaths(dataDir: string): TrackerPaths {
  return {
    dataDir,
    notesFile: join(dataDir, 'notes.json'),
    assignmentsFile: join(dataDir, 'assignments.json'),
    backupDir: join(dataDir, 'backups'),
  };
}

const SwitchSchema = z
  .enum(['on', 'off', '1', '0', 'true', 'false'])
  .transform((v) => v === 'on' || v === '1' || v === 'true');

const EnvSchema = z.object({
  DEADLINE_TRACKER_HOME: z.string().min(1).optional(),
  DEADLINE_TRACKER_BACKUPS: SwitchSchema.default('on'),
  DEADLINE_TRACKER_LOG_LEVEL: z.enum(['info', 'warn', 'error']).default('warn'),
});

/** Read configuration from the environment; throws CONFIG_ERROR on bad values */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const parsed = EnvSchema.safeParse({
    DEADLINE_TRACKER_HOME: blankToUndefined(env['DEADLINE_TRACKER_HOME']),
    DEADLINE_TRACKER_BACKUPS: blankToUndefined(env['DEADLINE_TRACKER_BACKUPS'])?.toLowerCase(),
    DEADLINE_TRACKER_LOG_LEVEL: blankToUndefined(env['DEADLINE_TRACKER_LOG_LEVEL'])?.toLowerCase(),
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw TrackerError.config(`Invalid configuration: ${details}`);
  }

  return {
    dataDir: parsed.data.DEADLINE_TRACKER_HOME ?? getDefaultDataDir(process.platform, env),
    backupsEnabled: parsed.data.DEADLINE_TRACKER_BACKUPS,
    logLevel: parsed.data.DEADLINE_TRACKER_LOG_LEVEL,
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}
