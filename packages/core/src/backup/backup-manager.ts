/**
 * Manages backup copies of the JSON stores: creation, rotation, restoration.
 * A copy is taken before each overwrite, so records dropped on load survive
 * the next save in the backup directory.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from 'node:fs';
import { join, basename } from 'node:path';
import { TrackerError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

const MAX_VERSION_BACKUPS = 10;
const MAX_DAILY_BACKUP_DAYS = 7;
const BACKUP_EXT = '.backup.json';
const DAILY_PREFIX = 'daily.';
const PRE_RESTORE_PREFIX = 'pre-restore.';
const VERSION_FORMAT_RE = /^(.+)\.(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3})\.backup\.json$/;
const DAILY_FORMAT_RE = /^(.+)\.daily\.(\d{4}-\d{2}-\d{2})\.backup\.json$/;

export interface BackupInfo {
  filePath: string;
  /** Store file name the backup was taken from, e.g. `notes` */
  storeName: string;
  timestamp: Date;
  isDaily: boolean;
  fileSize: number;
}

export interface BackupManagerOptions {
  logger?: Logger;
  now?: () => Date;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Format a date as yyyy-MM-ddTHH-mm-ss-SSS (filesystem-safe) */
export function formatBackupTimestamp(d: Date): string {
  return `${formatDate(d)}T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}-${pad(d.getMilliseconds(), 3)}`;
}

/** Format a date as yyyy-MM-dd */
function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** `notes.json` -> `notes` */
function storeNameOf(storeFile: string): string {
  return basename(storeFile).replace(/\.json$/, '');
}

export class BackupManager {
  private readonly backupDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(backupDir: string, options: BackupManagerOptions = {}) {
    this.backupDir = backupDir;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get directory(): string {
    return this.backupDir;
  }

  /** Copy the store before it is overwritten. Failures are logged, never thrown. */
  createBackup(storeFile: string): void {
    if (!existsSync(storeFile)) return;
    try {
      this.ensureDir();
      const now = this.now();
      const name = storeNameOf(storeFile);
      copyFileSync(storeFile, this.versionPath(name, now));
      this.createDailyIfNeeded(storeFile, name, now);
      this.rotate(name, now);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Backup of ${storeFile} failed: ${reason}`);
    }
  }

  /** List available backups, newest first */
  listBackups(storeName?: string): BackupInfo[] {
    if (!existsSync(this.backupDir)) return [];

    const backups: BackupInfo[] = [];
    for (const name of readdirSync(this.backupDir)) {
      if (!name.endsWith(BACKUP_EXT)) continue;
      const info = this.parseBackupFile(join(this.backupDir, name));
      if (info && (storeName === undefined || info.storeName === storeName)) backups.push(info);
    }

    return backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  /** Restore a store from a specific backup. Creates a safety backup first. */
  restoreBackup(storeFile: string, timestamp: Date): void {
    const name = storeNameOf(storeFile);
    const backupPath = this.findByTimestamp(name, timestamp);
    if (!backupPath) {
      throw TrackerError.notFound('Backup', `${name} from ${timestamp.toISOString()}`);
    }

    if (existsSync(storeFile)) {
      this.ensureDir();
      copyFileSync(storeFile, this.preRestorePath(name, this.now()));
    }

    copyFileSync(backupPath, storeFile);
    this.logger.info(`Restored ${storeFile} from ${basename(backupPath)}`);
  }

  private ensureDir(): void {
    if (!existsSync(this.backupDir)) {
      mkdirSync(this.backupDir, { recursive: true });
    }
  }

  private createDailyIfNeeded(storeFile: string, name: string, now: Date): void {
    const path = this.dailyPath(name, now);
    if (existsSync(path)) return;
    copyFileSync(storeFile, path);
  }

  private rotate(name: string, now: Date): void {
    const backups = this.listBackups(name);

    const versions = backups.filter(b => !b.isDaily);
    for (const backup of versions.slice(MAX_VERSION_BACKUPS)) {
      this.tryDelete(backup.filePath);
    }

    const cutoff = new Date(now);
    cutoff.setDate(cutoff.getDate() - MAX_DAILY_BACKUP_DAYS);
    for (const backup of backups.filter(b => b.isDaily && b.timestamp < cutoff)) {
      this.tryDelete(backup.filePath);
    }
  }

  private tryDelete(path: string): void {
    try {
      unlinkSync(path);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not remove old backup ${path}: ${reason}`);
    }
  }

  private findByTimestamp(name: string, timestamp: Date): string | null {
    if (!existsSync(this.backupDir)) return null;

    const vPath = this.versionPath(name, timestamp);
    if (existsSync(vPath)) return vPath;

    const dPath = this.dailyPath(name, timestamp);
    if (existsSync(dPath)) return dPath;

    return null;
  }

  private parseBackupFile(filePath: string): BackupInfo | null {
    const name = basename(filePath);

    // pre-restore copies are kept but not offered for listing or rotation
    if (name.includes(`.${PRE_RESTORE_PREFIX}`)) return null;

    const dMatch = DAILY_FORMAT_RE.exec(name);
    if (dMatch?.[1] !== undefined && dMatch[2] !== undefined) {
      const d = new Date(`${dMatch[2]}T00:00:00`);
      if (!isNaN(d.getTime())) {
        return { filePath, storeName: dMatch[1], timestamp: d, isDaily: true, fileSize: statSync(filePath).size };
      }
    }

    const vMatch = VERSION_FORMAT_RE.exec(name);
    if (vMatch?.[1] !== undefined && vMatch[2] !== undefined) {
      const ts = vMatch[2].replace(/T(\d{2})-(\d{2})-(\d{2})-(\d{3})$/, 'T$1:$2:$3.$4');
      const d = new Date(ts);
      if (!isNaN(d.getTime())) {
        return { filePath, storeName: vMatch[1], timestamp: d, isDaily: false, fileSize: statSync(filePath).size };
      }
    }

    return null;
  }

  private versionPath(name: string, d: Date): string {
    return join(this.backupDir, `${name}.${formatBackupTimestamp(d)}${BACKUP_EXT}`);
  }

  private dailyPath(name: string, d: Date): string {
    return join(this.backupDir, `${name}.${DAILY_PREFIX}${formatDate(d)}${BACKUP_EXT}`);
  }

  private preRestorePath(name: string, d: Date): string {
    return join(this.backupDir, `${name}.${PRE_RESTORE_PREFIX}${formatBackupTimestamp(d)}${BACKUP_EXT}`);
  }
}
