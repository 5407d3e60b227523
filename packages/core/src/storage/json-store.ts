/**
 * Flat-file backing store: one JSON array per collection.
 * Every save replaces the whole file; nothing is appended or patched.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { TrackerError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { BackupManager } from '../backup/backup-manager.js';

export interface JsonStoreOptions {
  logger?: Logger;
  /** When set, the current file is copied aside before every save */
  backups?: BackupManager;
}

export class JsonStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private readonly backups: BackupManager | null;

  constructor(filePath: string, options: JsonStoreOptions = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? silentLogger;
    this.backups = options.backups ?? null;
  }

  /** Create the file with an empty array if it does not exist yet */
  ensure(): void {
    if (existsSync(this.filePath)) return;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, '[]\n', 'utf8');
  }

  /**
   * Read the raw records. A missing, unreadable or malformed file yields an
   * empty array and a warning; nothing is thrown.
   */
  load(): unknown[] {
    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (err: unknown) {
      this.logger.warn(`Could not read ${this.filePath}: ${describe(err)}`);
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err: unknown) {
      this.logger.warn(`Could not parse ${this.filePath}, treating it as empty: ${describe(err)}`);
      return [];
    }

    if (!Array.isArray(data)) {
      this.logger.warn(`Expected a JSON array in ${this.filePath}, treating it as empty`);
      return [];
    }
    return data;
  }

  /** Replace the file contents with the given records; failures throw IO_ERROR */
  save(records: readonly object[]): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
    } catch (err: unknown) {
      throw TrackerError.io(`Could not write ${this.filePath}: ${describe(err)}`);
    }
    this.backups?.createBackup(this.filePath);

    // Write beside the target, then rename over it
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(records, null, 2) + '\n', 'utf8');
      renameSync(tmpPath, this.filePath);
    } catch (err: unknown) {
      rmSync(tmpPath, { force: true });
      throw TrackerError.io(`Could not write ${this.filePath}: ${describe(err)}`);
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
