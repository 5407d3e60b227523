import { JsonStore } from './storage/json-store.js';
import { NoteRepository } from './repositories/note-repository.js';
import { AssignmentRepository } from './repositories/assignment-repository.js';
import { BackupManager } from './backup/backup-manager.js';
import { resolveTrackerPaths } from './config.js';
import type { TrackerPaths } from './config.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface OpenTrackerOptions {
  dataDir: string;
  logger?: Logger;
  /** Copy each store aside before it is overwritten. Default true. */
  backups?: boolean;
  now?: () => Date;
}

export interface Tracker {
  readonly paths: TrackerPaths;
  readonly notes: NoteRepository;
  readonly assignments: AssignmentRepository;
  readonly backups: BackupManager;
  readonly logger: Logger;
}

/** Wire stores, repositories and the backup manager for one data directory */
export function openTracker(options: OpenTrackerOptions): Tracker {
  const logger = options.logger ?? silentLogger;
  const paths = resolveTrackerPaths(options.dataDir);
  const backups = new BackupManager(paths.backupDir, { logger, now: options.now });
  const storeOptions = { logger, backups: options.backups === false ? undefined : backups };
  const repoOptions = { logger, now: options.now };

  return {
    paths,
    notes: new NoteRepository(new JsonStore(paths.notesFile, storeOptions), repoOptions),
    assignments: new AssignmentRepository(new JsonStore(paths.assignmentsFile, storeOptions), repoOptions),
    backups,
    logger,
  };
}
