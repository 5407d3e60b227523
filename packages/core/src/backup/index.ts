export { BackupManager, formatBackupTimestamp } from './backup-manager.js';
export type { BackupInfo, BackupManagerOptions } from './backup-manager.js';
