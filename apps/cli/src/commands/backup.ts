import { Command } from 'commander';
import chalk from 'chalk';
import { formatBackupTimestamp } from '@deadline-tracker/core';
import type { Tracker } from '@deadline-tracker/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

const STORES = ['notes', 'assignments'] as const;
type StoreName = (typeof STORES)[number];

function isStoreName(value: string): value is StoreName {
  return (STORES as readonly string[]).includes(value);
}

function storeFile(tracker: Tracker, store: StoreName): string {
  return store === 'notes' ? tracker.paths.notesFile : tracker.paths.assignmentsFile;
}

export function createBackupCommand(tracker: Tracker): Command {
  const backupCommand = new Command('backup')
    .description('Manage backups of the note and assignment stores');

  backupCommand.addCommand(
    new Command('list')
      .description('List available backups')
      .argument('[store]', 'notes or assignments (default: both)')
      .action((store: string | undefined) => $try(() => {
        if (store !== undefined && !isStoreName(store)) {
          out.error(`Unknown store: '${store}'. Use: ${STORES.join(', ')}`);
          process.exitCode = 1;
          return;
        }

        const backups = tracker.backups.listBackups(store);
        if (backups.length === 0) {
          out.info('No backups available.');
          return;
        }

        console.log(`${chalk.bold('Available backups:')}\n`);
        backups.forEach((b, i) => {
          const age = out.getTimeAgo(b.timestamp);
          const type = b.isDaily ? ` ${chalk.dim('(daily)')}` : '';
          console.log(`  ${String(i + 1).padStart(2)}. ${b.storeName.padEnd(12)} ${age.padEnd(12)} (${formatBackupTimestamp(b.timestamp)})${type}`);
        });
      })),
  );

  backupCommand.addCommand(
    new Command('restore')
      .description('Restore a store from a backup')
      .argument('<store>', 'notes or assignments')
      .argument('[index]', 'Backup number from "backup list <store>" (1 = most recent)', '1')
      .option('--force', 'Skip confirmation prompt')
      .action((store: string, indexStr: string, opts: { force?: boolean }) => $try(() => {
        if (!isStoreName(store)) {
          out.error(`Unknown store: '${store}'. Use: ${STORES.join(', ')}`);
          process.exitCode = 1;
          return;
        }

        const backups = tracker.backups.listBackups(store);
        if (backups.length === 0) {
          out.error('No backups available. Backups are created automatically before each change.');
          process.exitCode = 1;
          return;
        }

        const index = parseId(indexStr);
        if (index == null) {
          out.error(`Invalid backup number: '${indexStr}'`);
          process.exitCode = 1;
          return;
        }
        const chosen = backups[index - 1];
        if (chosen === undefined) {
          out.error(`Backup #${index} not found. Use 'tracker backup list ${store}' to see available backups (1-${backups.length}).`);
          process.exitCode = 1;
          return;
        }

        const label = formatBackupTimestamp(chosen.timestamp);
        if (!opts.force) {
          out.warning(`This will restore ${store} from backup ${label}`);
          out.info('The current file will be backed up before restore.');
          out.info('Use --force to skip this confirmation.');
          return;
        }

        tracker.backups.restoreBackup(storeFile(tracker, store), chosen.timestamp);
        out.success(`Restored ${store} from backup ${label}`);
      })),
  );

  return backupCommand;
}
