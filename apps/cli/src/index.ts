#!/usr/bin/env node

import { loadConfig, openTracker } from '@deadline-tracker/core';
import { createProgram } from './program.js';
import * as out from './output.js';

function main(): void {
  const config = loadConfig();
  const logger = out.createConsoleLogger(config.logLevel);
  const tracker = openTracker({
    dataDir: config.dataDir,
    logger,
    backups: config.backupsEnabled,
  });

  createProgram(tracker).parse();
}

try {
  main();
} catch (err: unknown) {
  out.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
