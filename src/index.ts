#!/usr/bin/env node
/**
 * CLI entry point for download-outcome.
 *
 * Kept intentionally thin: parsing and dispatch live in `cli/main.ts`. The
 * process exit status is the outcome's exit code (0 success, 1 failure,
 * 2 timeout), so schedulers can branch on it without reading the output.
 */

import { hideBin } from 'yargs/helpers';

import { run } from './cli/main.js';

run(hideBin(process.argv))
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    console.error('[FATAL]', error);
    process.exit(1);
  });
