#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for the ibhist command.
 *
 * Thin wrapper around cli/program.ts; loads .env before configuration is read.
 */

import 'dotenv/config';
import { main } from './cli/program.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
