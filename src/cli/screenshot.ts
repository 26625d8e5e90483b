#!/usr/bin/env node
/**
 * CLI: Screenshot a URL list
 *
 * Usage:
 *   screensweep --urls <file>
 *
 * Example:
 *   screensweep -u ./urls.txt
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
);
