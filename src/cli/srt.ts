#!/usr/bin/env node
/**
 * Command-line entry point
 * Run with: npx srt <subcommand> [args]
 */

import { runCli } from './runCli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
  });
