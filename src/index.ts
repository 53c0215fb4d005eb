#!/usr/bin/env node
/**
 * snipgrep
 *
 * Searches files for a regular expression and prints a trimmed,
 * context-bounded excerpt of every match.
 *
 * Usage:
 *   snipgrep [options] <pattern> [path...]
 *   snipgrep -n --include='*.ts' 'function main' src/
 */
import { runCli } from './cli/run.js';
import { logger } from './lib/logger.js';

process.on('SIGTERM', () => {
  process.exit(143);
});

process.on('SIGINT', () => {
  process.exit(130);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.critical(
      error instanceof Error ? error.message : String(error),
      'snipgrep'
    );
    process.exitCode = 2;
  });
