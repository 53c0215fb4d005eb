import type { OutputVisibility, SearchConfig } from '../config/types.js';
import { createDetailedError, formatDetailedError } from '../lib/errors.js';
import { executeSearch } from '../lib/file-operations.js';
import { buildSearchConfig } from '../lib/file-operations/search/options.js';
import {
  formatMatch,
  formatOperationSummary,
  resolveVisibility,
} from '../lib/formatters.js';
import { logger, setLogLevel } from '../lib/logger.js';
import { parseArgs, type ParseArgsResult, toSearchOptions } from './args.js';
import { USAGE } from './usage.js';

export const EXIT_OK = 0;
export const EXIT_NO_FILES = 1;
export const EXIT_USAGE = 1;
export const EXIT_FATAL = 2;

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function describeError(error: unknown): string {
  return formatDetailedError(createDetailedError(error));
}

/** Run one CLI invocation and resolve to its exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo
): Promise<number> {
  let parsed: ParseArgsResult;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    logger.error(describeError(error), 'cli');
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  if (parsed.kind === 'help') {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const { args } = parsed;
  if (args.quiet) setLogLevel('error');

  let config: SearchConfig;
  try {
    config = buildSearchConfig(toSearchOptions(args));
  } catch (error) {
    logger.error(describeError(error), 'cli');
    return EXIT_FATAL;
  }

  let visibility: OutputVisibility = resolveVisibility(0, args);
  const summary = await executeSearch(config, args.paths, {
    onCandidates: (files) => {
      visibility = resolveVisibility(files.length, args);
    },
    onMatch: (record) => {
      io.stdout(formatMatch(record, visibility));
    },
    onWarning: (warning) => {
      logger.warning(formatDetailedError(warning), 'search');
    },
  });

  logger.info(formatOperationSummary(summary), 'search');

  if (summary.status === 'no-candidates') {
    io.stdout(formatOperationSummary(summary));
    return EXIT_NO_FILES;
  }

  return EXIT_OK;
}
