import * as fsPromises from 'node:fs/promises';

import type {
  FileCandidate,
  FileScanOutcome,
  MatchRecord,
  MatchSink,
  SearchConfig,
} from '../../../config/types.js';
import { createDetailedError, ErrorCode, SearchError } from '../../errors.js';
import { looksLikeText } from '../../fs-helpers.js';
import { readLines } from '../../fs-helpers/readers/line-reader.js';
import { withScanDiagnostics } from '../../observability/diagnostics.js';
import { extract } from './excerpt.js';

type ScanSettings = Pick<
  SearchConfig,
  'matcher' | 'maxChars' | 'contextChars' | 'textOnly' | 'readBufferSize'
>;

interface ScanProgress {
  matches: number;
  linesRead: number;
}

function failedOutcome(
  progress: ScanProgress,
  error: unknown,
  filePath: string
): FileScanOutcome {
  return {
    status: 'failed',
    matches: progress.matches,
    linesRead: progress.linesRead,
    warning: createDetailedError(error, filePath),
  };
}

function readFailure(error: unknown, filePath: string): SearchError {
  const message = error instanceof Error ? error.message : String(error);
  return SearchError.fromError(
    ErrorCode.E_READ_FAILED,
    `Error reading ${filePath}: ${message}`,
    error,
    filePath
  );
}

function isReadFailure(error: unknown): error is SearchError {
  return error instanceof SearchError && error.code === ErrorCode.E_READ_FAILED;
}

// Only I/O errors are wrapped; a throwing sink propagates unchanged.
async function readNext(
  lines: AsyncGenerator<string>,
  filePath: string
): Promise<IteratorResult<string>> {
  try {
    return await lines.next();
  } catch (error) {
    throw readFailure(error, filePath);
  }
}

async function classify(
  handle: fsPromises.FileHandle,
  filePath: string
): Promise<boolean> {
  try {
    return await looksLikeText(filePath, handle);
  } catch (error) {
    throw readFailure(error, filePath);
  }
}

function emitMatches(
  line: string,
  filePath: string,
  settings: ScanSettings,
  onMatch: MatchSink,
  progress: ScanProgress
): void {
  for (const span of settings.matcher.findAll(line)) {
    const record: MatchRecord = {
      path: filePath,
      line: progress.linesRead,
      excerpt: extract(
        line,
        span.start,
        span.end,
        settings.maxChars,
        settings.contextChars
      ),
    };
    progress.matches++;
    onMatch(record);
  }
}

async function scanContent(
  handle: fsPromises.FileHandle,
  filePath: string,
  settings: ScanSettings,
  onMatch: MatchSink,
  progress: ScanProgress
): Promise<void> {
  const lines = readLines(handle, { fragmentSize: settings.readBufferSize });

  try {
    for (;;) {
      const next = await readNext(lines, filePath);
      if (next.done) return;
      progress.linesRead++;
      emitMatches(next.value, filePath, settings, onMatch, progress);
    }
  } finally {
    await lines.return(undefined);
  }
}

async function scanWithHandle(
  handle: fsPromises.FileHandle,
  filePath: string,
  settings: ScanSettings,
  onMatch: MatchSink
): Promise<FileScanOutcome> {
  const progress: ScanProgress = { matches: 0, linesRead: 0 };

  try {
    if (settings.textOnly && !(await classify(handle, filePath))) {
      return { status: 'skipped-binary', matches: 0, linesRead: 0 };
    }
    await scanContent(handle, filePath, settings, onMatch, progress);
  } catch (error) {
    if (!isReadFailure(error)) throw error;
    // Records already handed to onMatch stand.
    return failedOutcome(progress, error, filePath);
  }

  return { status: 'scanned', ...progress };
}

/**
 * Scan one candidate: open, optionally classify, then stream lines and emit a
 * record per match. Per-file failures become a `failed` outcome, never a throw.
 */
export async function scanFile(
  candidate: FileCandidate,
  settings: ScanSettings,
  onMatch: MatchSink
): Promise<FileScanOutcome> {
  return await withScanDiagnostics(candidate.path, async () => {
    let handle: fsPromises.FileHandle;
    try {
      handle = await fsPromises.open(candidate.path, 'r');
    } catch (error) {
      return failedOutcome({ matches: 0, linesRead: 0 }, error, candidate.path);
    }

    try {
      return await scanWithHandle(handle, candidate.path, settings, onMatch);
    } finally {
      await handle.close();
    }
  });
}
