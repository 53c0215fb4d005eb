import type {
  FileCandidate,
  FileScanOutcome,
  MatchRecord,
  SearchConfig,
  SearchSummary,
  SearchWarning,
} from '../../../config/types.js';
import { collectFiles } from './file-collector.js';
import { scanFile } from './file-processor.js';

export const DEFAULT_ROOTS: readonly string[] = ['.'];

export interface SearchSink {
  /** Called once, after collection and before the first file is scanned. */
  onCandidates?(files: readonly FileCandidate[]): void;
  onMatch(record: MatchRecord): void;
  onWarning?(warning: SearchWarning): void;
}

interface SearchState {
  filesScanned: number;
  filesMatched: number;
  skippedBinary: number;
  skippedUnreadable: number;
  matches: number;
  warnings: SearchWarning[];
}

function createInitialState(warnings: SearchWarning[]): SearchState {
  return {
    filesScanned: 0,
    filesMatched: 0,
    skippedBinary: 0,
    skippedUnreadable: 0,
    matches: 0,
    warnings,
  };
}

function updateState(state: SearchState, outcome: FileScanOutcome): void {
  state.matches += outcome.matches;
  if (outcome.matches > 0) state.filesMatched++;

  switch (outcome.status) {
    case 'scanned':
      state.filesScanned++;
      break;
    case 'skipped-binary':
      state.skippedBinary++;
      break;
    case 'failed':
      state.skippedUnreadable++;
      break;
  }
}

function buildSummary(
  status: SearchSummary['status'],
  filesCollected: number,
  state: SearchState
): SearchSummary {
  return {
    status,
    filesCollected,
    filesScanned: state.filesScanned,
    filesMatched: state.filesMatched,
    skippedBinary: state.skippedBinary,
    skippedUnreadable: state.skippedUnreadable,
    matches: state.matches,
    warnings: state.warnings,
  };
}

/**
 * Run one search: collect candidates, then scan them strictly one at a time
 * in collection order. Per-path failures are reported as warnings.
 */
export async function executeSearch(
  config: SearchConfig,
  roots: readonly string[],
  sink: SearchSink
): Promise<SearchSummary> {
  const { files, warnings } = await collectFiles(
    roots.length > 0 ? roots : DEFAULT_ROOTS,
    {
      recursive: config.recursive,
      include: config.include,
      exclude: config.exclude,
    }
  );
  for (const warning of warnings) sink.onWarning?.(warning);

  const state = createInitialState([...warnings]);
  if (files.length === 0) {
    return buildSummary('no-candidates', 0, state);
  }

  sink.onCandidates?.(files);

  for (const file of files) {
    const outcome = await scanFile(file, config, (record) => {
      sink.onMatch(record);
    });
    updateState(state, outcome);
    if (outcome.warning) {
      state.warnings.push(outcome.warning);
      sink.onWarning?.(outcome.warning);
    }
  }

  return buildSummary('completed', files.length, state);
}
