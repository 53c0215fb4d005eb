import type { MatchRecord, SearchSummary } from '../config/types.js';
import type { SearchOptionsInput } from '../schemas/index.js';
import { executeSearch } from './file-operations/search/engine.js';
import { buildSearchConfig } from './file-operations/search/options.js';

export {
  collectFiles,
  iterateCandidates,
  type CollectEvent,
  type CollectOptions,
} from './file-operations/search/file-collector.js';
export { executeSearch, type SearchSink } from './file-operations/search/engine.js';
export { extract } from './file-operations/search/excerpt.js';
export { scanFile } from './file-operations/search/file-processor.js';
export {
  compileFilenameFilter,
  includeFile,
} from './file-operations/search/filename-filter.js';
export {
  compileContentPattern,
  composeCaseFold,
} from './file-operations/search/match-strategy.js';
export {
  buildSearchConfig,
  resolveSearchOptions,
} from './file-operations/search/options.js';

export interface SearchContentResult {
  matches: MatchRecord[];
  summary: SearchSummary;
}

/** Search `paths` and collect every match record in memory. */
export async function searchContent(
  paths: readonly string[],
  options: SearchOptionsInput
): Promise<SearchContentResult> {
  const config = buildSearchConfig(options);
  const matches: MatchRecord[] = [];
  const summary = await executeSearch(config, paths, {
    onMatch: (record) => {
      matches.push(record);
    },
  });
  return { matches, summary };
}
