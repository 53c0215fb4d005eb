import type { Stats } from 'node:fs';

import type { ErrorCode } from '../lib/errors.js';

/** Half-open `[start, end)` span of one match, in UTF-16 string indices. */
export interface MatchSpan {
  start: number;
  end: number;
}

export interface ContentMatcher {
  readonly source: string;
  readonly flags: string;
  findAll(line: string): MatchSpan[];
}

export type FilenameMatcher = (name: string) => boolean;

export interface SearchConfig {
  readonly matcher: ContentMatcher;
  readonly recursive: boolean;
  readonly ignoreCase: boolean;
  readonly include: FilenameMatcher | undefined;
  readonly exclude: FilenameMatcher | undefined;
  readonly maxChars: number;
  readonly contextChars: number;
  readonly textOnly: boolean;
  readonly readBufferSize: number;
}

export interface FileCandidate {
  readonly path: string;
  readonly stats: Stats;
}

export interface MatchRecord {
  readonly path: string;
  readonly line: number;
  readonly excerpt: string;
}

export interface SearchWarning {
  code: ErrorCode;
  message: string;
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export interface CollectResult {
  files: FileCandidate[];
  warnings: SearchWarning[];
}

export type FileScanStatus = 'scanned' | 'skipped-binary' | 'failed';

export interface FileScanOutcome {
  status: FileScanStatus;
  matches: number;
  linesRead: number;
  warning?: SearchWarning;
}

export type MatchSink = (record: MatchRecord) => void;

export interface SearchSummary {
  status: 'completed' | 'no-candidates';
  filesCollected: number;
  filesScanned: number;
  filesMatched: number;
  skippedBinary: number;
  skippedUnreadable: number;
  matches: number;
  warnings: SearchWarning[];
}

export interface OutputVisibility {
  showFilename: boolean;
  showLineNumber: boolean;
}
