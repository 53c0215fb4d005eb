import type { MatchRecord, OutputVisibility } from '../../config/types.js';

export interface VisibilityFlags {
  hideFilename: boolean;
  showLineNumber: boolean;
}

/** File names are shown whenever more than one file is searched. */
export function resolveVisibility(
  fileCount: number,
  flags: VisibilityFlags
): OutputVisibility {
  return {
    showFilename: fileCount > 1 && !flags.hideFilename,
    showLineNumber: flags.showLineNumber,
  };
}

export function formatMatch(
  record: MatchRecord,
  visibility: OutputVisibility
): string {
  const filename = visibility.showFilename ? `${record.path}:` : '';
  const lineNumber = visibility.showLineNumber ? `${record.line}:` : '';
  return `${filename}${lineNumber}${record.excerpt}`;
}
