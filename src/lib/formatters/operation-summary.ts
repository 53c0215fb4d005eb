import type { SearchSummary } from '../../config/types.js';

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function formatOperationSummary(summary: SearchSummary): string {
  if (summary.status === 'no-candidates') {
    return 'No matching files found';
  }

  const lines = [
    `${plural(summary.matches, 'match', 'matches')} in ${plural(summary.filesMatched, 'file', 'files')} ` +
      `(${summary.filesScanned}/${summary.filesCollected} scanned)`,
  ];

  if (summary.skippedBinary > 0) {
    lines.push(`Note: ${summary.skippedBinary} file(s) skipped (binary).`);
  }

  if (summary.skippedUnreadable > 0) {
    lines.push(
      `Note: ${summary.skippedUnreadable} file(s) could not be read to the end.`
    );
  }

  if (summary.warnings.length > 0) {
    lines.push(`Note: ${plural(summary.warnings.length, 'warning', 'warnings')} reported.`);
  }

  return lines.join('\n');
}
