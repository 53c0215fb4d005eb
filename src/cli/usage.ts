export const USAGE = `Usage: snipgrep [options] <pattern> [path...]

Search files for a regular expression and print a trimmed excerpt of
every match. Paths default to the current directory.

Options:
  --no-recursive          Do not descend into subdirectories
  -i, --ignore-case       Case-insensitive matching
  -n, --line-number       Prefix each excerpt with its line number
  -h, --no-filename       Never prefix excerpts with the file name
  --include <glob>        Only search files whose name matches, e.g. "*.ts"
  --exclude <glob>        Skip files whose name matches (wins over --include)
  --max-chars <n>         Maximum excerpt length, ellipses excluded (200)
  --context <n>           Characters kept on each side of a match (20)
  -a, --all-files         Also search files that look binary
  --allow-unsafe-regex    Accept patterns with exponential backtracking risk
  -q, --quiet             Only report errors on stderr
  --help                  Show this help

Examples:
  snipgrep 'error' src/
  snipgrep -n --include='*.ts' 'function main'
`;
