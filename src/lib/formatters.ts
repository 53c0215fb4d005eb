export {
  formatMatch,
  resolveVisibility,
  type VisibilityFlags,
} from './formatters/match.js';
export { formatOperationSummary } from './formatters/operation-summary.js';
