export { ProgressAggregator } from './progress-aggregator.js';
export { summarize } from './summary-reporter.js';
export type {
  RunStats,
  ProgressSnapshot,
  FailureRecord,
  CategorySummary,
  TreeSummary,
} from './types.js';
