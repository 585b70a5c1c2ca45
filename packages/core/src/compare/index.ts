export { compareTimings, summarizeComparisons } from './comparator.js';
export {
  DEFAULT_THRESHOLDS,
  toPercent,
  classifyComparison,
  classifyComparisons,
  formatMeanChange,
  evaluateVerdict,
  describeFailure,
} from './classifier.js';
