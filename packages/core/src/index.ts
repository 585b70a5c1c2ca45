export type {
  TimingSequence,
  ComparisonRecord,
  ComparisonSummary,
  ClassificationKind,
  Classification,
  ClassificationResult,
  VerdictFailure,
  Verdict,
  ThresholdConfig,
  GitHubConfig,
  PerfCompareConfig,
  TimingInputReason,
} from './types/index.js';

export {
  TimingInputError,
  SampleMismatchError,
  InvalidBaselineError,
  EmptyInputError,
  NotificationError,
} from './types/index.js';

export { parseTimings, readTiming, reduceSamples } from './timing/index.js';
export type { LengthOptions } from './timing/index.js';

export {
  compareTimings,
  summarizeComparisons,
  DEFAULT_THRESHOLDS,
  toPercent,
  classifyComparison,
  classifyComparisons,
  formatMeanChange,
  evaluateVerdict,
  describeFailure,
} from './compare/index.js';

export {
  formatComparisonLine,
  formatAggregateLine,
  formatTotalsLine,
  formatReportFooter,
  buildReportMessage,
} from './report/index.js';

export type { CommentPayload, PullRequestNotifier, GitHubNotifierConfig } from './notify/index.js';
export {
  parseHeadCommitSha,
  readHeadCommitSha,
  GitHubCommentNotifier,
  DEFAULT_GITHUB_API_URL,
  COMFORT_FADE_PREVIEW,
} from './notify/index.js';

export { loadConfig, parseConfig, ConfigError, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './config/index.js';
