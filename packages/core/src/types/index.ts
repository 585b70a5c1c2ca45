export type {
  TimingSequence,
  ComparisonRecord,
  ComparisonSummary,
  ClassificationKind,
  Classification,
  ClassificationResult,
  VerdictFailure,
  Verdict,
} from './timing.js';

export type { ThresholdConfig, GitHubConfig, PerfCompareConfig } from './config.js';

export type { TimingInputReason } from './errors.js';
export {
  TimingInputError,
  SampleMismatchError,
  InvalidBaselineError,
  EmptyInputError,
  NotificationError,
} from './errors.js';
