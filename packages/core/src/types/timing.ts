/**
 * Domain types for comparing benchmark timings between two runs.
 */

/** Ordered benchmark durations in seconds, one entry per benchmark. */
export type TimingSequence = readonly number[];

/** One benchmark compared between the baseline and latest runs. */
export interface ComparisonRecord {
  /** Zero-based benchmark position in the timing files. */
  readonly index: number;
  readonly baseline: number;
  readonly latest: number;
  /** Relative duration: latest / baseline. */
  readonly ratio: number;
}

/** Aggregate values folded over all comparison records. */
export interface ComparisonSummary {
  readonly count: number;
  readonly totalBaseline: number;
  readonly totalLatest: number;
  readonly meanRatio: number;
  readonly minRatio: number;
  readonly maxRatio: number;
}

export type ClassificationKind = 'regression' | 'slowdown' | 'speedup' | 'within_noise';

/** Outcome of checking a single record against the thresholds. */
export interface Classification {
  readonly index: number;
  readonly kind: ClassificationKind;
  /** Percentage change: 100 * (ratio - 1). */
  readonly percent: number;
  /** Human-readable report line, null when the change is noise-level. */
  readonly message: string | null;
}

export interface ClassificationResult {
  readonly classifications: readonly Classification[];
  /** Report lines in benchmark order, one per non-noise classification. */
  readonly messages: readonly string[];
  /** Number of hard regressions. */
  readonly regressionCount: number;
}

export type VerdictFailure =
  | { readonly kind: 'regression'; readonly count: number }
  | { readonly kind: 'aggregate_regression'; readonly meanRatio: number; readonly threshold: number };

/** Pass/fail decision for a whole run. */
export interface Verdict {
  readonly passed: boolean;
  readonly regressionCount: number;
  readonly meanRatio: number;
  readonly failures: readonly VerdictFailure[];
}
