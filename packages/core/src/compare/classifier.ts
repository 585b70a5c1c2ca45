/**
 * Threshold classification for benchmark comparisons.
 *
 * A benchmark is a hard regression only when it is both relatively and
 * absolutely slower, so that short benchmarks with large relative jitter
 * do not block. Softer slowdowns and speedups only produce report lines.
 */

import type { ThresholdConfig } from '../types/config.js';
import type {
  Classification,
  ClassificationResult,
  ComparisonRecord,
  ComparisonSummary,
  Verdict,
  VerdictFailure,
} from '../types/timing.js';

export const DEFAULT_THRESHOLDS: Readonly<ThresholdConfig> = {
  regressionRatio: 1.2,
  regressionAbsolute: 5.0,
  slowdownRatio: 1.1,
  speedupRatio: 0.9,
  meanRatio: 1.06,
};

/** Percentage change for a ratio, e.g. 1.25 -> 25. */
export function toPercent(ratio: number): number {
  return 100 * (ratio - 1);
}

export function classifyComparison(
  record: ComparisonRecord,
  thresholds: ThresholdConfig = DEFAULT_THRESHOLDS,
): Classification {
  const { index, baseline, latest, ratio } = record;
  const percent = toPercent(ratio);
  const pct = percent.toFixed(1);

  if (
    latest > baseline * thresholds.regressionRatio &&
    latest - baseline > thresholds.regressionAbsolute
  ) {
    return {
      index,
      kind: 'regression',
      percent,
      message: `🚫 Benchmark #${index} is too slow: +${pct}%`,
    };
  }
  if (ratio > thresholds.slowdownRatio) {
    return {
      index,
      kind: 'slowdown',
      percent,
      message: `⚠️Potential non-blocking slowdown in benchmark #${index}: +${pct}%`,
    };
  }
  if (ratio < thresholds.speedupRatio) {
    return {
      index,
      kind: 'speedup',
      percent,
      message: `🔥 Potential speedup in benchmark #${index}: ${pct}%`,
    };
  }
  return { index, kind: 'within_noise', percent, message: null };
}

export function classifyComparisons(
  records: readonly ComparisonRecord[],
  thresholds: ThresholdConfig = DEFAULT_THRESHOLDS,
): ClassificationResult {
  const classifications = records.map((r) => classifyComparison(r, thresholds));
  const messages = classifications
    .map((c) => c.message)
    .filter((m): m is string => m !== null);
  const regressionCount = classifications.filter((c) => c.kind === 'regression').length;

  return { classifications, messages, regressionCount };
}

/**
 * Describe the mean change, e.g. "4.2% slower" or "3.0% faster".
 */
export function formatMeanChange(meanRatio: number): string {
  const percent = toPercent(meanRatio);
  if (percent > 0) {
    return `${percent.toFixed(1)}% slower`;
  }
  return `${(-percent).toFixed(1)}% faster`;
}

/**
 * Decide whether the run passes.
 *
 * Per-benchmark regressions and the aggregate mean are independent
 * triggers: a run where every benchmark drifted slightly still fails once
 * the mean reaches the threshold.
 */
export function evaluateVerdict(
  summary: ComparisonSummary,
  regressionCount: number,
  thresholds: ThresholdConfig = DEFAULT_THRESHOLDS,
): Verdict {
  const failures: VerdictFailure[] = [];

  if (regressionCount > 0) {
    failures.push({ kind: 'regression', count: regressionCount });
  }
  if (summary.meanRatio >= thresholds.meanRatio) {
    failures.push({
      kind: 'aggregate_regression',
      meanRatio: summary.meanRatio,
      threshold: thresholds.meanRatio,
    });
  }

  return {
    passed: failures.length === 0,
    regressionCount,
    meanRatio: summary.meanRatio,
    failures,
  };
}

/**
 * Get a human-readable description of a verdict failure.
 */
export function describeFailure(failure: VerdictFailure): string {
  switch (failure.kind) {
    case 'regression':
      return `${failure.count} benchmark(s) regressed beyond the blocking threshold`;
    case 'aggregate_regression':
      return `Mean relative duration ${failure.meanRatio.toFixed(3)}x reached the ${failure.threshold.toFixed(3)}x limit (${formatMeanChange(failure.meanRatio)} on average)`;
  }
}
