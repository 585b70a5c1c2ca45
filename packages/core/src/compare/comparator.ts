/**
 * Pairs baseline and latest timings and folds them into aggregates.
 *
 * All functions are pure (no I/O) and stateless.
 */

import { ok, err, type Result } from 'neverthrow';
import {
  EmptyInputError,
  InvalidBaselineError,
  SampleMismatchError,
} from '../types/errors.js';
import type { ComparisonRecord, ComparisonSummary, TimingSequence } from '../types/timing.js';
import type { LengthOptions } from '../timing/sample-reducer.js';

/**
 * Build one comparison record per benchmark.
 *
 * Baselines must be strictly positive so every ratio is finite.
 */
export function compareTimings(
  baseline: TimingSequence,
  latest: TimingSequence,
  options: LengthOptions = {},
): Result<readonly ComparisonRecord[], SampleMismatchError | InvalidBaselineError> {
  if (baseline.length !== latest.length && !options.allowLengthMismatch) {
    return err(
      new SampleMismatchError(
        `Baseline has ${baseline.length} benchmarks but latest has ${latest.length}`,
      ),
    );
  }

  const records: ComparisonRecord[] = [];
  const length = Math.min(baseline.length, latest.length);

  for (let index = 0; index < length; index++) {
    const baselineTime = baseline[index] ?? 0;
    const latestTime = latest[index] ?? 0;
    if (baselineTime <= 0) {
      return err(new InvalidBaselineError(index, baselineTime));
    }
    records.push({
      index,
      baseline: baselineTime,
      latest: latestTime,
      ratio: latestTime / baselineTime,
    });
  }

  return ok(records);
}

/**
 * Fold comparison records into totals and mean/min/max ratios.
 */
export function summarizeComparisons(
  records: readonly ComparisonRecord[],
): Result<ComparisonSummary, EmptyInputError> {
  if (records.length === 0) {
    return err(new EmptyInputError());
  }

  const totals = records.reduce(
    (acc, r) => ({
      totalBaseline: acc.totalBaseline + r.baseline,
      totalLatest: acc.totalLatest + r.latest,
      totalRatio: acc.totalRatio + r.ratio,
      minRatio: Math.min(acc.minRatio, r.ratio),
      maxRatio: Math.max(acc.maxRatio, r.ratio),
    }),
    {
      totalBaseline: 0,
      totalLatest: 0,
      totalRatio: 0,
      minRatio: Number.POSITIVE_INFINITY,
      maxRatio: Number.NEGATIVE_INFINITY,
    },
  );

  return ok({
    count: records.length,
    totalBaseline: totals.totalBaseline,
    totalLatest: totals.totalLatest,
    meanRatio: totals.totalRatio / records.length,
    minRatio: totals.minRatio,
    maxRatio: totals.maxRatio,
  });
}
