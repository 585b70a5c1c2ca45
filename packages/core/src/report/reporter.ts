/**
 * Plain-text formatting for comparison output and the PR comment body.
 */

import { DEFAULT_THRESHOLDS, formatMeanChange } from '../compare/classifier.js';
import type { ThresholdConfig } from '../types/config.js';
import type { ClassificationResult, ComparisonRecord, ComparisonSummary } from '../types/timing.js';

export function formatComparisonLine(record: ComparisonRecord): string {
  return `[${record.index}] ${record.ratio.toFixed(3)}x Baseline: ${record.baseline.toFixed(3)}, Latest: ${record.latest.toFixed(3)}`;
}

export function formatAggregateLine(summary: ComparisonSummary): string {
  return `Average: ${summary.meanRatio.toFixed(3)}x, Min: ${summary.minRatio.toFixed(3)}x, Max: ${summary.maxRatio.toFixed(3)}x`;
}

export function formatTotalsLine(summary: ComparisonSummary): string {
  return `Total Baseline: ${summary.totalBaseline.toFixed(3)} s, Latest: ${summary.totalLatest.toFixed(3)} s`;
}

/**
 * Fixed closing sentence of the report, naming the soft threshold.
 */
export function formatReportFooter(thresholds: ThresholdConfig = DEFAULT_THRESHOLDS): string {
  const reported = Math.round((thresholds.slowdownRatio - 1) * 100);
  return `Deviations greater than ${reported}% from the baseline are reported. See run output for more details.`;
}

/**
 * Assemble the report posted as a PR comment.
 *
 * Returns null when no benchmark produced a message, i.e. there is
 * nothing worth reporting.
 */
export function buildReportMessage(
  classification: ClassificationResult,
  summary: ComparisonSummary,
  thresholds: ThresholdConfig = DEFAULT_THRESHOLDS,
): string | null {
  if (classification.messages.length === 0) {
    return null;
  }

  return [
    ...classification.messages,
    `${summary.count} benchmarks, ${formatMeanChange(summary.meanRatio)} on average.`,
    formatReportFooter(thresholds),
  ].join('\n\n');
}
