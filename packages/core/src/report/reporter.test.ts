import { describe, it, expect } from 'vitest';
import {
  formatComparisonLine,
  formatAggregateLine,
  formatTotalsLine,
  formatReportFooter,
  buildReportMessage,
} from './reporter.js';
import { DEFAULT_THRESHOLDS } from '../compare/classifier.js';
import type { ClassificationResult, ComparisonSummary } from '../types/timing.js';

const SUMMARY: ComparisonSummary = {
  count: 2,
  totalBaseline: 20,
  totalLatest: 17,
  meanRatio: 0.85,
  minRatio: 0.8,
  maxRatio: 0.9,
};

function makeClassification(messages: readonly string[]): ClassificationResult {
  return { classifications: [], messages, regressionCount: 0 };
}

describe('formatComparisonLine', () => {
  it('should print the index, ratio and raw times with three decimals', () => {
    const line = formatComparisonLine({ index: 3, baseline: 10, latest: 12.3456, ratio: 1.23456 });
    expect(line).toBe('[3] 1.235x Baseline: 10.000, Latest: 12.346');
  });
});

describe('formatAggregateLine', () => {
  it('should print the mean, min and max ratios', () => {
    expect(formatAggregateLine(SUMMARY)).toBe('Average: 0.850x, Min: 0.800x, Max: 0.900x');
  });
});

describe('formatTotalsLine', () => {
  it('should print total baseline and latest durations', () => {
    expect(formatTotalsLine(SUMMARY)).toBe('Total Baseline: 20.000 s, Latest: 17.000 s');
  });
});

describe('formatReportFooter', () => {
  it('should name the default 10% reporting threshold', () => {
    expect(formatReportFooter()).toBe(
      'Deviations greater than 10% from the baseline are reported. See run output for more details.',
    );
  });

  it('should follow a custom slowdown ratio', () => {
    expect(formatReportFooter({ ...DEFAULT_THRESHOLDS, slowdownRatio: 1.25 })).toBe(
      'Deviations greater than 25% from the baseline are reported. See run output for more details.',
    );
  });
});

describe('buildReportMessage', () => {
  it('should return null when there are no messages', () => {
    expect(buildReportMessage(makeClassification([]), SUMMARY)).toBeNull();
  });

  it('should join messages, summary and footer with blank lines', () => {
    const message = buildReportMessage(
      makeClassification(['first message', 'second message']),
      SUMMARY,
    );
    expect(message).toBe(
      [
        'first message',
        'second message',
        '2 benchmarks, 15.0% faster on average.',
        'Deviations greater than 10% from the baseline are reported. See run output for more details.',
      ].join('\n\n'),
    );
  });

  it('should describe a slower mean', () => {
    const message = buildReportMessage(
      makeClassification(['slow']),
      { ...SUMMARY, count: 1, meanRatio: 1.3 },
    );
    expect(message?.split('\n\n')[1]).toBe('1 benchmarks, 30.0% slower on average.');
  });
});
