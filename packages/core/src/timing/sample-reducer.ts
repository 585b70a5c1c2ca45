import { ok, err, type Result } from 'neverthrow';
import { SampleMismatchError } from '../types/errors.js';
import type { TimingSequence } from '../types/timing.js';

export interface LengthOptions {
  /**
   * Truncate to the shorter sequence instead of failing when lengths
   * differ.
   */
  readonly allowLengthMismatch?: boolean;
}

/**
 * Combine two samples of the same run by keeping the faster time for each
 * benchmark, which filters out one-off slowdowns from the environment.
 */
export function reduceSamples(
  first: TimingSequence,
  second: TimingSequence,
  options: LengthOptions = {},
): Result<TimingSequence, SampleMismatchError> {
  if (first.length !== second.length && !options.allowLengthMismatch) {
    return err(
      new SampleMismatchError(
        `Timing samples differ in length: ${first.length} vs ${second.length}`,
      ),
    );
  }

  const length = Math.min(first.length, second.length);
  const reduced: number[] = [];
  for (let i = 0; i < length; i++) {
    reduced.push(Math.min(first[i] ?? 0, second[i] ?? 0));
  }
  return ok(reduced);
}
