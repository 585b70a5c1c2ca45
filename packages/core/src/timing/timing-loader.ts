/**
 * Reads benchmark timing files.
 *
 * A timing file is plain text holding one decimal duration (seconds) per
 * benchmark, separated by any whitespace, in benchmark order.
 */

import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { TimingInputError } from '../types/errors.js';
import type { TimingSequence } from '../types/timing.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse whitespace-separated durations.
 *
 * Rejects tokens that are not plain decimal numbers (hex, `NaN`,
 * `Infinity`) as well as negative durations.
 */
export function parseTimings(
  text: string,
  source: string,
): Result<TimingSequence, TimingInputError> {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  const times: number[] = [];

  for (const [position, token] of tokens.entries()) {
    const value = Number(token);
    if (!DECIMAL_PATTERN.test(token) || !Number.isFinite(value)) {
      return err(
        new TimingInputError(
          'parse_error',
          source,
          `Invalid timing "${token}" at position ${position} in ${source}`,
        ),
      );
    }
    if (value < 0) {
      return err(
        new TimingInputError(
          'parse_error',
          source,
          `Negative timing "${token}" at position ${position} in ${source}`,
        ),
      );
    }
    times.push(value);
  }

  return ok(times);
}

/**
 * Read and parse a timing file.
 */
export async function readTiming(
  filePath: string,
): Promise<Result<TimingSequence, TimingInputError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return err(new TimingInputError('not_found', filePath, `Timing file not found: ${filePath}`));
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new TimingInputError('read_error', filePath, `Failed to read ${filePath}: ${message}`));
  }

  return parseTimings(content, filePath);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
