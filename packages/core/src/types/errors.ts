export type TimingInputReason = 'not_found' | 'parse_error' | 'read_error';

export class TimingInputError extends Error {
  readonly reason: TimingInputReason;
  readonly source: string;

  constructor(reason: TimingInputReason, source: string, message: string) {
    super(message);
    this.name = 'TimingInputError';
    this.reason = reason;
    this.source = source;
  }
}

export class SampleMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SampleMismatchError';
  }
}

export class InvalidBaselineError extends Error {
  readonly index: number;

  constructor(index: number, value: number) {
    super(`Baseline time for benchmark #${index} must be positive, got ${value}`);
    this.name = 'InvalidBaselineError';
    this.index = index;
  }
}

export class EmptyInputError extends Error {
  constructor(message = 'No benchmarks to compare: timing sequences are empty') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class NotificationError extends Error {
  /** HTTP status when the API answered with a non-success code. */
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'NotificationError';
    this.status = status;
  }
}
