/**
 * CLI command: perf-compare compare (default command)
 *
 * Reads two samples each of the baseline and latest timings, prints
 * per-benchmark ratios and aggregates, optionally posts the report as a PR
 * comment, and fails when the regression thresholds are exceeded.
 *
 * Verdict failures are raised only after everything was printed and the
 * comment was sent, so CI logs and PR comments are populated either way.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import {
  readTiming,
  reduceSamples,
  compareTimings,
  summarizeComparisons,
  classifyComparisons,
  evaluateVerdict,
  describeFailure,
  formatComparisonLine,
  formatAggregateLine,
  formatTotalsLine,
  buildReportMessage,
  readHeadCommitSha,
  loadConfig,
  GitHubCommentNotifier,
  NotificationError,
} from '@perf-compare/core';
import type {
  TimingSequence,
  ComparisonRecord,
  ComparisonSummary,
  ClassificationResult,
  Verdict,
  PerfCompareConfig,
  PullRequestNotifier,
  GitHubNotifierConfig,
  TimingInputError,
  SampleMismatchError,
  InvalidBaselineError,
  EmptyInputError,
} from '@perf-compare/core';

export class ReportWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportWriteError';
  }
}

export type CompareError =
  | TimingInputError
  | SampleMismatchError
  | InvalidBaselineError
  | EmptyInputError
  | NotificationError
  | ReportWriteError;

/** Everything a compare run needs, resolved at the CLI boundary. */
export interface CompareInput {
  readonly baselineFiles: readonly [string, string];
  readonly latestFiles: readonly [string, string];
  readonly token: string;
  /** Empty string disables the PR comment. */
  readonly pullRequest: string;
  /** Path to the CI event payload holding the head commit SHA. */
  readonly eventPath?: string;
  /**
   * `owner/repo` the pull request belongs to, already resolved from the
   * flag, the config file and the environment.
   */
  readonly repository?: string;
  readonly apiUrl?: string;
  /** Write a JSON report here when set. */
  readonly outputPath?: string;
  readonly allowLengthMismatch?: boolean;
  readonly config: PerfCompareConfig;
}

export interface CompareOutcome {
  readonly records: readonly ComparisonRecord[];
  readonly summary: ComparisonSummary;
  readonly classification: ClassificationResult;
  readonly report: string | null;
  readonly commented: boolean;
  readonly verdict: Verdict;
}

export type NotifierFactory = (
  config: GitHubNotifierConfig,
) => Result<PullRequestNotifier, NotificationError>;

const defaultNotifierFactory: NotifierFactory = (config) => GitHubCommentNotifier.create(config);

/**
 * Read both samples of one run and keep the faster time per benchmark.
 */
async function readRun(
  files: readonly [string, string],
  allowLengthMismatch: boolean,
): Promise<Result<TimingSequence, TimingInputError | SampleMismatchError>> {
  const samples: TimingSequence[] = [];
  for (const file of files) {
    // eslint-disable-next-line no-console
    console.log(`Reading ${file}`);
    const result = await readTiming(file);
    if (result.isErr()) return err(result.error);
    samples.push(result.value);
  }

  const [first = [], second = []] = samples;
  const reduced = reduceSamples(first, second, { allowLengthMismatch });
  if (reduced.isErr()) return err(reduced.error);
  return ok(reduced.value);
}

/**
 * Post the report to the pull request, attaching the head commit SHA.
 */
export async function sendReport(
  report: string,
  input: CompareInput,
  createNotifier: NotifierFactory = defaultNotifierFactory,
): Promise<Result<void, NotificationError>> {
  if (!input.eventPath) {
    return err(
      new NotificationError('No event payload path given: set GITHUB_EVENT_PATH or pass --event-path'),
    );
  }
  const { repository } = input;
  if (!repository) {
    return err(
      new NotificationError('No repository given: set GITHUB_REPOSITORY, github.repository or --repository'),
    );
  }

  const commitId = await readHeadCommitSha(input.eventPath);
  if (commitId.isErr()) return err(commitId.error);

  const notifier = createNotifier({
    token: input.token,
    repository,
    apiUrl: input.apiUrl ?? input.config.github.apiUrl,
    accept: input.config.github.accept,
  });
  if (notifier.isErr()) return err(notifier.error);

  return notifier.value.postComment(input.pullRequest, {
    body: report,
    commit_id: commitId.value,
  });
}

/**
 * Run the full comparison pipeline, printing progress to stdout.
 *
 * Fatal problems (unreadable input, empty input, failed comment) are
 * returned as errors; regressions are reported through the verdict.
 */
export async function executeCompare(
  input: CompareInput,
  createNotifier: NotifierFactory = defaultNotifierFactory,
): Promise<Result<CompareOutcome, CompareError>> {
  const allowLengthMismatch = input.allowLengthMismatch ?? false;
  const { thresholds } = input.config;

  const baseline = await readRun(input.baselineFiles, allowLengthMismatch);
  if (baseline.isErr()) return err(baseline.error);
  const latest = await readRun(input.latestFiles, allowLengthMismatch);
  if (latest.isErr()) return err(latest.error);

  const records = compareTimings(baseline.value, latest.value, { allowLengthMismatch });
  if (records.isErr()) return err(records.error);

  for (const record of records.value) {
    // eslint-disable-next-line no-console
    console.log(formatComparisonLine(record));
  }

  const summary = summarizeComparisons(records.value);
  if (summary.isErr()) return err(summary.error);

  const classification = classifyComparisons(records.value, thresholds);

  // eslint-disable-next-line no-console
  console.log(formatAggregateLine(summary.value));
  // eslint-disable-next-line no-console
  console.log(formatTotalsLine(summary.value));

  const report = buildReportMessage(classification, summary.value, thresholds);
  let commented = false;

  if (report !== null) {
    // eslint-disable-next-line no-console
    console.log(`Sending warnings and errors as a PR comment:\n${report}`);
    if (input.pullRequest === '') {
      // eslint-disable-next-line no-console
      console.log(chalk.dim('No pull request given, skipping PR comment.'));
    } else {
      const sent = await sendReport(report, input, createNotifier);
      if (sent.isErr()) return err(sent.error);
      commented = true;
    }
  }

  const verdict = evaluateVerdict(summary.value, classification.regressionCount, thresholds);

  const outcome: CompareOutcome = {
    records: records.value,
    summary: summary.value,
    classification,
    report,
    commented,
    verdict,
  };

  if (input.outputPath) {
    const written = await writeOutputReport(input.outputPath, outcome);
    if (written.isErr()) return err(written.error);
  }

  return ok(outcome);
}

/**
 * Save the outcome as JSON for later workflow steps.
 */
export async function writeOutputReport(
  outputPath: string,
  outcome: CompareOutcome,
): Promise<Result<void, ReportWriteError>> {
  const outputReport = {
    passed: outcome.verdict.passed,
    failures: outcome.verdict.failures,
    summary: outcome.summary,
    records: outcome.records,
    classifications: outcome.classification.classifications,
    report: outcome.report,
    commented: outcome.commented,
  };
  try {
    await writeFile(outputPath, JSON.stringify(outputReport, null, 2) + '\n', 'utf-8');
    return ok(undefined);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ReportWriteError(`Failed to write report to ${outputPath}: ${message}`));
  }
}

interface CompareOptions {
  eventPath?: string;
  repository?: string;
  config?: string;
  output?: string;
  allowLengthMismatch?: boolean;
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare', { isDefault: true })
    .description('Compare baseline and latest benchmark timings and fail on regressions')
    .argument('<baseline1>', 'Baseline timings, first sample')
    .argument('<baseline2>', 'Baseline timings, second sample')
    .argument('<latest1>', 'Latest timings, first sample')
    .argument('<latest2>', 'Latest timings, second sample')
    .argument('<token>', 'GitHub token used to post the PR comment')
    .argument('[pullRequest]', 'Pull request number; no comment is posted when empty', '')
    .option('--event-path <path>', 'CI event payload with the PR head commit (default: $GITHUB_EVENT_PATH)')
    .option('--repository <owner/repo>', 'Repository the pull request belongs to (default: $GITHUB_REPOSITORY)')
    .option('--config <dir>', 'Directory containing .perfcompare.yaml (default: cwd)')
    .option('--output <path>', 'Also write a JSON report to this path')
    .option('--allow-length-mismatch', 'Truncate to the shorter sequence instead of failing')
    .action(async (
      baseline1: string,
      baseline2: string,
      latest1: string,
      latest2: string,
      token: string,
      pullRequest: string,
      options: CompareOptions,
    ) => {
      try {
        const configResult = await loadConfig(options.config ?? process.cwd());
        if (configResult.isErr()) {
          // eslint-disable-next-line no-console
          console.log(chalk.red('Configuration error:'), configResult.error.message);
          process.exit(1);
        }

        const result = await executeCompare({
          baselineFiles: [baseline1, baseline2],
          latestFiles: [latest1, latest2],
          token,
          pullRequest,
          eventPath: options.eventPath ?? process.env['GITHUB_EVENT_PATH'],
          repository: options.repository ?? configResult.value.github.repository ?? process.env['GITHUB_REPOSITORY'],
          apiUrl: process.env['GITHUB_API_URL'],
          outputPath: options.output,
          allowLengthMismatch: options.allowLengthMismatch,
          config: configResult.value,
        });

        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.log(chalk.red(`${result.error.name}: ${result.error.message}`));
          process.exit(1);
        }

        const { verdict } = result.value;
        if (!verdict.passed) {
          for (const failure of verdict.failures) {
            // eslint-disable-next-line no-console
            console.log(chalk.red(`REGRESSION: ${describeFailure(failure)}`));
          }
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('No blocking performance regressions.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.log(chalk.red('Compare failed:'), message);
        process.exit(1);
      }
    });
}
