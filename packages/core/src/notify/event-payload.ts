import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { NotificationError } from '../types/errors.js';

const pullRequestEventSchema = z.object({
  pull_request: z.object({
    head: z.object({
      sha: z.string().min(1, 'Head commit SHA must not be empty'),
    }),
  }),
});

/**
 * Extract the head commit SHA from a pull request event payload,
 * i.e. the JSON file GitHub Actions points GITHUB_EVENT_PATH at.
 */
export function parseHeadCommitSha(content: string): Result<string, NotificationError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new NotificationError(`Invalid JSON in event payload: ${message}`));
  }

  const result = pullRequestEventSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('; ');
    return err(new NotificationError(`Event payload is missing the pull request head: ${issues}`));
  }

  return ok(result.data.pull_request.head.sha);
}

export async function readHeadCommitSha(
  eventPath: string,
): Promise<Result<string, NotificationError>> {
  let content: string;
  try {
    content = await readFile(eventPath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new NotificationError(`Failed to read event payload ${eventPath}: ${message}`));
  }
  return parseHeadCommitSha(content);
}
