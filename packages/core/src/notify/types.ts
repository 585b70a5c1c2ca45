import type { Result } from 'neverthrow';
import type { NotificationError } from '../types/errors.js';

/** JSON body of a pull request review comment. */
export interface CommentPayload {
  readonly body: string;
  readonly commit_id: string;
}

/**
 * Delivers a report to a pull request.
 */
export interface PullRequestNotifier {
  readonly name: string;
  postComment(
    pullRequest: string,
    payload: CommentPayload,
  ): Promise<Result<void, NotificationError>>;
}
