import { ok, err, type Result } from 'neverthrow';
import { NotificationError } from '../types/errors.js';
import type { CommentPayload, PullRequestNotifier } from './types.js';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

/** Preview media type that accepts `commit_id` on issue comments. */
export const COMFORT_FADE_PREVIEW = 'application/vnd.github.comfort-fade-preview+json';

export interface GitHubNotifierConfig {
  readonly token: string;
  /** `owner/repo` */
  readonly repository: string;
  readonly apiUrl?: string;
  readonly accept?: string;
}

const REPOSITORY_PATTERN = /^[\w.-]+\/[\w.-]+$/;

/**
 * Posts reports as comments on GitHub pull requests via the REST API.
 */
export class GitHubCommentNotifier implements PullRequestNotifier {
  readonly name = 'github';

  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  private constructor(
    private readonly config: GitHubNotifierConfig,
  ) {
    this.baseUrl = (config.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.headers = {
      Authorization: `Token ${config.token}`,
      Accept: config.accept ?? COMFORT_FADE_PREVIEW,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Validates the config and builds a notifier.
   */
  static create(config: GitHubNotifierConfig): Result<GitHubCommentNotifier, NotificationError> {
    if (!config.token) {
      return err(new NotificationError('GitHub token must not be empty'));
    }
    if (!REPOSITORY_PATTERN.test(config.repository)) {
      return err(
        new NotificationError(`Repository must look like "owner/repo", got "${config.repository}"`),
      );
    }
    return ok(new GitHubCommentNotifier(config));
  }

  /** Comments endpoint for the given pull request. */
  commentsUrl(pullRequest: string): string {
    return `${this.baseUrl}/repos/${this.config.repository}/issues/${encodeURIComponent(pullRequest)}/comments`;
  }

  async postComment(
    pullRequest: string,
    payload: CommentPayload,
  ): Promise<Result<void, NotificationError>> {
    let response: Response;
    try {
      response = await fetch(this.commentsUrl(pullRequest), {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new NotificationError(`GitHub comment request failed: ${message}`));
    }

    if (!response.ok) {
      return err(
        new NotificationError(
          `GitHub comment request failed: ${response.status} ${response.statusText}`,
          response.status,
        ),
      );
    }

    return ok(undefined);
  }
}
