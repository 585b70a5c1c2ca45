export type { CommentPayload, PullRequestNotifier } from './types.js';
export { parseHeadCommitSha, readHeadCommitSha } from './event-payload.js';
export {
  GitHubCommentNotifier,
  DEFAULT_GITHUB_API_URL,
  COMFORT_FADE_PREVIEW,
} from './github-notifier.js';
export type { GitHubNotifierConfig } from './github-notifier.js';
