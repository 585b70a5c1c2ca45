import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  GitHubCommentNotifier,
  COMFORT_FADE_PREVIEW,
  DEFAULT_GITHUB_API_URL,
} from './github-notifier.js';
import { NotificationError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const VALID_CONFIG = {
  token: 'test-token',
  repository: 'acme/widgets',
};

function createNotifier(overrides: Partial<typeof VALID_CONFIG & { apiUrl: string }> = {}): GitHubCommentNotifier {
  return GitHubCommentNotifier.create({ ...VALID_CONFIG, ...overrides })._unsafeUnwrap();
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GitHubCommentNotifier', () => {
  let fetchSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchSpy = vi.fn();
    vi.stubGlobal('fetch', fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should have name set to github', () => {
    expect(createNotifier().name).toBe('github');
  });

  describe('create', () => {
    it('should reject an empty token', () => {
      const result = GitHubCommentNotifier.create({ ...VALID_CONFIG, token: '' });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(NotificationError);
        expect(result.error.message).toBe('GitHub token must not be empty');
      }
    });

    it('should reject a malformed repository', () => {
      const result = GitHubCommentNotifier.create({ ...VALID_CONFIG, repository: 'widgets' });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Repository must look like "owner/repo", got "widgets"');
      }
    });
  });

  describe('commentsUrl', () => {
    it('should template the pull request into the default API URL', () => {
      expect(DEFAULT_GITHUB_API_URL).toBe('https://api.github.com');
      expect(createNotifier().commentsUrl('42')).toBe(
        'https://api.github.com/repos/acme/widgets/issues/42/comments',
      );
    });

    it('should strip trailing slashes from a custom API URL', () => {
      expect(createNotifier({ apiUrl: 'https://ghe.example.com/api/v3/' }).commentsUrl('7')).toBe(
        'https://ghe.example.com/api/v3/repos/acme/widgets/issues/7/comments',
      );
    });
  });

  describe('postComment', () => {
    it('should POST the payload with token and preview headers', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('{}', { status: 201, statusText: 'Created' }));

      const result = await createNotifier().postComment('42', {
        body: 'report text',
        commit_id: 'abc123',
      });

      expect(result.isOk()).toBe(true);
      expect(fetchSpy).toHaveBeenCalledOnce();
      const [url, init] = fetchSpy.mock.calls[0]! as [string, RequestInit];
      expect(url).toBe('https://api.github.com/repos/acme/widgets/issues/42/comments');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        Authorization: 'Token test-token',
        Accept: COMFORT_FADE_PREVIEW,
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(init.body))).toEqual({ body: 'report text', commit_id: 'abc123' });
    });

    it('should use a configured Accept header', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('{}', { status: 201 }));
      const notifier = GitHubCommentNotifier.create({
        ...VALID_CONFIG,
        accept: 'application/vnd.github+json',
      })._unsafeUnwrap();

      await notifier.postComment('1', { body: 'b', commit_id: 'c' });

      const [, init] = fetchSpy.mock.calls[0]! as [string, RequestInit];
      expect(init.headers).toMatchObject({ Accept: 'application/vnd.github+json' });
    });

    it('should return err with the status on a non-success response', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('{}', { status: 403, statusText: 'Forbidden' }));

      const result = await createNotifier().postComment('42', { body: 'b', commit_id: 'c' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(NotificationError);
        expect(result.error.status).toBe(403);
        expect(result.error.message).toBe('GitHub comment request failed: 403 Forbidden');
      }
    });

    it('should return err when the request itself fails', async () => {
      fetchSpy.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND api.github.com'));

      const result = await createNotifier().postComment('42', { body: 'b', commit_id: 'c' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.status).toBeUndefined();
        expect(result.error.message).toBe(
          'GitHub comment request failed: getaddrinfo ENOTFOUND api.github.com',
        );
      }
    });
  });
});
