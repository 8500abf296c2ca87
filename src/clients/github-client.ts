/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). Lists the repositories a user owns and
 * reads their traffic endpoints. One attempt per request; callers decide
 * what a failure means for the run.
 */

import type { GitHubApiRepo, GitHubApiUser } from './types.js';
import type { GitHubRepository, RepoVisibility } from '../types/github.js';
import type { MetricKind } from '../types/traffic.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 100;
/** Safety stop for pagination (10k repositories). */
const MAX_PAGES = 100;

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

/**
 * What a collection run needs from GitHub. GitHubClient implements it;
 * tests substitute an in-process fake.
 */
export interface TrafficSource {
  getAuthenticatedUser(): Promise<{ login: string; name: string | null }>;
  listOwnedRepositories(owner: string, visibility: RepoVisibility): Promise<GitHubRepository[]>;
  /** Raw traffic JSON for one kind. Validation is the caller's job. */
  getTraffic(owner: string, repo: string, kind: MetricKind): Promise<unknown>;
}

export class GitHubClient implements TrafficSource {
  private getToken: () => Promise<string>;

  constructor(tokenOrProvider: string | (() => Promise<string>)) {
    if (typeof tokenOrProvider === 'string') {
      const token = tokenOrProvider;
      this.getToken = () => Promise.resolve(token);
    } else {
      this.getToken = tokenOrProvider;
    }
  }

  // ─── Authentication ─────────────────────────────────────

  /**
   * Get the authenticated user's profile.
   * Used to validate the token and as the default owner.
   */
  async getAuthenticatedUser(): Promise<{ login: string; name: string | null }> {
    const user = await this.get<GitHubApiUser>('/user');
    return { login: user.login, name: user.name };
  }

  // ─── Repositories ────────────────────────────────────────

  /**
   * List repositories owned by `owner` that the token can see.
   * Walks every page of /user/repos; traffic endpoints need push access,
   * so repositories the token merely stars are never candidates.
   */
  async listOwnedRepositories(
    owner: string,
    visibility: RepoVisibility
  ): Promise<GitHubRepository[]> {
    const repos: GitHubApiRepo[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const query = new URLSearchParams();
      query.set('affiliation', 'owner');
      query.set('visibility', visibility);
      query.set('sort', 'full_name');
      query.set('per_page', String(PAGE_SIZE));
      query.set('page', String(page));

      const batch = await this.get<GitHubApiRepo[]>(`/user/repos?${query.toString()}`);
      repos.push(...batch);
      if (batch.length < PAGE_SIZE) break;
    }

    const lowerOwner = owner.toLowerCase();
    return repos
      .filter((r) => r.owner.login.toLowerCase() === lowerOwner)
      .filter((r) => matchesVisibility(r, visibility))
      .map((r) => ({
        name: r.name,
        owner: r.owner.login,
        stars: r.stargazers_count,
        forks: r.forks_count,
        watchers: r.watchers_count,
      }));
  }

  // ─── Traffic ─────────────────────────────────────────────

  /**
   * Daily traffic for the trailing 14 days.
   * Returns the response body untouched.
   */
  async getTraffic(owner: string, repo: string, kind: MetricKind): Promise<unknown> {
    return this.get<unknown>(
      `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/traffic/${kind}?per=day`
    );
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const token = await this.getToken();

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}

function matchesVisibility(repo: GitHubApiRepo, visibility: RepoVisibility): boolean {
  if (visibility === 'all') return true;
  const actual = repo.visibility ?? (repo.private ? 'private' : 'public');
  return visibility === 'public' ? actual === 'public' : actual !== 'public';
}
