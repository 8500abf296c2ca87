/**
 * API Response Types
 *
 * TypeScript types for raw GitHub REST API responses.
 * These are the shapes returned by the API — they get mapped to
 * our internal types (src/types/) by the client.
 */

export interface GitHubApiUser {
  login: string;
  id: number;
  name: string | null;
}

export interface GitHubApiRepo {
  name: string;
  full_name: string;
  owner: { login: string };
  private: boolean;
  visibility?: 'public' | 'private' | 'internal';
  fork: boolean;
  archived: boolean;
  stargazers_count: number;
  forks_count: number;
  watchers_count: number;
}
