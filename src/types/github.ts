/**
 * GitHub Types
 *
 * Internal representation of the repositories a collection run covers.
 */

export type RepoVisibility = 'public' | 'private' | 'all';

export interface GitHubRepository {
  name: string;
  owner: string;
  stars: number;
  forks: number;
  watchers: number;
}
