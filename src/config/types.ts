/**
 * Configuration Types
 *
 * Defines the shape of settings and credentials.
 * These are the canonical types — Zod schemas in settings.ts and
 * credentials.ts validate against these.
 */

import type { RepoVisibility } from '../types/github.js';

/** Which repositories a run covers. */
export interface GitHubSettings {
  /** Defaults to the authenticated user. */
  owner?: string;
  visibility: RepoVisibility;
  /** Repository names to skip. */
  exclude: string[];
}

export interface ReportSettings {
  /** Defaults to ~/.repo-traffic/reports */
  outputDir?: string;
}

/** Root settings — stored in ~/.repo-traffic/settings.json */
export interface Settings {
  version: 1;
  github: GitHubSettings;
  reports: ReportSettings;
}

/** GitHub credentials. */
export interface GitHubCredentials {
  token: string;
}

/** Root credentials — stored in ~/.repo-traffic/credentials.json */
export interface CredentialsConfig {
  github?: GitHubCredentials;
}
