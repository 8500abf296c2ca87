/**
 * Credentials Resolver
 *
 * Resolves the GitHub token in order:
 * 1. GITHUB_TOKEN environment variable
 * 2. ~/.repo-traffic/credentials.json
 * 3. null if neither found
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsConfig, GitHubCredentials } from './types.js';
import { configPaths } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  github: z
    .object({
      token: z.string().min(1),
    })
    .optional(),
});

const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve GitHub credentials.
 * Checks env var first, then credentials file.
 */
export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envToken = process.env[ENV_GITHUB_TOKEN];
  if (envToken) {
    return { token: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.github?.token) {
    return fileConfig.github;
  }

  return null;
}

/**
 * Where the token came from, for status output.
 */
export function gitHubCredentialSource(): 'env' | 'file' | null {
  if (process.env[ENV_GITHUB_TOKEN]) return 'env';
  return readCredentialsFile()?.github?.token ? 'file' : null;
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.repo-traffic/credentials.json.
 * Returns null if the file doesn't exist or doesn't validate.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = configPaths().credentials;
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}
