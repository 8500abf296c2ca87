/**
 * Settings Manager
 *
 * Reads and writes ~/.repo-traffic/settings.json.
 * Validates with Zod on read; a missing file means defaults.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { Settings } from './types.js';
import { configPaths, ensureConfigDir } from './paths.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const GitHubSettingsSchema = z.object({
  owner: z.string().min(1).optional(),
  visibility: z.enum(['public', 'private', 'all']).default('public'),
  exclude: z.array(z.string()).default([]),
});

const ReportSettingsSchema = z.object({
  outputDir: z.string().min(1).optional(),
});

const SettingsSchema = z.object({
  version: z.literal(1),
  github: GitHubSettingsSchema.default({}),
  reports: ReportSettingsSchema.default({}),
});

const ENV_OWNER = 'GITHUB_USERNAME';

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate settings from ~/.repo-traffic/settings.json.
 * Returns defaults if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readSettings(): Settings {
  const filePath = configPaths().settings;
  if (!existsSync(filePath)) {
    return createDefaultSettings();
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return SettingsSchema.parse(parsed);
}

/**
 * Write settings to ~/.repo-traffic/settings.json.
 * Validates before writing to prevent corrupt configs.
 */
export function writeSettings(settings: Settings): void {
  SettingsSchema.parse(settings);
  ensureConfigDir();
  writeFileSync(configPaths().settings, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
}

export function settingsExist(): boolean {
  return existsSync(configPaths().settings);
}

export function createDefaultSettings(): Settings {
  return {
    version: 1,
    github: {
      visibility: 'public',
      exclude: [],
    },
    reports: {},
  };
}

// ─── Resolution ──────────────────────────────────────────────

/**
 * Owner named by GITHUB_USERNAME or settings.github.owner, in that order.
 * undefined means the caller falls back to the authenticated user.
 */
export function configuredOwner(settings: Settings): string | undefined {
  return process.env[ENV_OWNER] || settings.github.owner;
}

/**
 * Owner for a collection run: an explicit override, then the configured
 * owner. `authenticatedLogin` (a GitHub round trip) runs only when neither
 * is set.
 */
export async function resolveOwner(
  settings: Settings,
  authenticatedLogin: () => Promise<string>,
  override?: string
): Promise<string> {
  return override || configuredOwner(settings) || (await authenticatedLogin());
}

/** Directory CSV reports are written to. */
export function resolveReportsDir(settings: Settings): string {
  return settings.reports.outputDir ?? configPaths().reports;
}
