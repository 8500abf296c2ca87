/**
 * Config Directory Layout
 *
 * Everything repo-traffic keeps on disk lives under one directory:
 * REPO_TRAFFIC_HOME when set (resolved against the working directory),
 * otherwise ~/.repo-traffic/.
 */

import { mkdirSync, chmodSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

const DEFAULT_DIR_NAME = '.repo-traffic';

export interface ConfigPaths {
  dir: string;
  settings: string;
  credentials: string;
  historyDb: string;
  /** Default CSV output directory; settings.reports.outputDir overrides it. */
  reports: string;
}

/**
 * Resolve the config directory and the files inside it.
 * Pure: nothing is created on disk.
 */
export function configPaths(env: NodeJS.ProcessEnv = process.env): ConfigPaths {
  const home = env['REPO_TRAFFIC_HOME'];
  const dir = home ? resolve(home) : join(homedir(), DEFAULT_DIR_NAME);

  return {
    dir,
    settings: join(dir, 'settings.json'),
    credentials: join(dir, 'credentials.json'),
    historyDb: join(dir, 'history.db'),
    reports: join(dir, 'reports'),
  };
}

/**
 * Create the config directory if needed and restrict it to the owner,
 * since it holds the token file. Returns the directory.
 */
export function ensureConfigDir(dir: string = configPaths().dir): string {
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  chmodSync(dir, 0o700);
  return dir;
}
