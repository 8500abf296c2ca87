import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, statSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { configPaths, ensureConfigDir } from './paths.js';

describe('configPaths', () => {
  it('lives under ~/.repo-traffic without REPO_TRAFFIC_HOME', () => {
    const dir = join(homedir(), '.repo-traffic');
    expect(configPaths({})).toEqual({
      dir,
      settings: join(dir, 'settings.json'),
      credentials: join(dir, 'credentials.json'),
      historyDb: join(dir, 'history.db'),
      reports: join(dir, 'reports'),
    });
  });

  it('places every file under REPO_TRAFFIC_HOME', () => {
    const paths = configPaths({ REPO_TRAFFIC_HOME: '/srv/traffic' });
    expect(paths.historyDb).toBe(join('/srv/traffic', 'history.db'));
    expect(paths.reports).toBe(join('/srv/traffic', 'reports'));
  });

  it('resolves a relative REPO_TRAFFIC_HOME against the working directory', () => {
    expect(configPaths({ REPO_TRAFFIC_HOME: 'traffic-data' }).dir).toBe(resolve('traffic-data'));
  });

  it('ignores an empty REPO_TRAFFIC_HOME', () => {
    expect(configPaths({ REPO_TRAFFIC_HOME: '' }).dir).toBe(join(homedir(), '.repo-traffic'));
  });
});

describe('ensureConfigDir', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it('creates nested directories restricted to the owner', () => {
    root = mkdtempSync(join(tmpdir(), 'repo-traffic-home-'));
    const dir = join(root, 'nested', 'config');

    expect(ensureConfigDir(dir)).toBe(dir);
    expect(statSync(dir).mode & 0o777).toBe(0o700);
  });

  it('tightens permissions on an existing directory', () => {
    root = mkdtempSync(join(tmpdir(), 'repo-traffic-home-'));
    const dir = join(root, 'config');
    mkdirSync(dir, { mode: 0o755 });

    ensureConfigDir(dir);
    expect(statSync(dir).mode & 0o777).toBe(0o700);
  });
});
