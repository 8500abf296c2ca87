import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { HistoryStore } from './history-store.js';
import { MalformedRecordError } from '../traffic/errors.js';
import type { RepositorySnapshot, TrafficPoint } from '../types/traffic.js';

function point(date: string, count: number, uniques: number): TrafficPoint {
  return { date, count, uniques };
}

function makeSnapshot(overrides: Partial<RepositorySnapshot> = {}): RepositorySnapshot {
  return {
    repoName: 'widget',
    stars: 12,
    forks: 3,
    watchers: 12,
    timestamp: '2024-01-15T06:00:00.000Z',
    ...overrides,
  };
}

describe('HistoryStore', () => {
  let store: HistoryStore;

  beforeEach(() => {
    // In-memory database for fast, isolated tests
    store = new HistoryStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('load', () => {
    it('returns an empty result for an unknown key', () => {
      expect(store.load('widget', 'views')).toEqual({ points: [], malformed: [] });
    });
  });

  describe('save', () => {
    it('round-trips points in date order', () => {
      store.save('widget', 'views', [point('2024-01-02', 4, 2), point('2024-01-01', 10, 4)]);

      expect(store.load('widget', 'views').points).toEqual([
        point('2024-01-01', 10, 4),
        point('2024-01-02', 4, 2),
      ]);
    });

    it('replaces the stored set for the key', () => {
      store.save('widget', 'views', [point('2024-01-01', 1, 1), point('2024-01-02', 2, 2)]);
      store.save('widget', 'views', [point('2024-01-02', 5, 3)]);

      expect(store.load('widget', 'views').points).toEqual([point('2024-01-02', 5, 3)]);
    });

    it('keeps keys independent', () => {
      store.save('widget', 'views', [point('2024-01-01', 10, 4)]);
      store.save('widget', 'clones', [point('2024-01-01', 2, 1)]);
      store.save('gadget', 'views', [point('2024-01-01', 7, 7)]);

      expect(store.load('widget', 'views').points).toEqual([point('2024-01-01', 10, 4)]);
      expect(store.load('widget', 'clones').points).toEqual([point('2024-01-01', 2, 1)]);
      expect(store.load('gadget', 'views').points).toEqual([point('2024-01-01', 7, 7)]);
    });

    it('rejects duplicate dates and keeps the previous rows', () => {
      store.save('widget', 'views', [point('2024-01-01', 1, 1)]);

      expect(() =>
        store.save('widget', 'views', [point('2024-01-02', 2, 2), point('2024-01-02', 3, 3)])
      ).toThrow();
      expect(store.load('widget', 'views').points).toEqual([point('2024-01-01', 1, 1)]);
    });
  });

  describe('saveRun', () => {
    it('writes series and replaces the snapshot table', () => {
      store.saveRun([], [makeSnapshot({ repoName: 'old-repo' })]);
      store.saveRun(
        [{ repoName: 'widget', kind: 'clones', points: [point('2024-01-14', 2, 1)] }],
        [makeSnapshot()]
      );

      expect(store.getRepositorySnapshots()).toEqual([makeSnapshot()]);
      expect(store.load('widget', 'clones').points).toEqual([point('2024-01-14', 2, 1)]);
    });

    it('writes nothing when any series fails', () => {
      store.saveRun([], [makeSnapshot({ repoName: 'old-repo' })]);

      expect(() =>
        store.saveRun(
          [
            { repoName: 'widget', kind: 'views', points: [point('2024-01-01', 1, 1)] },
            {
              repoName: 'gadget',
              kind: 'views',
              points: [point('2024-01-01', 1, 1), point('2024-01-01', 2, 2)],
            },
          ],
          [makeSnapshot()]
        )
      ).toThrow();

      expect(store.load('widget', 'views').points).toEqual([]);
      expect(store.getRepositorySnapshots().map((s) => s.repoName)).toEqual(['old-repo']);
    });
  });

  describe('getRepositorySnapshots', () => {
    it('returns rows ordered by repository name', () => {
      store.saveRun([], [
        makeSnapshot({ repoName: 'zeta' }),
        makeSnapshot({ repoName: 'alpha', stars: 1 }),
      ]);

      expect(store.getRepositorySnapshots().map((s) => s.repoName)).toEqual(['alpha', 'zeta']);
      expect(store.getRepositorySnapshots()[0]).toEqual(makeSnapshot({ repoName: 'alpha', stars: 1 }));
    });

    it('returns an empty list before the first run', () => {
      expect(store.getRepositorySnapshots()).toEqual([]);
    });
  });
});

describe('HistoryStore malformed rows', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'repo-traffic-'));
    dbPath = join(dir, 'history.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('drops rows that fail validation and reports them', () => {
    const store = new HistoryStore(dbPath);
    store.save('widget', 'views', [point('2024-01-01', 10, 4), point('2024-01-03', 6, 3)]);

    const raw = new Database(dbPath);
    raw
      .prepare(
        `INSERT INTO traffic_points (repo_name, metric_kind, date, count, uniques)
         VALUES ('widget', 'views', '2024-01-0x', 5, 2)`
      )
      .run();
    raw.close();

    const loaded = store.load('widget', 'views');
    store.close();

    expect(loaded.points).toEqual([point('2024-01-01', 10, 4), point('2024-01-03', 6, 3)]);
    expect(loaded.malformed).toHaveLength(1);
    expect(loaded.malformed[0]).toBeInstanceOf(MalformedRecordError);
    expect(loaded.malformed[0]?.repoName).toBe('widget');
    expect(loaded.malformed[0]?.reason).toBe('date: invalid date "2024-01-0x"');
  });

  it('drops dates stored with a time or padding instead of folding them into a day', () => {
    const store = new HistoryStore(dbPath);
    store.save('widget', 'views', [point('2024-01-02', 5, 2)]);

    const raw = new Database(dbPath);
    const insert = raw.prepare(
      `INSERT INTO traffic_points (repo_name, metric_kind, date, count, uniques)
       VALUES ('widget', 'views', ?, 5, 2)`
    );
    insert.run('2024-01-02T00:00:00Z');
    insert.run(' 2024-01-02');
    raw.close();

    const loaded = store.load('widget', 'views');
    store.close();

    expect(loaded.points).toEqual([point('2024-01-02', 5, 2)]);
    expect(loaded.malformed.map((e) => e.reason)).toEqual([
      'date: invalid date " 2024-01-02"',
      'date: invalid date "2024-01-02T00:00:00Z"',
    ]);
  });
});
