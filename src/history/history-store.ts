/**
 * History Store
 *
 * SQLite-backed persistence for traffic history and the repository
 * snapshot table. Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.repo-traffic/history.db by default.
 *
 * traffic_points accumulates across runs, one row per
 * (repo_name, metric_kind, date). repository_snapshots is replaced
 * wholesale on every run.
 */

import Database from 'better-sqlite3';
import type {
  MetricKind,
  RepositorySnapshot,
  TrafficPoint,
  TrafficSeries,
} from '../types/traffic.js';
import { MalformedRecordError } from '../traffic/errors.js';
import { StoredTrafficRowSchema, formatIssues } from '../validators.js';
import { configPaths, ensureConfigDir } from '../config/paths.js';
import { mergeTrafficPoints } from '../traffic/merge.js';
import type { HistoryLoadResult, TrafficHistory } from './types.js';

export class HistoryStore implements TrafficHistory {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? configPaths().historyDb;
    if (!dbPath) {
      ensureConfigDir();
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  /**
   * Load every stored point for a key, ascending by date.
   * Rows that fail validation are dropped and reported, not thrown.
   */
  load(repoName: string, kind: MetricKind): HistoryLoadResult {
    const rows = this.db
      .prepare(
        `SELECT date, count, uniques FROM traffic_points
         WHERE repo_name = ? AND metric_kind = ?
         ORDER BY date ASC`
      )
      .all(repoName, kind);

    const points: TrafficPoint[] = [];
    const malformed: MalformedRecordError[] = [];

    for (const row of rows) {
      const parsed = StoredTrafficRowSchema.safeParse(row);
      if (parsed.success) {
        points.push(parsed.data);
      } else {
        malformed.push(new MalformedRecordError(repoName, kind, row, formatIssues(parsed.error)));
      }
    }

    // One point per date even if the table holds text that normalizes alike
    return { points: mergeTrafficPoints(points, []), malformed };
  }

  /**
   * Replace the stored points for one key.
   */
  save(repoName: string, kind: MetricKind, points: readonly TrafficPoint[]): void {
    this.db.transaction(() => this.replaceSeries(repoName, kind, points))();
  }

  /**
   * Persist a whole run atomically: every changed series plus the new
   * snapshot table. Nothing is written if any statement fails.
   */
  saveRun(series: readonly TrafficSeries[], snapshots: readonly RepositorySnapshot[]): void {
    this.db.transaction(() => {
      for (const s of series) {
        this.replaceSeries(s.repoName, s.kind, s.points);
      }
      this.replaceSnapshots(snapshots);
    })();
  }

  /**
   * Snapshot rows from the most recent run, by repository name.
   */
  getRepositorySnapshots(): RepositorySnapshot[] {
    const rows = this.db
      .prepare(`SELECT * FROM repository_snapshots ORDER BY repo_name ASC`)
      .all() as SnapshotRow[];

    return rows.map(mapSnapshotRow);
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Writes ───────────────────────────────────────────────

  private replaceSeries(repoName: string, kind: MetricKind, points: readonly TrafficPoint[]): void {
    this.db
      .prepare(`DELETE FROM traffic_points WHERE repo_name = ? AND metric_kind = ?`)
      .run(repoName, kind);

    const insert = this.db.prepare(`
      INSERT INTO traffic_points (repo_name, metric_kind, date, count, uniques)
      VALUES (@repoName, @kind, @date, @count, @uniques)
    `);

    for (const p of points) {
      insert.run({ repoName, kind, date: p.date, count: p.count, uniques: p.uniques });
    }
  }

  private replaceSnapshots(snapshots: readonly RepositorySnapshot[]): void {
    this.db.prepare(`DELETE FROM repository_snapshots`).run();

    const insert = this.db.prepare(`
      INSERT INTO repository_snapshots (repo_name, stars, forks, watchers, fetched_at)
      VALUES (@repoName, @stars, @forks, @watchers, @timestamp)
    `);

    for (const s of snapshots) {
      insert.run({
        repoName: s.repoName,
        stars: s.stars,
        forks: s.forks,
        watchers: s.watchers,
        timestamp: s.timestamp,
      });
    }
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS traffic_points (
        repo_name    TEXT NOT NULL,
        metric_kind  TEXT NOT NULL,
        date         TEXT NOT NULL,
        count        INTEGER NOT NULL DEFAULT 0,
        uniques      INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (repo_name, metric_kind, date)
      );

      CREATE TABLE IF NOT EXISTS repository_snapshots (
        repo_name   TEXT PRIMARY KEY,
        stars       INTEGER NOT NULL DEFAULT 0,
        forks       INTEGER NOT NULL DEFAULT 0,
        watchers    INTEGER NOT NULL DEFAULT 0,
        fetched_at  TEXT NOT NULL
      );
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface SnapshotRow {
  repo_name: string;
  stars: number;
  forks: number;
  watchers: number;
  fetched_at: string;
}

function mapSnapshotRow(row: SnapshotRow): RepositorySnapshot {
  return {
    repoName: row.repo_name,
    stars: row.stars,
    forks: row.forks,
    watchers: row.watchers,
    timestamp: row.fetched_at,
  };
}
