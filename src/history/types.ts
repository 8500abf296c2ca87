/**
 * History Types
 *
 * The record-store contract the collector depends on. HistoryStore is the
 * SQLite implementation; only aggregated counts are persisted.
 */

import type {
  MetricKind,
  RepositorySnapshot,
  TrafficPoint,
  TrafficSeries,
} from '../types/traffic.js';
import type { MalformedRecordError } from '../traffic/errors.js';

/** Stored points for a key plus the rows that had to be dropped. */
export interface HistoryLoadResult {
  points: TrafficPoint[];
  malformed: MalformedRecordError[];
}

export interface TrafficHistory {
  load(repoName: string, kind: MetricKind): HistoryLoadResult;
  save(repoName: string, kind: MetricKind, points: readonly TrafficPoint[]): void;
  saveRun(series: readonly TrafficSeries[], snapshots: readonly RepositorySnapshot[]): void;
  getRepositorySnapshots(): RepositorySnapshot[];
}
