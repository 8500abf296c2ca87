/**
 * Collector
 *
 * One collection run: list repositories, fetch a sample per repository,
 * merge each traffic kind into history, persist everything in a single
 * write, then aggregate.
 *
 * Per-repository problems become warnings. A failed history write aborts
 * the run before any aggregate is produced, since a half-written history
 * would corrupt the next run's baseline.
 */

import type { TrafficSource } from '../clients/github-client.js';
import type { TrafficHistory } from '../history/types.js';
import type { RepoVisibility } from '../types/github.js';
import { METRIC_KINDS } from '../types/traffic.js';
import type {
  MetricKind,
  MetricSample,
  MetricSummary,
  RepositorySnapshot,
  TotalTraffic,
  TrafficSeries,
} from '../types/traffic.js';
import { mergeTrafficPoints } from '../traffic/merge.js';
import {
  aggregateAllTraffic,
  buildRepositorySnapshots,
  summarizeMetrics,
} from '../traffic/aggregator.js';
import { trailingWindowStart } from '../traffic/dates.js';
import { HistoryWriteError } from '../traffic/errors.js';
import { fetchMetricSample } from './sample-fetcher.js';

export interface CollectionOptions {
  owner: string;
  visibility: RepoVisibility;
  /** Repository names to skip. */
  exclude?: string[];
  now?: Date;
}

export interface CollectionWarning {
  repoName: string;
  kind?: MetricKind;
  message: string;
}

export interface CollectionResult {
  /** null when rebuilt from history without knowing the owner. */
  owner: string | null;
  collectedAt: string;
  snapshots: RepositorySnapshot[];
  /** Merged history for every covered repository and kind. */
  series: TrafficSeries[];
  totals: TotalTraffic;
  summaries: MetricSummary[];
  warnings: CollectionWarning[];
}

/**
 * Run a full collection against GitHub (or any TrafficSource).
 * Repositories are processed one at a time.
 */
export async function runCollection(
  source: TrafficSource,
  store: TrafficHistory,
  options: CollectionOptions
): Promise<CollectionResult> {
  const now = options.now ?? new Date();
  const excluded = new Set((options.exclude ?? []).map((name) => name.toLowerCase()));
  const warnings: CollectionWarning[] = [];

  const repos = (await source.listOwnedRepositories(options.owner, options.visibility)).filter(
    (r) => !excluded.has(r.name.toLowerCase())
  );

  const samples: MetricSample[] = [];
  const merged: TrafficSeries[] = [];
  const changed: TrafficSeries[] = [];

  for (const repo of repos) {
    const { sample, missing } = await fetchMetricSample(source, repo, now);
    samples.push(sample);

    for (const error of missing) {
      console.error(`[repo-traffic] ${error.message}`);
      warnings.push({ repoName: error.repoName, kind: error.kind, message: error.message });
    }

    for (const kind of METRIC_KINDS) {
      const existing = store.load(repo.name, kind);
      for (const error of existing.malformed) {
        console.error(`[repo-traffic] ${error.message}`);
        warnings.push({ repoName: error.repoName, kind: error.kind, message: error.message });
      }

      const incoming = sample.traffic[kind];
      if (!incoming || incoming.length === 0) {
        // Nothing fetched: history stays exactly as stored
        merged.push({ repoName: repo.name, kind, points: existing.points });
        continue;
      }

      const series: TrafficSeries = {
        repoName: repo.name,
        kind,
        points: mergeTrafficPoints(existing.points, incoming),
      };
      merged.push(series);
      changed.push(series);
    }
  }

  const snapshots = buildRepositorySnapshots(samples);

  try {
    store.saveRun(changed, snapshots);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HistoryWriteError(`Failed to persist traffic history: ${reason}`, { cause: error });
  }

  return {
    owner: options.owner,
    collectedAt: now.toISOString(),
    snapshots,
    series: merged,
    totals: aggregateAllTraffic(merged),
    summaries: summarizeMetrics(snapshots, merged, trailingWindowStart(now)),
    warnings,
  };
}

/**
 * Rebuild the aggregates from stored history alone, without fetching.
 * Covers the repositories in the last run's snapshot table.
 */
export function buildReportFromHistory(
  store: TrafficHistory,
  options: { owner?: string; now?: Date } = {}
): CollectionResult {
  const now = options.now ?? new Date();
  const snapshots = store.getRepositorySnapshots();
  const series: TrafficSeries[] = [];
  const warnings: CollectionWarning[] = [];

  for (const snapshot of snapshots) {
    for (const kind of METRIC_KINDS) {
      const loaded = store.load(snapshot.repoName, kind);
      for (const error of loaded.malformed) {
        console.error(`[repo-traffic] ${error.message}`);
        warnings.push({ repoName: error.repoName, kind: error.kind, message: error.message });
      }
      series.push({ repoName: snapshot.repoName, kind, points: loaded.points });
    }
  }

  const latest = snapshots.reduce<string | null>(
    (acc, s) => (acc === null || s.timestamp > acc ? s.timestamp : acc),
    null
  );

  return {
    owner: options.owner ?? null,
    collectedAt: latest ?? now.toISOString(),
    snapshots,
    series,
    totals: aggregateAllTraffic(series),
    summaries: summarizeMetrics(snapshots, series, trailingWindowStart(now)),
    warnings,
  };
}
