/**
 * Traffic Aggregator
 *
 * Folds per-repository merged series into the tables the report emitters
 * consume. Pure functions — no I/O.
 */

import type {
  MetricKind,
  MetricSample,
  MetricSummary,
  RepositorySnapshot,
  SummaryMetric,
  TotalTraffic,
  TotalTrafficPoint,
  TrafficSeries,
} from '../types/traffic.js';
import { compareByDate } from './merge.js';

/**
 * One snapshot row per repository from this run's samples.
 * Not merged with history; the caller replaces the stored table with it.
 */
export function buildRepositorySnapshots(samples: readonly MetricSample[]): RepositorySnapshot[] {
  return samples
    .map((s) => ({
      repoName: s.repoName,
      stars: s.stars,
      forks: s.forks,
      watchers: s.watchers,
      timestamp: s.fetchedAt,
    }))
    .sort((a, b) => compareNames(a.repoName, b.repoName));
}

/**
 * Sum count and uniques per date across repositories for one metric kind.
 * A repository without a point on some date contributes nothing to it.
 */
export function aggregateTotalTraffic(series: readonly TrafficSeries[]): TotalTrafficPoint[] {
  const totals = new Map<string, TotalTrafficPoint>();

  // Folding in name order keeps the result independent of fetch order
  const ordered = [...series].sort((a, b) => compareNames(a.repoName, b.repoName));

  for (const s of ordered) {
    for (const point of s.points) {
      const total = totals.get(point.date) ?? { date: point.date, totalCount: 0, totalUniques: 0 };
      total.totalCount += point.count;
      total.totalUniques += point.uniques;
      totals.set(point.date, total);
    }
  }

  return [...totals.values()].sort(compareByDate);
}

/**
 * Totals for every metric kind. Series of other kinds are ignored per table.
 */
export function aggregateAllTraffic(series: readonly TrafficSeries[]): TotalTraffic {
  const ofKind = (kind: MetricKind) =>
    aggregateTotalTraffic(series.filter((s) => s.kind === kind));
  return { clones: ofKind('clones'), views: ofKind('views') };
}

/**
 * Total, maximum and leading repositories for each tracked metric.
 * Traffic metrics use each repository's sum over days on or after windowStart.
 */
export function summarizeMetrics(
  snapshots: readonly RepositorySnapshot[],
  series: readonly TrafficSeries[],
  windowStart: string
): MetricSummary[] {
  const repoNames = snapshots.map((s) => s.repoName);

  const windowSum = (kind: MetricKind, field: 'count' | 'uniques'): Map<string, number> => {
    const sums = new Map<string, number>(repoNames.map((name) => [name, 0]));
    for (const s of series) {
      if (s.kind !== kind || !sums.has(s.repoName)) continue;
      const sum = s.points
        .filter((p) => p.date >= windowStart)
        .reduce((acc, p) => acc + p[field], 0);
      sums.set(s.repoName, sum);
    }
    return sums;
  };

  const fromSnapshots = (field: 'stars' | 'watchers' | 'forks'): Map<string, number> =>
    new Map(snapshots.map((s) => [s.repoName, s[field]]));

  const values: Array<[SummaryMetric, Map<string, number>]> = [
    ['stars', fromSnapshots('stars')],
    ['watchers', fromSnapshots('watchers')],
    ['forks', fromSnapshots('forks')],
    ['views', windowSum('views', 'count')],
    ['uniqueVisitors', windowSum('views', 'uniques')],
    ['clones', windowSum('clones', 'count')],
    ['uniqueCloners', windowSum('clones', 'uniques')],
  ];

  return values.map(([metric, perRepo]) => summarize(metric, perRepo));
}

function summarize(metric: SummaryMetric, perRepo: Map<string, number>): MetricSummary {
  let total = 0;
  let max = 0;
  for (const value of perRepo.values()) {
    total += value;
    max = Math.max(max, value);
  }

  const topRepositories =
    perRepo.size === 0
      ? []
      : [...perRepo.entries()]
          .filter(([, value]) => value === max)
          .map(([name]) => name)
          .sort(compareNames);

  return { metric, total, max, topRepositories };
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
