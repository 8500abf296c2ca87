/**
 * Traffic Types
 *
 * Domain shapes shared by the merge engine, aggregator, history store
 * and report emitters. Dates are UTC calendar days (YYYY-MM-DD).
 */

export const METRIC_KINDS = ['clones', 'views'] as const;

/** The two independently tracked traffic categories. */
export type MetricKind = (typeof METRIC_KINDS)[number];

/** One day of traffic for one repository and one metric kind. */
export interface TrafficPoint {
  date: string;
  count: number;
  uniques: number;
}

/** All known points for a (repository, metric kind) key, ascending by date. */
export interface TrafficSeries {
  repoName: string;
  kind: MetricKind;
  points: TrafficPoint[];
}

/** Cross-repository total for one day of one metric kind. */
export interface TotalTrafficPoint {
  date: string;
  totalCount: number;
  totalUniques: number;
}

/** Latest popularity counts for a repository. Replaced wholesale each run. */
export interface RepositorySnapshot {
  repoName: string;
  stars: number;
  forks: number;
  watchers: number;
  timestamp: string;
}

/**
 * Everything fetched for one repository in one run.
 * A missing traffic kind means the fetch for it failed or was malformed.
 */
export interface MetricSample {
  repoName: string;
  stars: number;
  forks: number;
  watchers: number;
  fetchedAt: string;
  traffic: Partial<Record<MetricKind, TrafficPoint[]>>;
}

export type SummaryMetric =
  | 'stars'
  | 'watchers'
  | 'forks'
  | 'views'
  | 'uniqueVisitors'
  | 'clones'
  | 'uniqueCloners';

/** Total and leader(s) for one metric across all repositories. */
export interface MetricSummary {
  metric: SummaryMetric;
  total: number;
  max: number;
  topRepositories: string[];
}

export type TotalTraffic = Record<MetricKind, TotalTrafficPoint[]>;
