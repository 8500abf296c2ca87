/**
 * Sample Fetcher
 *
 * Builds one MetricSample per repository: popularity counts from the
 * repository listing plus the trailing traffic window for each kind.
 * A kind that fails or comes back malformed is left out of the sample
 * and reported, so the merge leaves that history alone.
 */

import { GitHubClientError } from '../clients/github-client.js';
import type { TrafficSource } from '../clients/github-client.js';
import type { GitHubRepository } from '../types/github.js';
import { METRIC_KINDS } from '../types/traffic.js';
import type { MetricSample } from '../types/traffic.js';
import { MissingSampleError } from '../traffic/errors.js';
import { parseTrafficResponse } from '../validators.js';

export interface FetchedSample {
  sample: MetricSample;
  missing: MissingSampleError[];
}

export async function fetchMetricSample(
  source: TrafficSource,
  repo: GitHubRepository,
  fetchedAt: Date
): Promise<FetchedSample> {
  const sample: MetricSample = {
    repoName: repo.name,
    stars: repo.stars,
    forks: repo.forks,
    watchers: repo.watchers,
    fetchedAt: fetchedAt.toISOString(),
    traffic: {},
  };
  const missing: MissingSampleError[] = [];

  // One attempt per kind, in sequence
  for (const kind of METRIC_KINDS) {
    let raw: unknown;
    try {
      raw = await source.getTraffic(repo.owner, repo.name, kind);
    } catch (error) {
      missing.push(new MissingSampleError(repo.name, kind, failureReason(error)));
      continue;
    }

    const parsed = parseTrafficResponse(kind, raw);
    if (parsed.ok) {
      sample.traffic[kind] = parsed.points;
    } else {
      missing.push(new MissingSampleError(repo.name, kind, `malformed response (${parsed.error})`));
    }
  }

  return { sample, missing };
}

/** Transient GitHub failures are flagged so the warning says a later run may succeed. */
function failureReason(error: unknown): string {
  if (error instanceof GitHubClientError && error.retryable) {
    return `${error.message} (transient, next run will retry)`;
  }
  return error instanceof Error ? error.message : String(error);
}
