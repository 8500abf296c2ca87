import { describe, it, expect } from 'vitest';
import { generateTrafficSummary } from './summary-report.js';
import type { CollectionResult } from '../orchestrator/collector.js';

function makeResult(overrides: Partial<CollectionResult> = {}): CollectionResult {
  return {
    owner: 'octo',
    collectedAt: '2024-01-15T06:00:00.000Z',
    snapshots: [
      { repoName: 'alpha', stars: 5, forks: 1, watchers: 4, timestamp: '2024-01-15T06:00:00.000Z' },
    ],
    series: [],
    totals: {
      clones: [{ date: '2024-01-14', totalCount: 6, totalUniques: 4 }],
      views: [],
    },
    summaries: [
      { metric: 'stars', total: 5, max: 5, topRepositories: ['alpha'] },
      { metric: 'views', total: 0, max: 0, topRepositories: ['alpha'] },
    ],
    warnings: [],
    ...overrides,
  };
}

describe('generateTrafficSummary', () => {
  it('renders the header, overview and repositories', () => {
    const lines = generateTrafficSummary(makeResult()).split('\n');

    expect(lines.slice(0, 10)).toEqual([
      '# Repository Traffic - octo',
      '',
      'Collected 2024-01-15T06:00:00.000Z across 1 repositories.',
      '',
      '## Overview',
      '',
      '| Metric | Total | Top Repository |',
      '|--------|-------|----------------|',
      '| Stars | 5 | alpha (5) |',
      '| Views (14d) | 0 | - |',
    ]);
    expect(lines).toContain('| alpha | 5 | 1 | 4 |');
  });

  it('omits the owner when unknown', () => {
    const summary = generateTrafficSummary(makeResult({ owner: null }));
    expect(summary.split('\n')[0]).toBe('# Repository Traffic');
  });

  it('renders daily tables only for kinds with totals', () => {
    const summary = generateTrafficSummary(makeResult());

    expect(summary).toContain('## Daily Clones\n\n| Date | Total | Unique |\n|------|-------|--------|\n| 2024-01-14 | 6 | 4 |\n');
    expect(summary).not.toContain('## Daily Views');
  });

  it('shows at most the last 14 days of totals', () => {
    const clones = Array.from({ length: 20 }, (_, i) => ({
      date: `2024-01-${String(i + 1).padStart(2, '0')}`,
      totalCount: i,
      totalUniques: i,
    }));
    const lines = generateTrafficSummary(makeResult({ totals: { clones, views: [] } })).split('\n');
    const dayRows = lines.filter((line) => line.startsWith('| 2024-01-'));

    expect(dayRows).toHaveLength(14);
    expect(dayRows[0]).toBe('| 2024-01-07 | 6 | 6 |');
    expect(dayRows[13]).toBe('| 2024-01-20 | 19 | 19 |');
  });

  it('lists warnings', () => {
    const summary = generateTrafficSummary(
      makeResult({
        warnings: [{ repoName: 'alpha', kind: 'views', message: 'No views traffic for alpha: timeout' }],
      })
    );

    expect(summary).toContain('## Warnings (1)\n\n- No views traffic for alpha: timeout\n');
  });

  it('skips the repositories table when nothing was collected', () => {
    const summary = generateTrafficSummary(makeResult({ snapshots: [] }));

    expect(summary).toContain('across 0 repositories.');
    expect(summary).not.toContain('## Repositories');
  });
});
