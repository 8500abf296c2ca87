/**
 * Summary Report Generator
 *
 * Renders a collection result as Markdown for the CLI and MCP tools.
 * Synchronous — no I/O, no API calls.
 */

import type { CollectionResult } from '../orchestrator/collector.js';
import type { MetricSummary, SummaryMetric, TotalTrafficPoint } from '../types/traffic.js';
import { METRIC_KINDS } from '../types/traffic.js';
import { TRAFFIC_WINDOW_DAYS } from '../traffic/dates.js';

const METRIC_LABELS: Record<SummaryMetric, string> = {
  stars: 'Stars',
  watchers: 'Watchers',
  forks: 'Forks',
  views: 'Views (14d)',
  uniqueVisitors: 'Unique Visitors (14d)',
  clones: 'Clones (14d)',
  uniqueCloners: 'Unique Cloners (14d)',
};

function formatTopRepos(summary: MetricSummary): string {
  if (summary.max === 0 || summary.topRepositories.length === 0) return '-';
  return `${summary.topRepositories.join(', ')} (${summary.max})`;
}

function recentTotals(points: readonly TotalTrafficPoint[]): TotalTrafficPoint[] {
  return points.slice(-TRAFFIC_WINDOW_DAYS);
}

/**
 * Generate the traffic summary.
 * Structured as: Overview / Repositories / Daily Traffic / Warnings
 */
export function generateTrafficSummary(result: CollectionResult): string {
  const parts: string[] = [];
  const title = result.owner ? `# Repository Traffic - ${result.owner}` : '# Repository Traffic';
  parts.push(title);
  parts.push('');
  parts.push(`Collected ${result.collectedAt} across ${result.snapshots.length} repositories.`);
  parts.push('');

  parts.push('## Overview');
  parts.push('');
  parts.push('| Metric | Total | Top Repository |');
  parts.push('|--------|-------|----------------|');
  for (const summary of result.summaries) {
    parts.push(
      `| ${METRIC_LABELS[summary.metric]} | ${summary.total} | ${formatTopRepos(summary)} |`
    );
  }
  parts.push('');

  if (result.snapshots.length > 0) {
    parts.push('## Repositories');
    parts.push('');
    parts.push('| Repository | Stars | Forks | Watchers |');
    parts.push('|------------|-------|-------|----------|');
    for (const s of result.snapshots) {
      parts.push(`| ${s.repoName} | ${s.stars} | ${s.forks} | ${s.watchers} |`);
    }
    parts.push('');
  }

  for (const kind of METRIC_KINDS) {
    const rows = recentTotals(result.totals[kind]);
    if (rows.length === 0) continue;

    const label = kind === 'views' ? 'Views' : 'Clones';
    parts.push(`## Daily ${label}`);
    parts.push('');
    parts.push('| Date | Total | Unique |');
    parts.push('|------|-------|--------|');
    for (const row of rows) {
      parts.push(`| ${row.date} | ${row.totalCount} | ${row.totalUniques} |`);
    }
    parts.push('');
  }

  if (result.warnings.length > 0) {
    parts.push(`## Warnings (${result.warnings.length})`);
    parts.push('');
    for (const w of result.warnings) {
      parts.push(`- ${w.message}`);
    }
    parts.push('');
  }

  return parts.join('\n');
}
