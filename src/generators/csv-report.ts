/**
 * CSV Report Writer
 *
 * Writes the aggregated run result as flat CSV tables. Formatting is
 * pure (formatCsv, buildCsvTables); writeCsvReports does the file I/O.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { CollectionResult } from '../orchestrator/collector.js';
import { METRIC_KINDS } from '../types/traffic.js';
import { compareByDate } from '../traffic/merge.js';

type Cell = string | number;

export interface CsvTable {
  fileName: string;
  headers: string[];
  rows: Cell[][];
}

/**
 * Serialize a table. Fields containing a comma, quote or line break are
 * quoted with embedded quotes doubled. Lines end with \n.
 */
export function formatCsv(headers: readonly string[], rows: readonly Cell[][]): string {
  const lines = [headers, ...rows].map((row) => row.map(escapeField).join(','));
  return lines.join('\n') + '\n';
}

function escapeField(value: Cell): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Every table a run produces, in write order.
 */
export function buildCsvTables(result: CollectionResult): CsvTable[] {
  const tables: CsvTable[] = [
    {
      fileName: 'repository_metrics.csv',
      headers: ['repo_name', 'stars', 'forks', 'watchers', 'timestamp'],
      rows: result.snapshots.map((s) => [s.repoName, s.stars, s.forks, s.watchers, s.timestamp]),
    },
  ];

  for (const kind of METRIC_KINDS) {
    tables.push({
      fileName: `total_traffic_${kind}.csv`,
      headers: ['date', 'total_count', 'total_uniques'],
      rows: result.totals[kind].map((t) => [t.date, t.totalCount, t.totalUniques]),
    });
  }

  for (const kind of METRIC_KINDS) {
    const rows = result.series
      .filter((s) => s.kind === kind)
      .flatMap((s) => s.points.map((p) => ({ repoName: s.repoName, ...p })))
      .sort((a, b) => compareByDate(a, b) || a.repoName.localeCompare(b.repoName, 'en'))
      .map((p): Cell[] => [p.date, p.repoName, p.count, p.uniques]);

    tables.push({
      fileName: `traffic_${kind}.csv`,
      headers: ['date', 'repo_name', 'count', 'uniques'],
      rows,
    });
  }

  tables.push({
    fileName: 'metric_summary.csv',
    headers: ['metric', 'total', 'max', 'top_repositories'],
    rows: result.summaries.map((m) => [m.metric, m.total, m.max, m.topRepositories.join(';')]),
  });

  return tables;
}

/**
 * Write all tables into `dir`, creating it if needed.
 * Returns the paths written.
 */
export function writeCsvReports(result: CollectionResult, dir: string): string[] {
  mkdirSync(dir, { recursive: true });

  return buildCsvTables(result).map((table) => {
    const filePath = join(dir, table.fileName);
    writeFileSync(filePath, formatCsv(table.headers, table.rows), 'utf-8');
    return filePath;
  });
}
