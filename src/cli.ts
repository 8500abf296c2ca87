#!/usr/bin/env node

/**
 * repo-traffic CLI
 *
 * Collect repository traffic from the command line. Meant to be run on a
 * schedule (cron, CI) often enough that no day leaves the 14-day window
 * uncollected.
 *
 * Usage:
 *   repo-traffic collect [--owner name] [--visibility public|private|all] [--no-reports]
 *   repo-traffic report [--out dir]
 *   repo-traffic init [--owner name] [--visibility v] [--out dir]
 *   repo-traffic status
 */

import {
  readSettings,
  configuredOwner,
  resolveOwner,
  resolveReportsDir,
  settingsExist,
  writeSettings,
  createDefaultSettings,
} from './config/settings.js';
import { configPaths } from './config/paths.js';
import { resolveGitHubCredentials, gitHubCredentialSource } from './config/credentials.js';
import { GitHubClient } from './clients/github-client.js';
import { HistoryStore } from './history/history-store.js';
import { runCollection, buildReportFromHistory } from './orchestrator/collector.js';
import { writeCsvReports } from './generators/csv-report.js';
import { generateTrafficSummary } from './generators/summary-report.js';
import { parseArgs, parseVisibility } from './commands/args.js';

// ─── Commands ───────────────────────────────────────────────

async function runCollect(flags: Record<string, string>): Promise<string> {
  const settings = readSettings();
  const client = createGitHubClient();

  const owner = await resolveOwner(
    settings,
    async () => (await client.getAuthenticatedUser()).login,
    flags['owner']
  );
  const visibility = parseVisibility(flags['visibility']) ?? settings.github.visibility;

  const store = new HistoryStore();
  try {
    const result = await runCollection(client, store, {
      owner,
      visibility,
      exclude: settings.github.exclude,
    });

    const parts = [generateTrafficSummary(result)];
    if (!('no-reports' in flags)) {
      const files = writeCsvReports(result, resolveReportsDir(settings));
      parts.push(`Wrote ${files.length} CSV reports to ${resolveReportsDir(settings)}`);
    }
    return parts.join('\n');
  } finally {
    store.close();
  }
}

function runReport(flags: Record<string, string>): string {
  const settings = readSettings();
  const store = new HistoryStore();
  try {
    const result = buildReportFromHistory(store, {
      owner: configuredOwner(settings),
    });
    const dir = flags['out'] || resolveReportsDir(settings);
    const files = writeCsvReports(result, dir);
    return `${generateTrafficSummary(result)}\nWrote ${files.length} CSV reports to ${dir}`;
  } finally {
    store.close();
  }
}

function runInit(flags: Record<string, string>): string {
  if (settingsExist()) {
    return `Settings already exist at ${configPaths().settings}`;
  }

  const settings = createDefaultSettings();
  const visibility = parseVisibility(flags['visibility']);
  if (flags['owner']) settings.github.owner = flags['owner'];
  if (visibility) settings.github.visibility = visibility;
  if (flags['out']) settings.reports.outputDir = flags['out'];

  writeSettings(settings);
  return `Wrote ${configPaths().settings}`;
}

function runStatus(): string {
  const settings = readSettings();
  const source = gitHubCredentialSource();
  const paths = configPaths();
  const lines: string[] = [];

  lines.push(`Config directory: ${paths.dir}`);
  lines.push(`Settings:         ${settingsExist() ? paths.settings : 'defaults (no settings.json)'}`);
  lines.push(`History database: ${paths.historyDb}`);
  lines.push(`Reports:          ${resolveReportsDir(settings)}`);
  lines.push(
    `GitHub token:     ${source === 'env' ? 'GITHUB_TOKEN' : source === 'file' ? 'credentials.json' : 'not configured'}`
  );
  lines.push(`Owner:            ${configuredOwner(settings) ?? '(authenticated user)'}`);
  lines.push(`Visibility:       ${settings.github.visibility}`);
  if (settings.github.exclude.length > 0) {
    lines.push(`Excluded:         ${settings.github.exclude.join(', ')}`);
  }

  return lines.join('\n');
}

// ─── Help ───────────────────────────────────────────────────

const COMMAND_HELP: Record<string, string> = {
  collect: `repo-traffic collect — Fetch traffic for every owned repository and merge it into history

  Options:
    --owner <name>          Collect repositories of this owner (default: settings, then token user)
    --visibility <v>        public | private | all (default: settings, then public)
    --no-reports            Skip writing CSV reports

  Examples:
    repo-traffic collect
    repo-traffic collect --visibility all --no-reports`,
  report: `repo-traffic report — Rebuild CSV reports and the summary from stored history

  Options:
    --out <dir>             Write CSV files here instead of the configured directory`,
  init: `repo-traffic init — Write a settings.json with defaults

  Options:
    --owner <name>          Owner to collect (default: the token user)
    --visibility <v>        public | private | all (default: public)
    --out <dir>             Directory for CSV reports`,
  status: `repo-traffic status — Show config directory, credential source and settings`,
};

function showHelp(command?: string): string {
  if (command) {
    const help = COMMAND_HELP[command];
    if (help) return help;
  }
  return `repo-traffic — GitHub repository traffic history

  Commands:
    collect     Fetch and merge traffic, then write reports
    report      Rebuild reports from stored history
    init        Write default settings
    status      Show configuration
    help <cmd>  Show help for a command

  Environment:
    GITHUB_TOKEN        Personal access token with push access to the repositories
    GITHUB_USERNAME     Owner override
    REPO_TRAFFIC_HOME   Config directory (default ~/.repo-traffic)`;
}

// ─── Helpers ────────────────────────────────────────────────

function createGitHubClient(): GitHubClient {
  const creds = resolveGitHubCredentials();
  if (!creds) {
    throw new Error(
      'GitHub credentials required. Set GITHUB_TOKEN or add it to ~/.repo-traffic/credentials.json.'
    );
  }
  return new GitHubClient(creds.token);
}

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'collect':
        output = await runCollect(flags);
        break;
      case 'report':
        output = runReport(flags);
        break;
      case 'init':
        output = runInit(flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
