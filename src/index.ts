#!/usr/bin/env node

/**
 * repo-traffic MCP Server
 *
 * Collects GitHub repository traffic into a local history and reports on it.
 *
 * Tools:
 *   Collect: collect_traffic
 *   Reports: traffic_summary
 *   Info:    get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { resolveGitHubCredentials } from './config/credentials.js';
import {
  readSettings,
  configuredOwner,
  resolveOwner,
  resolveReportsDir,
  settingsExist,
} from './config/settings.js';
import { configPaths } from './config/paths.js';
import { GitHubClient } from './clients/github-client.js';
import { HistoryStore } from './history/history-store.js';
import { runCollection, buildReportFromHistory } from './orchestrator/collector.js';
import { writeCsvReports } from './generators/csv-report.js';
import { generateTrafficSummary } from './generators/summary-report.js';
import { parseVisibility } from './commands/args.js';

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

const SERVER_INSTRUCTIONS = `repo-traffic collects GitHub repository stars, forks, watchers, views and clones into a local history that outlives GitHub's 14-day traffic window.

Use repo-traffic tools when the user asks about:
- Refreshing or collecting repository traffic, stars, clones, views → collect_traffic
- How their repositories are doing, traffic trends, most popular repo → traffic_summary
- Whether credentials and settings are configured → get_capabilities`;

const server = new Server(
  { name: 'repo-traffic', version: '1.0.0' },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'collect_traffic',
        description:
          'Fetch stars, forks, watchers and the last 14 days of views and clones for every owned repository, merge them into the local history and write CSV reports. Use when the user asks to "collect traffic", "refresh repo stats", "update traffic history".',
        inputSchema: {
          type: 'object' as const,
          properties: {
            owner: {
              type: 'string' as const,
              description: 'Repository owner (optional — defaults to settings, then the token user)',
            },
            visibility: {
              type: 'string' as const,
              enum: ['public', 'private', 'all'],
              description: 'Which repositories to include (optional — defaults to settings)',
            },
            writeReports: {
              type: 'boolean' as const,
              description: 'Write CSV reports after collecting (default true)',
            },
          },
        },
      },
      {
        name: 'traffic_summary',
        description:
          'Summarize stored traffic history without calling GitHub: totals, top repositories and daily views/clones. Use when the user asks: "how are my repos doing", "traffic report", "most starred repo".',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
      {
        name: 'get_capabilities',
        description: 'Returns available tools, settings and credential status.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

// ─── Prompts ─────────────────────────────────────────────────

const PROMPTS = [
  {
    name: 'traffic-report',
    description: 'Collect fresh traffic and summarize repository popularity',
  },
];

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const prompt = PROMPTS.find((p) => p.name === request.params.name);
  if (!prompt) {
    throw new Error(`Unknown prompt: ${request.params.name}`);
  }

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user' as const,
        content: {
          type: 'text' as const,
          text: 'Use the repo-traffic collect_traffic tool, then summarize the most notable changes.',
        },
      },
    ],
  };
});

// ─── Tool Handlers ───────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'collect_traffic':
        return await handleCollectTraffic(args);
      case 'traffic_summary':
        return handleTrafficSummary();
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Collect ─────────────────────────────────────────────────

async function handleCollectTraffic(args: Record<string, unknown> | undefined): Promise<ToolResult> {
  const ownerArg = args?.['owner'];
  const visibilityArg = args?.['visibility'];
  const writeReports = args?.['writeReports'] !== false;

  let ownerOverride: string | undefined;
  if (typeof ownerArg === 'string' && ownerArg.trim()) {
    ownerOverride = ownerArg.trim();
  } else if (ownerArg !== undefined) {
    throw new Error('owner must be a non-empty string');
  }

  let visibilityOverride: string | undefined;
  if (typeof visibilityArg === 'string') {
    visibilityOverride = visibilityArg;
  } else if (visibilityArg !== undefined) {
    throw new Error('visibility must be one of public, private, all');
  }

  const creds = resolveGitHubCredentials();
  if (!creds) {
    throw new Error('GitHub credentials required. Set GITHUB_TOKEN in the MCP server env.');
  }

  const settings = readSettings();
  const client = new GitHubClient(creds.token);
  const owner = await resolveOwner(
    settings,
    async () => (await client.getAuthenticatedUser()).login,
    ownerOverride
  );
  const visibility = parseVisibility(visibilityOverride, 'visibility') ?? settings.github.visibility;

  const store = new HistoryStore();
  try {
    const result = await runCollection(client, store, {
      owner,
      visibility,
      exclude: settings.github.exclude,
    });

    const parts = [generateTrafficSummary(result)];
    if (writeReports) {
      const dir = resolveReportsDir(settings);
      const files = writeCsvReports(result, dir);
      parts.push(`Wrote ${files.length} CSV reports to \`${dir}\``);
    }
    return { content: [{ type: 'text', text: parts.join('\n') }] };
  } finally {
    store.close();
  }
}

// ─── Summary ─────────────────────────────────────────────────

function handleTrafficSummary(): ToolResult {
  const settings = readSettings();
  const store = new HistoryStore();
  try {
    const result = buildReportFromHistory(store, {
      owner: configuredOwner(settings),
    });
    if (result.snapshots.length === 0) {
      return {
        content: [
          { type: 'text', text: 'No traffic history yet. Run `collect_traffic` first.' },
        ],
      };
    }
    return { content: [{ type: 'text', text: generateTrafficSummary(result) }] };
  } finally {
    store.close();
  }
}

// ─── Capabilities ────────────────────────────────────────────

function handleGetCapabilities(): ToolResult {
  const settings = readSettings();
  const ghCreds = resolveGitHubCredentials();
  const paths = configPaths();
  const parts: string[] = [];

  parts.push('# repo-traffic');
  parts.push('');
  parts.push('## Tools');
  parts.push('');
  parts.push('- `collect_traffic` — fetch, merge and report');
  parts.push('- `traffic_summary` — report from stored history');
  parts.push('- `get_capabilities` — this status');
  parts.push('');
  parts.push('## Status');
  parts.push('');
  parts.push(`| Component | Status |`);
  parts.push(`|-----------|--------|`);
  parts.push(`| Config directory | \`${paths.dir}\` |`);
  parts.push(`| Settings | ${settingsExist() ? '✅ settings.json' : 'defaults'} |`);
  parts.push(`| History database | \`${paths.historyDb}\` |`);
  parts.push(`| Reports directory | \`${resolveReportsDir(settings)}\` |`);
  parts.push(`| GitHub credentials | ${ghCreds ? '✅ Token configured' : '❌ Not configured'} |`);
  parts.push(`| Visibility | ${settings.github.visibility} |`);
  parts.push('');

  if (!ghCreds) {
    parts.push('## Getting Started');
    parts.push('');
    parts.push(
      'Create a personal access token with access to repository traffic (push access) and add it to the MCP server env as `GITHUB_TOKEN`.'
    );
    parts.push('');
  }

  return { content: [{ type: 'text', text: parts.join('\n') }] };
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[repo-traffic] MCP server v1.0.0 started');
}

main().catch((error) => {
  console.error('[repo-traffic] Fatal error:', error);
  process.exit(1);
});
