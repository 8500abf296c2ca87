/**
 * CLI argument parsing. Kept apart from cli.ts, which runs on import.
 */

import type { RepoVisibility } from '../types/github.js';

export function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help collect" → "help-collect"
  const next = args[1];
  if (command === 'help' && next && !next.startsWith('--')) {
    command = `help-${next}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('--')) continue;
    const key = arg.slice(2);
    const value = args[i + 1];
    // Boolean flags (--no-reports) vs value flags (--owner octocat)
    if (value !== undefined && !value.startsWith('--')) {
      flags[key] = value;
      i++;
    } else {
      flags[key] = '';
    }
  }

  return { command, flags };
}

/**
 * `argName` is how the caller's users spell the option, e.g. "--visibility"
 * on the command line or "visibility" for an MCP tool argument.
 */
export function parseVisibility(
  value: string | undefined,
  argName = '--visibility'
): RepoVisibility | undefined {
  if (value === undefined) return undefined;
  if (value === 'public' || value === 'private' || value === 'all') return value;
  throw new Error(`Invalid ${argName} "${value}" (expected public, private or all)`);
}
