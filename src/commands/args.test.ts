import { describe, it, expect } from 'vitest';
import { parseArgs, parseVisibility } from './args.js';

const argv = (...args: string[]) => ['node', 'repo-traffic', ...args];

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs(argv())).toEqual({ command: 'help', flags: {} });
  });

  it('reads value and boolean flags', () => {
    expect(parseArgs(argv('collect', '--owner', 'octo', '--no-reports'))).toEqual({
      command: 'collect',
      flags: { owner: 'octo', 'no-reports': '' },
    });
  });

  it('treats a flag followed by another flag as boolean', () => {
    expect(parseArgs(argv('collect', '--no-reports', '--visibility', 'all')).flags).toEqual({
      'no-reports': '',
      visibility: 'all',
    });
  });

  it('folds "help <command>" into one command', () => {
    expect(parseArgs(argv('help', 'collect')).command).toBe('help-collect');
  });

  it('ignores stray positional arguments', () => {
    expect(parseArgs(argv('report', 'extra', '--out', 'tmp')).flags).toEqual({ out: 'tmp' });
  });
});

describe('parseVisibility', () => {
  it('passes through undefined', () => {
    expect(parseVisibility(undefined)).toBeUndefined();
  });

  it('accepts the three visibilities', () => {
    expect(parseVisibility('public')).toBe('public');
    expect(parseVisibility('private')).toBe('private');
    expect(parseVisibility('all')).toBe('all');
  });

  it('rejects anything else', () => {
    expect(() => parseVisibility('internal')).toThrow(
      'Invalid --visibility "internal" (expected public, private or all)'
    );
  });

  it('names the option the way the caller spells it', () => {
    expect(() => parseVisibility('secret', 'visibility')).toThrow(
      'Invalid visibility "secret" (expected public, private or all)'
    );
  });
});
