/**
 * Collection Errors
 *
 * Missing samples and malformed records are per-repository and recoverable.
 * A history write failure is fatal for the run.
 */

import type { MetricKind } from '../types/traffic.js';

export class MissingSampleError extends Error {
  constructor(
    public repoName: string,
    public kind: MetricKind,
    public reason: string
  ) {
    super(`No ${kind} traffic for ${repoName}: ${reason}`);
    this.name = 'MissingSampleError';
  }
}

export class MalformedRecordError extends Error {
  constructor(
    public repoName: string,
    public kind: MetricKind,
    public row: unknown,
    public reason: string
  ) {
    super(`Dropped malformed ${kind} record for ${repoName}: ${reason}`);
    this.name = 'MalformedRecordError';
  }
}

export class HistoryWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryWriteError';
  }
}
