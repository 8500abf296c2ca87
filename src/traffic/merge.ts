/**
 * Traffic Merge
 *
 * Reconciles a freshly fetched trailing window against persisted history
 * for one (repository, metric kind) key. Pure function — no I/O.
 */

import type { TrafficPoint } from '../types/traffic.js';

/**
 * Merge incoming points into existing history.
 *
 * - One point per distinct date, ascending.
 * - A date present in both keeps the incoming values: recent days are still
 *   accruing traffic until they leave the trailing window.
 * - Dates only in history are kept unchanged, which is how history grows
 *   past the 14 days the API exposes.
 *
 * Applying the same incoming batch twice yields the same result as once.
 */
export function mergeTrafficPoints(
  existing: readonly TrafficPoint[],
  incoming: readonly TrafficPoint[]
): TrafficPoint[] {
  const byDate = new Map<string, TrafficPoint>();

  for (const point of existing) {
    byDate.set(point.date, { ...point });
  }
  for (const point of incoming) {
    byDate.set(point.date, { ...point });
  }

  return [...byDate.values()].sort(compareByDate);
}

/** Ascending date order. Works on YYYY-MM-DD strings. */
export function compareByDate(a: { date: string }, b: { date: string }): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}
