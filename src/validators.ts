/**
 * Zod schemas for data crossing a trust boundary: GitHub traffic
 * responses and rows read back from the history database.
 */

import { z } from 'zod';
import { isCalendarDay, toCalendarDay } from './traffic/dates.js';
import type { TrafficPoint } from './types/traffic.js';

const countSchema = z.number().int().nonnegative();

const calendarDaySchema = z.string().transform((value, ctx) => {
  const day = toCalendarDay(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${value}"` });
    return z.NEVER;
  }
  return day;
});

/** Stored days are never normalized: only the exact form is accepted. */
const storedDaySchema = z
  .string()
  .refine(isCalendarDay, (value) => ({ message: `invalid date "${value}"` }));

const ApiTrafficEntrySchema = z.object({
  timestamp: calendarDaySchema,
  count: countSchema,
  uniques: countSchema,
});

/** GET /repos/{owner}/{repo}/traffic/views */
export const ViewsResponseSchema = z.object({
  count: countSchema.optional(),
  uniques: countSchema.optional(),
  views: z.array(ApiTrafficEntrySchema),
});

/** GET /repos/{owner}/{repo}/traffic/clones */
export const ClonesResponseSchema = z.object({
  count: countSchema.optional(),
  uniques: countSchema.optional(),
  clones: z.array(ApiTrafficEntrySchema),
});

/** A traffic_points row as stored. Column types are not trusted. */
export const StoredTrafficRowSchema = z.object({
  date: storedDaySchema,
  count: countSchema,
  uniques: countSchema,
});

/**
 * Validate a raw traffic response for the given kind.
 * Returns the daily points, oldest first, or the validation problem.
 */
export function parseTrafficResponse(
  kind: 'views' | 'clones',
  raw: unknown
): { ok: true; points: TrafficPoint[] } | { ok: false; error: string } {
  const entries =
    kind === 'views'
      ? ViewsResponseSchema.safeParse(raw)
      : ClonesResponseSchema.safeParse(raw);

  if (!entries.success) {
    return { ok: false, error: formatIssues(entries.error) };
  }

  const list = 'views' in entries.data ? entries.data.views : entries.data.clones;
  return {
    ok: true,
    points: list.map((e) => ({ date: e.timestamp, count: e.count, uniques: e.uniques })),
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
    .join('; ');
}
