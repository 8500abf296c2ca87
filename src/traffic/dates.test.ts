import { describe, it, expect } from 'vitest';
import { toCalendarDay, isCalendarDay, calendarDayOf, trailingWindowStart } from './dates.js';

describe('toCalendarDay', () => {
  it('strips the time from GitHub midnight timestamps', () => {
    expect(toCalendarDay('2024-01-02T00:00:00Z')).toBe('2024-01-02');
  });

  it('accepts bare calendar days', () => {
    expect(toCalendarDay('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects days that do not exist', () => {
    expect(toCalendarDay('2024-02-30')).toBeNull();
    expect(toCalendarDay('2023-02-29')).toBeNull();
    expect(toCalendarDay('2024-13-01')).toBeNull();
  });

  it('rejects non-dates', () => {
    expect(toCalendarDay('')).toBeNull();
    expect(toCalendarDay('yesterday')).toBeNull();
    expect(toCalendarDay('01/02/2024')).toBeNull();
  });
});

describe('isCalendarDay', () => {
  it('accepts only the bare day form', () => {
    expect(isCalendarDay('2024-01-02')).toBe(true);
    expect(isCalendarDay('2024-01-02T00:00:00Z')).toBe(false);
    expect(isCalendarDay(' 2024-01-02')).toBe(false);
  });

  it('rejects rollover days', () => {
    expect(isCalendarDay('2023-02-29')).toBe(false);
    expect(isCalendarDay('2024-02-29')).toBe(true);
  });
});

describe('calendarDayOf', () => {
  it('uses the UTC day', () => {
    expect(calendarDayOf(new Date('2024-06-30T23:59:59Z'))).toBe('2024-06-30');
  });
});

describe('trailingWindowStart', () => {
  it('returns the first of the 14 days ending today', () => {
    expect(trailingWindowStart(new Date('2024-01-14T12:00:00Z'))).toBe('2024-01-01');
  });

  it('crosses month boundaries', () => {
    expect(trailingWindowStart(new Date('2024-03-05T00:00:00Z'))).toBe('2024-02-21');
  });
});
