import { describe, expect, it } from 'vitest';
import {
  addCalendarMonths,
  isBeforeDate,
  dayDistance,
  isIsoDate,
  monthEndOf,
  parseIsoDate,
  shiftBack,
  yearOf,
} from '@/core/time';

describe('parseIsoDate', () => {
  it('accepts real calendar dates in yyyy-MM-dd', () => {
    expect(isIsoDate('2024-01-01')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects impossible dates and other layouts', () => {
    expect(parseIsoDate('2024-13-40')).toBeNull();
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-1-05')).toBeNull();
    expect(parseIsoDate('01/05/2024')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });
});

describe('shiftBack', () => {
  it('reduces the year and keeps month and day', () => {
    expect(shiftBack('2024-01-01', { unit: 'years', amount: 5 })).toBe('2019-01-01');
    expect(shiftBack('2023-07-15', { unit: 'years', amount: 10 })).toBe('2013-07-15');
  });

  it('clamps a leap day to the end of February', () => {
    expect(shiftBack('2024-02-29', { unit: 'years', amount: 1 })).toBe('2023-02-28');
  });

  it('shifts by months and days', () => {
    expect(shiftBack('2024-05-31', { unit: 'months', amount: 3 })).toBe('2024-02-29');
    expect(shiftBack('2024-03-01', { unit: 'days', amount: 1 })).toBe('2024-02-29');
  });
});

describe('calendar helpers', () => {
  it('adds calendar months with month-end clamping', () => {
    expect(addCalendarMonths('2023-01-31', 1)).toBe('2023-02-28');
    expect(addCalendarMonths('2023-01-31', 13)).toBe('2024-02-29');
    expect(addCalendarMonths('2023-01-15', 5)).toBe('2023-06-15');
  });

  it('returns null when adding months leaves four-digit years', () => {
    expect(addCalendarMonths('9999-12-01', 1)).toBeNull();
    expect(addCalendarMonths('2024-01-31', 1e9)).toBeNull();
  });

  it('orders dates chronologically', () => {
    expect(isBeforeDate('2023-12-31', '2024-01-01')).toBe(true);
    expect(isBeforeDate('2024-01-01', '2024-01-01')).toBe(false);
  });

  it('resolves the last day of a month', () => {
    expect(monthEndOf('2024-02-10')).toBe('2024-02-29');
    expect(monthEndOf('2023-12-01')).toBe('2023-12-31');
  });

  it('measures absolute calendar-day distance', () => {
    expect(dayDistance('2023-01-30', '2023-02-01')).toBe(2);
    expect(dayDistance('2023-02-01', '2023-01-30')).toBe(2);
    expect(dayDistance('2023-03-26', '2023-03-27')).toBe(1);
  });

  it('extracts the year', () => {
    expect(yearOf('2019-06-30')).toBe(2019);
  });

  it('throws on malformed input', () => {
    expect(() => yearOf('2019-6-30')).toThrow(RangeError);
  });
});
