/**
 * Time utilities for consistent calendar-date handling.
 * All dates crossing module boundaries are ISO `yyyy-MM-dd` strings.
 */

import {
  addMonths,
  differenceInCalendarDays,
  endOfMonth,
  format,
  isBefore,
  isValid,
  parse,
  subDays,
  subMonths,
  subYears,
} from 'date-fns';
import type { IsoDate, PeriodDuration } from '@/types/sampling';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): IsoDate {
  return format(date, ISO_DATE_FORMAT);
}

/**
 * Strict `yyyy-MM-dd` parse. Returns null for anything that is not a real
 * calendar date in exactly that layout (e.g. `2024-13-40`, `2023-02-29`, `2024-1-5`).
 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_RE.test(value)) return null;
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(2000, 0, 1));
  if (!isValid(parsed)) return null;
  if (formatDate(parsed) !== value) return null;
  return parsed;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

function requireIsoDate(value: IsoDate): Date {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new RangeError(`Invalid ISO date: ${value}`);
  }
  return parsed;
}

export function yearOf(date: IsoDate): number {
  return requireIsoDate(date).getFullYear();
}

/**
 * Moves a date back by a unit-tagged duration. Year and month shifts keep the
 * day of month, clamped to the last day when the target month is shorter.
 */
export function shiftBack(date: IsoDate, duration: PeriodDuration): IsoDate {
  const base = requireIsoDate(date);
  switch (duration.unit) {
    case 'years':
      return formatDate(subYears(base, duration.amount));
    case 'months':
      return formatDate(subMonths(base, duration.amount));
    case 'days':
      return formatDate(subDays(base, duration.amount));
  }
}

const MAX_ISO_YEAR = 9999;

/**
 * Adds calendar months, clamping the day to the target month's end. Returns
 * null when the result falls outside four-digit years.
 */
export function addCalendarMonths(date: IsoDate, months: number): IsoDate | null {
  const shifted = addMonths(requireIsoDate(date), months);
  if (!isValid(shifted) || shifted.getFullYear() > MAX_ISO_YEAR) return null;
  return formatDate(shifted);
}

export function isBeforeDate(a: IsoDate, b: IsoDate): boolean {
  return isBefore(requireIsoDate(a), requireIsoDate(b));
}

export function monthEndOf(date: IsoDate): IsoDate {
  return formatDate(endOfMonth(requireIsoDate(date)));
}

export function dayDistance(a: IsoDate, b: IsoDate): number {
  return Math.abs(differenceInCalendarDays(requireIsoDate(a), requireIsoDate(b)));
}
