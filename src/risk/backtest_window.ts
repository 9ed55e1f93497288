/**
 * Backtest window resampler.
 *
 * Re-derives risk metrics over the leading `durationMonths` of a full-period
 * return series, snapping the window end to the row nearest to
 * first date + durationMonths.
 */

import { addCalendarMonths, dayDistance, isBeforeDate } from '@/core/time';
import type { IsoDate } from '@/types/sampling';
import { createChildLogger } from '@/utils/logger';
import { ValidationError } from './errors';
import { computeRiskMetrics } from './metrics';
import type { ReturnSeries, RiskMetrics } from './types';

const logger = createChildLogger('backtest_window');

/**
 * Index of the date closest to `target`. Equidistant candidates resolve to the
 * earlier date.
 */
export function closestDateIndex(dates: readonly IsoDate[], target: IsoDate): number {
  let bestIndex = -1;
  let bestDistance = Number.POSITIVE_INFINITY;
  dates.forEach((date, index) => {
    const distance = dayDistance(date, target);
    if (distance < bestDistance || (distance === bestDistance && date < dates[bestIndex])) {
      bestIndex = index;
      bestDistance = distance;
    }
  });
  return bestIndex;
}

/** Leading rows of `series` up to and including `lastIndex`, as a new series. */
export function truncateSeries(series: ReturnSeries, lastIndex: number): ReturnSeries {
  return {
    symbols: [...series.symbols],
    dates: series.dates.slice(0, lastIndex + 1),
    values: series.values.slice(0, lastIndex + 1).map((row) => [...row]),
  };
}

export function backtestResample(series: ReturnSeries, durationMonths: number): RiskMetrics {
  if (!Number.isInteger(durationMonths) || durationMonths <= 0) {
    throw new ValidationError(
      `Duration must be a positive integer. Currently of value ${durationMonths} and type ${typeof durationMonths}`,
      { durationMonths }
    );
  }
  if (series.dates.length === 0) {
    throw new ValidationError('Cannot resample an empty returns series.');
  }

  const startDate = series.dates[0];
  const lastDate = series.dates[series.dates.length - 1];
  const endDate = addCalendarMonths(startDate, durationMonths);
  const overshoots = endDate === null || isBeforeDate(lastDate, endDate);

  if (overshoots && durationMonths !== series.dates.length) {
    throw new ValidationError('Duration exceeds the length of the returns series.', {
      durationMonths,
      rows: series.dates.length,
      startDate,
      lastDate,
      endDate,
    });
  }

  // an end past year 9999 can only be reached through the row-count rule
  const closestIndex =
    endDate === null ? series.dates.length - 1 : closestDateIndex(series.dates, endDate);
  const windowed = truncateSeries(series, closestIndex);

  logger.debug(
    { durationMonths, startDate, endDate, closestDate: series.dates[closestIndex], rows: windowed.dates.length },
    'Resampled backtest window'
  );

  return computeRiskMetrics(windowed);
}
