/**
 * Historical return series builder.
 *
 * Probes each ticker's history for coverage of the requested start year, pulls
 * one combined adjusted-close table, collapses it to month-end rows and turns
 * it into row-over-row fractional returns with missing cells filled with 0.
 */

import { monthEndOf, yearOf } from '@/core/time';
import type { PricePoint, PriceSource, PriceTable } from '@/providers/types';
import type { IsoDate, SamplingConfig } from '@/types/sampling';
import { createChildLogger } from '@/utils/logger';
import { DataUnavailableError } from './errors';
import type { ReturnSeries } from './types';

const logger = createChildLogger('returns');

export function earliestYear(points: readonly PricePoint[]): number | null {
  if (points.length === 0) return null;
  let earliest = points[0].date;
  for (const point of points) {
    if (point.date < earliest) earliest = point.date;
  }
  return yearOf(earliest);
}

/**
 * Rejects a basket whose histories start in different years unless the latest
 * start is the requested one. Tickers without any history are always rejected.
 */
export function assertHistoryCoverage(
  tickers: readonly string[],
  earliestYears: readonly (number | null)[],
  requestedStartYear: number
): void {
  const empty = tickers.filter((_, index) => earliestYears[index] === null);
  if (empty.length > 0) {
    throw new DataUnavailableError(
      `No historical data during specified sample period for ${empty.join(', ')}.`,
      empty
    );
  }

  const years: number[] = [];
  for (const year of earliestYears) {
    if (year !== null) years.push(year);
  }
  const latest = Math.max(...years);
  const earliest = Math.min(...years);

  if (latest !== earliest && latest !== requestedStartYear) {
    const offending = tickers.filter((_, index) => earliestYears[index] !== requestedStartYear);
    throw new DataUnavailableError(
      `Historical data during specified sample period does not exist for ${offending.join(', ')}.`,
      offending
    );
  }
}

function monthKey(date: IsoDate): string {
  return date.slice(0, 7);
}

function monthsBetween(first: IsoDate, last: IsoDate): string[] {
  let year = Number(first.slice(0, 4));
  let month = Number(first.slice(5, 7));
  const lastKey = monthKey(last);
  const keys: string[] = [];
  for (;;) {
    const key = `${year}-${String(month).padStart(2, '0')}`;
    keys.push(key);
    if (key >= lastKey) break;
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return keys;
}

/**
 * One row per calendar month between the first and last observation, dated at
 * the month's last day. Each cell holds the last non-null observation in that
 * month, or null when there was none.
 */
export function resampleMonthEnd(table: PriceTable): PriceTable {
  if (table.dates.length === 0) {
    return { symbols: table.symbols, dates: [], values: [] };
  }

  const keys = monthsBetween(table.dates[0], table.dates[table.dates.length - 1]);
  const rowByKey = new Map<string, (number | null)[]>();
  for (const key of keys) {
    rowByKey.set(key, table.symbols.map(() => null));
  }

  table.dates.forEach((date, rowIndex) => {
    const target = rowByKey.get(monthKey(date));
    if (!target) return;
    table.values[rowIndex].forEach((value, column) => {
      if (value !== null) target[column] = value;
    });
  });

  return {
    symbols: table.symbols,
    dates: keys.map((key) => monthEndOf(`${key}-01`)),
    values: keys.map((key) => rowByKey.get(key) ?? table.symbols.map(() => null)),
  };
}

/**
 * Row-over-row fractional change per column. Interior gaps carry the last
 * known price forward; cells without a prior price (including the whole first
 * row) are filled with 0.
 */
export function percentChange(table: PriceTable): ReturnSeries {
  const lastKnown: (number | null)[] = table.symbols.map(() => null);

  const values = table.values.map((row) =>
    row.map((price, column) => {
      const previous = lastKnown[column];
      const current = price ?? previous;
      lastKnown[column] = current;
      if (previous === null || current === null) return 0;
      const change = current / previous - 1;
      return Number.isNaN(change) ? 0 : change;
    })
  );

  return { symbols: table.symbols, dates: table.dates, values };
}

export async function buildReturnSeries(
  config: SamplingConfig,
  source: PriceSource
): Promise<ReturnSeries> {
  const { tickers, samplePeriodStart: start, samplePeriodEnd: end } = config;

  const earliestYears: (number | null)[] = [];
  for (const ticker of tickers) {
    earliestYears.push(earliestYear(await source.fetchHistory(ticker, start, end)));
  }
  assertHistoryCoverage(tickers, earliestYears, yearOf(start));

  const prices = await source.fetchAdjustedCloses(tickers, start, end);
  const series = percentChange(resampleMonthEnd(prices));

  logger.info(
    { source: source.name, rows: series.dates.length, columns: series.symbols.length, start, end },
    'Built monthly return series'
  );
  return series;
}
