import type { IsoDate } from '@/types/sampling';
import type { PricePoint, PriceTable, SymbolHistory } from './types';

/**
 * Outer-joins per-symbol histories on date. Column order follows `histories`.
 */
export function mergePriceHistories(histories: readonly SymbolHistory[]): PriceTable {
  const symbols = histories.map((history) => history.symbol);
  const dateSet = new Set<IsoDate>();
  const lookups = histories.map((history) => {
    const byDate = new Map<IsoDate, number>();
    for (const point of history.points) {
      byDate.set(point.date, point.adjClose);
      dateSet.add(point.date);
    }
    return byDate;
  });

  const dates = [...dateSet].sort();
  const values = dates.map((date) => lookups.map((byDate) => byDate.get(date) ?? null));

  return { symbols, dates, values };
}

export function withinRange(points: readonly PricePoint[], start: IsoDate, end: IsoDate): PricePoint[] {
  return points
    .filter((point) => point.date >= start && point.date < end)
    .sort((a, b) => a.date.localeCompare(b.date));
}
