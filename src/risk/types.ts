import type { IsoDate } from '@/types/sampling';

/**
 * Periodic fractional returns. Rows are period-end dates in strictly ascending
 * order, columns follow the configured ticker order. The first row has no prior
 * period and is all zeros; no cell is ever missing.
 */
export interface ReturnSeries {
  symbols: readonly string[];
  dates: readonly IsoDate[];
  values: readonly (readonly number[])[];
}

export type VolatilityMap = Record<string, number>;

export type CovarianceMatrix = Record<string, Record<string, number>>;

export interface RiskMetrics {
  returns: ReturnSeries;
  /** Sample standard deviation (N - 1) per symbol. */
  volatilities: VolatilityMap;
  /** Symmetric sample covariance (N - 1), indexed symbol x symbol. */
  covariance: CovarianceMatrix;
}

export type RiskMetricsTuple = [ReturnSeries, VolatilityMap, CovarianceMatrix];

export function toMetricsTuple(metrics: RiskMetrics): RiskMetricsTuple {
  return [metrics.returns, metrics.volatilities, metrics.covariance];
}

export function seriesShape(series: ReturnSeries): [rows: number, columns: number] {
  return [series.values.length, series.symbols.length];
}

export function seriesColumn(series: ReturnSeries, symbol: string): number[] {
  const index = series.symbols.indexOf(symbol);
  if (index < 0) {
    throw new RangeError(`Unknown symbol in return series: ${symbol}`);
  }
  return series.values.map((row) => row[index]);
}
