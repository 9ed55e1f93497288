import { ComputationError } from './errors';
import {
  seriesColumn,
  seriesShape,
  type CovarianceMatrix,
  type ReturnSeries,
  type RiskMetrics,
  type VolatilityMap,
} from './types';

export function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample covariance with an N - 1 denominator. */
export function sampleCovariance(x: readonly number[], y: readonly number[]): number {
  const mx = mean(x);
  const my = mean(y);
  let sum = 0;
  for (let i = 0; i < x.length; i += 1) sum += (x[i] - mx) * (y[i] - my);
  return sum / (x.length - 1);
}

export function sampleStdDev(values: readonly number[]): number {
  return Math.sqrt(sampleCovariance(values, values));
}

function assertComputable(series: ReturnSeries): void {
  const shape = seriesShape(series);
  const [rows, columns] = shape;
  const describe = `Returns matrix of shape: (${rows}, ${columns})`;

  if (columns === 0) {
    throw new ComputationError(`Error calculating risk metrics, no instruments. ${describe}`, shape);
  }
  if (rows < 2) {
    throw new ComputationError(
      `Error calculating risk metrics, at least 2 rows are required. ${describe}`,
      shape
    );
  }
  if (series.dates.length !== rows) {
    throw new ComputationError(
      `Error calculating risk metrics, ${series.dates.length} dates for ${rows} rows. ${describe}`,
      shape
    );
  }
  series.values.forEach((row, rowIndex) => {
    if (row.length !== columns) {
      throw new ComputationError(
        `Error calculating risk metrics, row ${rowIndex} has ${row.length} cells. ${describe}`,
        shape
      );
    }
    row.forEach((value, column) => {
      if (!Number.isFinite(value)) {
        throw new ComputationError(
          `Error calculating risk metrics, non-finite value at row ${rowIndex}, column ${series.symbols[column]}. ${describe}`,
          shape
        );
      }
    });
  });
}

/**
 * Volatility per instrument and the full covariance matrix over every row of
 * `series`. The input is returned as-is in `returns` and never modified.
 */
export function computeRiskMetrics(series: ReturnSeries): RiskMetrics {
  assertComputable(series);

  const { symbols } = series;
  const columns = symbols.map((symbol) => seriesColumn(series, symbol));

  const covariance: CovarianceMatrix = {};
  for (const symbol of symbols) covariance[symbol] = {};
  for (let i = 0; i < symbols.length; i += 1) {
    for (let j = i; j < symbols.length; j += 1) {
      const value = sampleCovariance(columns[i], columns[j]);
      covariance[symbols[i]][symbols[j]] = value;
      covariance[symbols[j]][symbols[i]] = value;
    }
  }

  const volatilities: VolatilityMap = {};
  symbols.forEach((symbol, index) => {
    volatilities[symbol] = sampleStdDev(columns[index]);
  });

  return { returns: series, volatilities, covariance };
}
