import { loadSamplingConfig } from '@/core/sampling_config';
import type { PriceSource } from '@/providers/types';
import type { SamplingConfig } from '@/types/sampling';
import { createChildLogger } from '@/utils/logger';
import { backtestResample } from './backtest_window';
import { computeRiskMetrics } from './metrics';
import { buildReturnSeries } from './returns';
import type { RiskMetrics } from './types';

const logger = createChildLogger('risk_pipeline');

export interface RiskPipelineOptions {
  configPath: string;
  source: PriceSource;
  /** When set, metrics are also computed over the leading window of this many months. */
  backtestMonths?: number;
}

export interface RiskPipelineResult {
  config: SamplingConfig;
  full: RiskMetrics;
  backtest: RiskMetrics | null;
}

export async function runRiskPipeline(options: RiskPipelineOptions): Promise<RiskPipelineResult> {
  const config = loadSamplingConfig(options.configPath);
  const returns = await buildReturnSeries(config, options.source);
  const full = computeRiskMetrics(returns);

  const backtest =
    options.backtestMonths === undefined ? null : backtestResample(returns, options.backtestMonths);

  logger.info(
    {
      tickers: config.tickers.length,
      rows: returns.dates.length,
      backtestRows: backtest?.returns.dates.length ?? null,
    },
    'Risk pipeline finished'
  );

  return { config, full, backtest };
}
