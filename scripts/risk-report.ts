/**
 * Risk Report Script
 * Builds the monthly return series for the configured basket and logs
 * volatilities and covariance, optionally for a leading backtest window too.
 *
 * Usage: npx tsx scripts/risk-report.ts [--config=config/sampling.json] [--backtest-months=5]
 */

import 'dotenv/config';
import { resolve } from 'path';
import { createPriceSource } from '../src/providers/registry';
import { runRiskPipeline } from '../src/risk/pipeline';
import { RiskPipelineError } from '../src/risk/errors';
import type { RiskMetrics } from '../src/risk/types';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('risk_report');

const HEAD_ROWS = 5;

interface RiskReportCliArgs {
  configPath: string;
  backtestMonths: number | undefined;
}

function readArg(flagName: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${flagName}=`));
  if (equalsArg) return equalsArg.slice(flagName.length + 1);
  const posIndex = process.argv.findIndex((arg) => arg === flagName);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function applyCliArgs(): RiskReportCliArgs {
  const configPath = resolve(process.cwd(), readArg('--config') ?? 'config/sampling.json');
  const backtestRaw = readArg('--backtest-months');
  return {
    configPath,
    backtestMonths: backtestRaw === undefined ? undefined : Number(backtestRaw),
  };
}

function logMetrics(label: string, metrics: RiskMetrics): void {
  const { returns } = metrics;
  const head = returns.dates.slice(0, HEAD_ROWS).map((date, row) => ({
    date,
    ...Object.fromEntries(returns.symbols.map((symbol, column) => [symbol, returns.values[row][column]])),
  }));
  logger.info({ rows: returns.dates.length, head }, `${label}: returns`);
  logger.info({ volatilities: metrics.volatilities }, `${label}: volatilities`);
  logger.info({ covariance: metrics.covariance }, `${label}: covariance`);
}

async function main() {
  const args = applyCliArgs();
  const source = createPriceSource();
  logger.info({ config: args.configPath, source: source.name }, 'Starting risk report');

  const result = await runRiskPipeline({
    configPath: args.configPath,
    source,
    backtestMonths: args.backtestMonths,
  });

  logMetrics('Full period', result.full);
  if (result.backtest) {
    logMetrics(`Backtest ${args.backtestMonths} months`, result.backtest);
  }
}

main().catch((error: unknown) => {
  if (error instanceof RiskPipelineError) {
    logger.error({ code: error.code, details: error.details }, error.message);
  } else {
    logger.error({ err: error }, 'Risk report failed');
  }
  process.exitCode = 1;
});
