import { getEnvConfig, type EnvConfig, type PriceSourceType } from '@/core/env';
import { CsvPriceSource } from './csv_price_source';
import type { PriceSource } from './types';
import { YahooPriceSource } from './yahoo_price_source';

/**
 * Create a price source based on ENV configuration.
 *
 * ENV:
 * - PRICE_SOURCE: 'yahoo' | 'csv' (default 'yahoo')
 * - PRICE_DATA_DIR: directory of `<SYMBOL>.csv` files for the csv source
 * - PRICE_UTC_OFFSET_MINUTES: exchange offset for the yahoo source (default 0)
 */
export function createPriceSource(
  sourceType?: PriceSourceType,
  env: EnvConfig = getEnvConfig()
): PriceSource {
  const type = sourceType ?? env.priceSource;

  switch (type) {
    case 'yahoo':
      return new YahooPriceSource({ utcOffsetMinutes: env.priceUtcOffsetMinutes });
    case 'csv':
      return new CsvPriceSource(env.priceDataDir);
  }
}
