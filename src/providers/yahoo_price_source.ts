import { addMinutes } from 'date-fns';
import yahooFinance from 'yahoo-finance2';
import type { IsoDate } from '@/types/sampling';
import { createChildLogger } from '@/utils/logger';
import { mergePriceHistories, withinRange } from './price_table';
import { ProviderError, type PricePoint, type PriceSource, type PriceTable, type SymbolHistory } from './types';

const logger = createChildLogger('yahoo_prices');

export interface YahooPriceSourceOptions {
  /**
   * Offset of the listing exchange from UTC. Bars are stamped at the exchange's
   * local session time, so markets east of UTC need a positive offset to keep
   * each bar on its trading day. Defaults to 0, which is correct for US listings.
   */
  utcOffsetMinutes?: number;
}

/**
 * Daily adjusted closes from Yahoo Finance. One request per symbol, no retries:
 * a failed request rejects the whole fetch.
 */
export class YahooPriceSource implements PriceSource {
  readonly name = 'yahoo';
  private requestCount = 0;
  private readonly utcOffsetMinutes: number;

  constructor(options: YahooPriceSourceOptions = {}) {
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
  }

  async fetchHistory(symbol: string, start: IsoDate, end: IsoDate): Promise<PricePoint[]> {
    const rows = await yahooFinance
      .historical(symbol, {
        period1: start,
        period2: end,
        interval: '1d',
        events: 'history',
      })
      .catch((error: unknown) => {
        throw new ProviderError(
          `Yahoo Finance history request failed for ${symbol}`,
          this.name,
          symbol,
          'historical',
          error instanceof Error ? error : new Error(String(error))
        );
      });
    this.requestCount += 1;

    const points: PricePoint[] = [];
    for (const row of rows) {
      const price = row.adjClose ?? row.close;
      if (!Number.isFinite(price) || price <= 0) continue;
      points.push({ date: this.tradingDay(row.date), adjClose: price });
    }

    logger.debug({ symbol, start, end, points: points.length }, 'Fetched price history');
    return withinRange(points, start, end);
  }

  async fetchAdjustedCloses(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceTable> {
    const histories: SymbolHistory[] = [];
    for (const symbol of symbols) {
      histories.push({ symbol, points: await this.fetchHistory(symbol, start, end) });
    }
    return mergePriceHistories(histories);
  }

  private tradingDay(timestamp: Date): IsoDate {
    return addMinutes(timestamp, this.utcOffsetMinutes).toISOString().slice(0, 10);
  }

  getRequestCount(): number {
    return this.requestCount;
  }
}
