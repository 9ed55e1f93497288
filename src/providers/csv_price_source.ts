import fs from 'fs/promises';
import path from 'path';
import type { IsoDate } from '@/types/sampling';
import { isIsoDate } from '@/core/time';
import { mergePriceHistories, withinRange } from './price_table';
import { ProviderError, type PricePoint, type PriceSource, type PriceTable, type SymbolHistory } from './types';

/**
 * Reads `<dataDir>/<SYMBOL>.csv` files with a `date` column and an `adj_close`
 * (preferred) or `close` column.
 */
export class CsvPriceSource implements PriceSource {
  readonly name = 'csv';

  constructor(private readonly dataDir: string) {}

  async fetchHistory(symbol: string, start: IsoDate, end: IsoDate): Promise<PricePoint[]> {
    const file = path.join(this.dataDir, `${symbol}.csv`);
    let csv: string;
    try {
      csv = await fs.readFile(file, 'utf-8');
    } catch (error) {
      throw new ProviderError(
        `Historical data not found for ${symbol} (${file})`,
        this.name,
        symbol,
        'fetchHistory',
        error instanceof Error ? error : undefined
      );
    }
    return withinRange(this.parseCSV(symbol, csv), start, end);
  }

  async fetchAdjustedCloses(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceTable> {
    const histories: SymbolHistory[] = [];
    for (const symbol of symbols) {
      histories.push({ symbol, points: await this.fetchHistory(symbol, start, end) });
    }
    return mergePriceHistories(histories);
  }

  private parseCSV(symbol: string, csv: string): PricePoint[] {
    const lines = csv.trim().split(/\r?\n/);
    const header = (lines[0] ?? '').split(',').map((column) => column.trim().toLowerCase());
    const dateIdx = header.indexOf('date');
    const adjIdx = header.indexOf('adj_close');
    const priceIdx = adjIdx >= 0 ? adjIdx : header.indexOf('close');

    if (dateIdx < 0 || priceIdx < 0) {
      throw new ProviderError(
        `CSV for ${symbol} needs a date and an adj_close or close column`,
        this.name,
        symbol,
        'parseCSV'
      );
    }

    const points: PricePoint[] = [];
    lines.slice(1).forEach((line, index) => {
      if (!line.trim()) return;
      const parts = line.split(',');
      const date = (parts[dateIdx] ?? '').trim();
      const price = Number(parts[priceIdx]);
      if (!isIsoDate(date) || !Number.isFinite(price) || price <= 0) {
        throw new ProviderError(
          `Invalid price row ${index + 2} in CSV for ${symbol}: ${line}`,
          this.name,
          symbol,
          'parseCSV'
        );
      }
      points.push({ date, adjClose: price });
    });
    return points;
  }
}
