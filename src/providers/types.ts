/**
 * Shared types and interfaces for price sources.
 *
 * The return-series builder only talks to `PriceSource`; concrete sources hide
 * whether prices come from Yahoo Finance or from CSV files on disk.
 */
import type { IsoDate } from '@/types/sampling';

export interface PricePoint {
  date: IsoDate;
  /** Close adjusted for splits and distributions by the upstream feed. */
  adjClose: number;
}

export interface SymbolHistory {
  symbol: string;
  points: PricePoint[];
}

/**
 * Date x symbol table of adjusted closes. Rows ascend by date; a cell is null
 * when the symbol has no observation that day.
 */
export interface PriceTable {
  symbols: readonly string[];
  dates: readonly IsoDate[];
  values: readonly (readonly (number | null)[])[];
}

export interface PriceSource {
  readonly name: string;
  /** Single-symbol history over `[start, end)`, ascending by date. */
  fetchHistory(symbol: string, start: IsoDate, end: IsoDate): Promise<PricePoint[]>;
  /** Combined adjusted-close table over `[start, end)`, columns in `symbols` order. */
  fetchAdjustedCloses(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceTable>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
