export type IsoDate = string;

export const PERIOD_TOKENS = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y'] as const;
export type PeriodToken = (typeof PERIOD_TOKENS)[number];

export type PeriodUnit = 'days' | 'months' | 'years';

export interface PeriodDuration {
  unit: PeriodUnit;
  amount: number;
}

/** Shape of the JSON document on disk, as accepted by the schema. */
export interface SamplingConfigDocument {
  tickers: string[];
  dataParameters: {
    sample_time_step: unknown;
    total_sample_period: unknown;
    sample_period_end: string;
    [key: string]: unknown;
  };
}

export interface SamplingConfig {
  readonly tickers: readonly string[];
  readonly sampleTimeStep: PeriodToken;
  readonly totalSamplePeriod: PeriodDuration;
  readonly samplePeriodEnd: IsoDate;
  /** `samplePeriodEnd` shifted back by `totalSamplePeriod`. */
  readonly samplePeriodStart: IsoDate;
}
