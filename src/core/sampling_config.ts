/**
 * Sampling configuration loaded from a JSON file.
 *
 * Expected document:
 *   {
 *     "tickers": ["XLC", "XLY", "XLP"],
 *     "dataParameters": {
 *       "sample_time_step": "1mo",
 *       "total_sample_period": "5y",
 *       "sample_period_end": "2024-01-01"
 *     }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { validateSamplingConfigDocument } from '@/validation/ajv_instance';
import { isIsoDate, shiftBack } from '@/core/time';
import { NotFoundError, ParseError, SchemaError, ValidationError } from '@/risk/errors';
import { createChildLogger } from '@/utils/logger';
import {
  PERIOD_TOKENS,
  type PeriodDuration,
  type PeriodToken,
  type SamplingConfig,
} from '@/types/sampling';

const logger = createChildLogger('sampling_config');

const PERIOD_TOKEN_RE = /^(\d+)(d|mo|y)$/;
const DATE_PARAMETER = 'sample_period_end';

export function toPeriodToken(value: unknown): PeriodToken | null {
  if (typeof value !== 'string') return null;
  return PERIOD_TOKENS.find((token) => token === value) ?? null;
}

/**
 * Splits a period token into a unit-tagged duration, e.g. `5y` -> 5 years,
 * `3mo` -> 3 months, `1d` -> 1 day.
 */
export function parsePeriodDuration(token: PeriodToken): PeriodDuration {
  const match = PERIOD_TOKEN_RE.exec(token);
  if (!match) {
    throw new ValidationError(`Unrecognised period token: ${token}`, { token });
  }
  const amount = Number(match[1]);
  switch (match[2]) {
    case 'd':
      return { unit: 'days', amount };
    case 'mo':
      return { unit: 'months', amount };
    default:
      return { unit: 'years', amount };
  }
}

function normalizeTickers(tickers: string[]): string[] {
  if (tickers.length === 0) {
    throw new ValidationError('At least one ticker is required in tickers.');
  }

  const seen = new Set<string>();
  return tickers.map((raw, index) => {
    const ticker = raw.trim();
    if (!ticker) {
      throw new ValidationError(`Blank ticker at index ${index}.`, { index });
    }
    if (seen.has(ticker)) {
      throw new ValidationError(`Duplicate ticker: ${ticker}.`, { ticker });
    }
    seen.add(ticker);
    return ticker;
  });
}

/**
 * Validates an already-decoded configuration document.
 */
export function parseSamplingConfig(raw: unknown): SamplingConfig {
  const result = validateSamplingConfigDocument(raw);
  if (!result.valid) {
    throw new SchemaError(
      `Missing or invalid keys in sampling config: ${result.errors.join('; ')}`,
      result.errors
    );
  }

  const { tickers, dataParameters } = result.data;
  const samplePeriodEnd = dataParameters.sample_period_end;
  if (!isIsoDate(samplePeriodEnd)) {
    throw new ValidationError(
      'Invalid date format in sample_period_end, expected YYYY-MM-DD.',
      { value: samplePeriodEnd }
    );
  }

  for (const [key, value] of Object.entries(dataParameters)) {
    if (key === DATE_PARAMETER) continue;
    if (toPeriodToken(value) === null) {
      throw new ValidationError(
        `Invalid period value in ${key}, accepted values include: ${PERIOD_TOKENS.map((t) => `'${t}'`).join(', ')}.`,
        { key, value }
      );
    }
  }

  const sampleTimeStep = toPeriodToken(dataParameters.sample_time_step);
  const totalPeriodToken = toPeriodToken(dataParameters.total_sample_period);
  if (!sampleTimeStep || !totalPeriodToken) {
    throw new ValidationError('sample_time_step and total_sample_period must be period tokens.');
  }

  const totalSamplePeriod = parsePeriodDuration(totalPeriodToken);
  if (totalSamplePeriod.unit !== 'years') {
    throw new ValidationError(
      `total_sample_period must be expressed in whole years (e.g. '5y'), got '${totalPeriodToken}'.`,
      { value: totalPeriodToken }
    );
  }

  const config: SamplingConfig = Object.freeze({
    tickers: Object.freeze(normalizeTickers(tickers)),
    sampleTimeStep,
    totalSamplePeriod: Object.freeze(totalSamplePeriod),
    samplePeriodEnd,
    samplePeriodStart: shiftBack(samplePeriodEnd, totalSamplePeriod),
  });

  logger.debug(
    {
      tickers: config.tickers,
      start: config.samplePeriodStart,
      end: config.samplePeriodEnd,
    },
    'Sampling config validated'
  );

  return config;
}

/**
 * Reads and validates a sampling configuration file.
 */
export function loadSamplingConfig(path: string): SamplingConfig {
  if (!existsSync(path)) {
    throw new NotFoundError(path);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    // e.g. EISDIR or EACCES
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Error reading config file: ${reason}`, { path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Error parsing JSON file: ${reason}`, { path });
  }

  return parseSamplingConfig(raw);
}
