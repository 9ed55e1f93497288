import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadSamplingConfig,
  parsePeriodDuration,
  parseSamplingConfig,
  toPeriodToken,
} from '@/core/sampling_config';
import { NotFoundError, ParseError, SchemaError, ValidationError } from '@/risk/errors';

let tempDir: string;

function validDocument() {
  return {
    tickers: ['XLC', 'XLY', 'XLP'],
    dataParameters: {
      sample_time_step: '1mo',
      total_sample_period: '5y',
      sample_period_end: '2024-01-01',
    },
  };
}

function writeConfig(content: string): string {
  const path = join(tempDir, 'sampling.json');
  writeFileSync(path, content);
  return path;
}

describe('loadSamplingConfig', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sampling-config-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a valid file and derives the start date', () => {
    const config = loadSamplingConfig(writeConfig(JSON.stringify(validDocument())));

    expect(config.tickers).toEqual(['XLC', 'XLY', 'XLP']);
    expect(config.sampleTimeStep).toBe('1mo');
    expect(config.totalSamplePeriod).toEqual({ unit: 'years', amount: 5 });
    expect(config.samplePeriodEnd).toBe('2024-01-01');
    expect(config.samplePeriodStart).toBe('2019-01-01');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tickers)).toBe(true);
  });

  it('fails with NotFoundError when the file is missing', () => {
    expect(() => loadSamplingConfig(join(tempDir, 'missing.json'))).toThrow(NotFoundError);
  });

  it('fails with ParseError on malformed JSON', () => {
    const path = writeConfig('{"tickers": [');
    expect(() => loadSamplingConfig(path)).toThrow(ParseError);
  });

  it('fails with ParseError when the path is a directory', () => {
    expect(() => loadSamplingConfig(tempDir)).toThrow(ParseError);
    expect(() => loadSamplingConfig(tempDir)).toThrow(/^Error reading config file: /);
  });
});

describe('parseSamplingConfig', () => {
  it('fails with SchemaError when dataParameters is missing', () => {
    expect(() => parseSamplingConfig({ tickers: ['XLC'] })).toThrow(SchemaError);
  });

  it('fails with SchemaError when tickers is missing or not a list', () => {
    const { dataParameters } = validDocument();
    expect(() => parseSamplingConfig({ dataParameters })).toThrow(SchemaError);
    expect(() => parseSamplingConfig({ tickers: 'XLC', dataParameters })).toThrow(SchemaError);
  });

  it('fails with SchemaError when a required data parameter is missing', () => {
    const document = validDocument();
    const { sample_time_step: _omitted, ...rest } = document.dataParameters;
    try {
      parseSamplingConfig({ tickers: document.tickers, dataParameters: rest });
      expect.unreachable('expected a SchemaError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.code).toBe('SCHEMA_ERROR');
        expect(error.issues).toEqual([
          "/dataParameters: must have required property 'sample_time_step'",
        ]);
      }
    }
  });

  it('fails with ValidationError on an impossible end date', () => {
    const document = validDocument();
    document.dataParameters.sample_period_end = '2024-13-40';
    expect(() => parseSamplingConfig(document)).toThrow(ValidationError);
  });

  it('fails with ValidationError on an unsupported interval', () => {
    const document = validDocument();
    document.dataParameters.sample_time_step = '2wk';
    expect(() => parseSamplingConfig(document)).toThrow(ValidationError);
  });

  it('checks every extra parameter against the period tokens', () => {
    const document = validDocument();
    expect(() =>
      parseSamplingConfig({
        ...document,
        dataParameters: { ...document.dataParameters, rebalance_step: 'weekly' },
      })
    ).toThrow(/rebalance_step/);
    expect(
      parseSamplingConfig({
        ...document,
        dataParameters: { ...document.dataParameters, rebalance_step: '3mo' },
      }).tickers
    ).toEqual(['XLC', 'XLY', 'XLP']);
  });

  it('requires the total sample period in whole years', () => {
    const document = validDocument();
    document.dataParameters.total_sample_period = '6mo';
    expect(() => parseSamplingConfig(document)).toThrow(ValidationError);
  });

  it('rejects empty, blank and duplicate tickers', () => {
    const { dataParameters } = validDocument();
    expect(() => parseSamplingConfig({ tickers: [], dataParameters })).toThrow(ValidationError);
    expect(() => parseSamplingConfig({ tickers: ['XLC', ' '], dataParameters })).toThrow(ValidationError);
    expect(() => parseSamplingConfig({ tickers: ['XLC', 'XLC'], dataParameters })).toThrow(
      'Duplicate ticker: XLC.'
    );
  });

  it('clamps a leap-day end date when shifting back by years', () => {
    const document = validDocument();
    document.dataParameters.sample_period_end = '2024-02-29';
    document.dataParameters.total_sample_period = '1y';
    expect(parseSamplingConfig(document).samplePeriodStart).toBe('2023-02-28');
  });
});

describe('period tokens', () => {
  it('parses tokens into unit-tagged durations', () => {
    expect(parsePeriodDuration('10y')).toEqual({ unit: 'years', amount: 10 });
    expect(parsePeriodDuration('3mo')).toEqual({ unit: 'months', amount: 3 });
    expect(parsePeriodDuration('5d')).toEqual({ unit: 'days', amount: 5 });
  });

  it('recognises only the accepted tokens', () => {
    expect(toPeriodToken('6mo')).toBe('6mo');
    expect(toPeriodToken('2wk')).toBeNull();
    expect(toPeriodToken(5)).toBeNull();
  });
});
