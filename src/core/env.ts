/**
 * Environment variable handling with validation
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export const NODE_ENVS = ['development', 'production', 'test'] as const;
export const PRICE_SOURCE_TYPES = ['yahoo', 'csv'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type NodeEnv = (typeof NODE_ENVS)[number];
export type PriceSourceType = (typeof PRICE_SOURCE_TYPES)[number];

export interface LoggingEnv {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

export interface EnvConfig extends LoggingEnv {
  priceSource: PriceSourceType;
  priceDataDir: string;
  /** Exchange offset from UTC applied to Yahoo bar timestamps. */
  priceUtcOffsetMinutes: number;
}

const DEFAULT_PRICE_DATA_DIR = 'data/prices';

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value : undefined;
}

function pickOption<T extends string>(
  options: readonly T[],
  raw: string | undefined,
  fallback: T
): T {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return options.find((option) => option === normalized) ?? fallback;
}

/**
 * Logger settings only. Unknown values fall back to the defaults so that
 * importing the logger never throws.
 */
export function loadLoggingEnv(): LoggingEnv {
  return {
    logLevel: pickOption(LOG_LEVELS, getEnvVar('LOG_LEVEL'), 'info'),
    nodeEnv: pickOption(NODE_ENVS, getEnvVar('NODE_ENV'), 'development'),
  };
}

function parseOffsetMinutes(raw: string | undefined): number {
  if (!raw) return 0;
  const minutes = Number(raw.trim());
  if (!Number.isInteger(minutes) || Math.abs(minutes) > 14 * 60) {
    throw new Error(`Invalid PRICE_UTC_OFFSET_MINUTES: ${raw} (expected whole minutes between -840 and 840)`);
  }
  return minutes;
}

export function loadEnvConfig(): EnvConfig {
  const priceSourceRaw = getEnvVar('PRICE_SOURCE');
  const priceSource = pickOption(PRICE_SOURCE_TYPES, priceSourceRaw, 'yahoo');
  if (priceSourceRaw && priceSource !== priceSourceRaw.trim().toLowerCase()) {
    throw new Error(
      `Unknown PRICE_SOURCE: ${priceSourceRaw} (expected one of ${PRICE_SOURCE_TYPES.join(', ')})`
    );
  }

  return {
    ...loadLoggingEnv(),
    priceSource,
    priceDataDir: getEnvVar('PRICE_DATA_DIR') || DEFAULT_PRICE_DATA_DIR,
    priceUtcOffsetMinutes: parseOffsetMinutes(getEnvVar('PRICE_UTC_OFFSET_MINUTES')),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
