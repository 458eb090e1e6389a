/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type DataSourceType = 'finnhub' | 'fixture';

export interface EnvConfig {
  dataSource: DataSourceType;
  finnhubApiKey: string | null;
  fixturePath: string;
  defaultExchangeSuffix: string;
  fetchMaxRetries: number;
  fetchBackoffMs: number;
  throttleMs: number;
  maxConcurrency: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

export const DEFAULT_FIXTURE_PATH = 'config/fixtures/sample_metrics.json';

export class ConfigError extends Error {
  constructor(
    message: string,
    public variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DATA_SOURCES: readonly DataSourceType[] = ['finnhub', 'fixture'];
const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  return process.env[name];
}

function getNonNegativeInt(name: string, fallback: number): number {
  const raw = getEnvVar(name);
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return parsed;
}

function pickOne<T extends string>(
  values: readonly T[],
  raw: string,
  fallback: T
): T {
  return values.find((value) => value === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const dataSourceRaw = (getEnvVar('MARKET_DATA_PROVIDER') || 'finnhub').trim().toLowerCase();
  const dataSource = DATA_SOURCES.find((value) => value === dataSourceRaw);
  if (!dataSource) {
    throw new ConfigError(
      `Unknown MARKET_DATA_PROVIDER "${dataSourceRaw}" (expected ${DATA_SOURCES.join(' or ')})`,
      'MARKET_DATA_PROVIDER'
    );
  }

  const maxConcurrency = getNonNegativeInt('MAX_CONCURRENCY', 4);
  if (maxConcurrency === 0) {
    throw new ConfigError('MAX_CONCURRENCY must be at least 1', 'MAX_CONCURRENCY');
  }

  const suffixRaw = getEnvVar('DEFAULT_EXCHANGE_SUFFIX');

  return {
    dataSource,
    // Required only once a Finnhub source is built (createDataSource).
    finnhubApiKey: getEnvVar('FINNHUB_API_KEY')?.trim() || null,
    fixturePath: getEnvVar('FIXTURE_PATH') || DEFAULT_FIXTURE_PATH,
    defaultExchangeSuffix: suffixRaw === undefined ? '.NS' : suffixRaw.trim().toUpperCase(),
    fetchMaxRetries: getNonNegativeInt('FETCH_MAX_RETRIES', 3),
    fetchBackoffMs: getNonNegativeInt('FETCH_BACKOFF_MS', 1000),
    throttleMs: getNonNegativeInt('THROTTLE_MS', 0),
    maxConcurrency,
    logLevel: pickOne(LOG_LEVELS, getEnvVar('LOG_LEVEL') || 'info', 'info'),
    nodeEnv: pickOne(NODE_ENVS, process.env.NODE_ENV || 'development', 'development'),
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
