import { getEnvConfig, type EnvConfig } from '@/core/env';
import type { DataSourceType, FinancialDataSource } from './types';
import { createFinnhubClient } from './finnhub/client';
import { FinnhubDataSource } from './finnhub/provider';
import { FixtureDataSource } from './fixture_provider';

/**
 * Create the financial data source selected by configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'finnhub' | 'fixture'
 *
 * Default: 'finnhub'
 */
export function createDataSource(
  type?: DataSourceType,
  config: EnvConfig = getEnvConfig()
): FinancialDataSource {
  const selected = type ?? config.dataSource;

  switch (selected) {
    case 'finnhub': {
      if (!config.finnhubApiKey) {
        throw new Error('FINNHUB_API_KEY environment variable is required');
      }
      const client = createFinnhubClient(config.finnhubApiKey, {
        maxRetries: config.fetchMaxRetries,
        initialBackoffMs: config.fetchBackoffMs,
      });
      return new FinnhubDataSource(client);
    }
    case 'fixture':
      return FixtureDataSource.fromFile(config.fixturePath);
  }
}
