/**
 * Shared types and interfaces for financial data sources.
 *
 * A data source hands the scorer raw fundamentals keyed by provider-neutral
 * metric names, already calibrated to the units the normalizer expects
 * (fractions for ROE/margins/growth/yield, percent-style debt/equity).
 */
import type { RawMetrics } from '@/scoring/types';
import type { DataSourceType } from '@/core/env';

export interface FinancialDataSource {
  /**
   * Fundamentals for one symbol, or null when the provider has nothing for it.
   * Transport failures surface as a rejected promise.
   */
  fetch(symbol: string): Promise<RawMetrics | null>;
  getCompanyProfile?(symbol: string): Promise<CompanyProfile | null>;
  getRequestCount(): number;
}

export type { DataSourceType };

export interface CompanyProfile {
  name: string;
  ticker: string;
  country?: string;
  currency?: string;
  exchange?: string;
  sector?: string;
  industry?: string;
  website?: string;
  city?: string;
  summary?: string;
  employees?: number;
  /** Millions of `currency` */
  marketCapitalization?: number;
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

/**
 * No usable data for a symbol. Distinct from a low score: the engine is never
 * run on data known to be absent.
 */
export class DataUnavailableError extends Error {
  constructor(
    public symbol: string,
    public reason: string,
    public cause?: Error
  ) {
    super(`Financial data unavailable for ${symbol}: ${reason}`);
    this.name = 'DataUnavailableError';
  }
}
