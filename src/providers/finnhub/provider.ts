import { hasUsableMetrics } from '@/scoring/metric_normalizer';
import type { RawMetrics } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import type { CompanyProfile, FinancialDataSource } from '../types';
import { FinnhubClient } from './client';
import type { FinnhubMetric, FinnhubProfile } from './types';

const logger = createChildLogger('finnhub_provider');

type MetricBlock = FinnhubMetric['metric'];

function firstFinite(...values: Array<number | null | undefined>): number | null {
  for (const value of values) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

function scaled(value: number | null, factor: number): number | null {
  return value === null ? null : value * factor;
}

/**
 * Maps Finnhub's metric block onto the raw keys the normalizer reads.
 *
 * Calibration is Finnhub-specific: its ROE, margin, growth and yield figures
 * are percentages and become fractions here; its debt/equity is a plain ratio
 * and becomes percent-style source units (1.2 -> 120). Market capitalization
 * comes in millions.
 */
export function mapFinnhubMetrics(m: MetricBlock): RawMetrics {
  const entries: Array<[string, number | null]> = [
    ['trailingPE', firstFinite(m.peTTM, m.peExclExtraTTM, m.peBasicExclExtraTTM)],
    ['priceToBook', firstFinite(m.pbQuarterly, m.pbAnnual)],
    ['returnOnEquity', scaled(firstFinite(m.roeTTM, m.roeRfy), 0.01)],
    [
      'debtToEquity',
      scaled(
        firstFinite(
          m['totalDebt/totalEquityQuarterly'],
          m['totalDebt/totalEquityAnnual'],
          m['longTermDebt/equityQuarterly'],
          m['longTermDebt/equityAnnual'],
          m.totalDebtEquityQuarterly,
          m.totalDebtEquityAnnual,
          m.longTermDebtEquityQuarterly,
          m.longTermDebtEquityAnnual
        ),
        100
      ),
    ],
    ['currentRatio', firstFinite(m.currentRatioQuarterly, m.currentRatioAnnual)],
    [
      'profitMargins',
      scaled(firstFinite(m.netProfitMarginTTM, m.netMarginTTM, m.netMarginAnnual), 0.01),
    ],
    [
      'dividendYield',
      scaled(firstFinite(m.dividendYieldIndicatedAnnual, m.currentDividendYieldTTM), 0.01),
    ],
    [
      'revenueGrowth',
      scaled(
        firstFinite(m.revenueGrowthTTMYoy, m.revenueGrowthQuarterlyYoy, m.revenueGrowth3Y),
        0.01
      ),
    ],
    ['trailingEps', firstFinite(m.epsTTM, m.epsExclExtraItemsTTM, m.epsBasicExclExtraItemsTTM)],
    ['beta', firstFinite(m.beta)],
    // informational, unscored
    ['returnOnAssets', scaled(firstFinite(m.roaTTM, m.roaRfy), 0.01)],
    [
      'operatingMargins',
      scaled(firstFinite(m.operatingMarginTTM, m.operatingMarginAnnual), 0.01),
    ],
    ['earningsGrowth', scaled(firstFinite(m.epsGrowthTTMYoy), 0.01)],
    ['marketCap', scaled(firstFinite(m.marketCapitalization), 1_000_000)],
  ];

  const raw: Record<string, number> = {};
  for (const [key, value] of entries) {
    if (value !== null) raw[key] = value;
  }
  return raw;
}

export function mapFinnhubProfile(
  symbol: string,
  profile: FinnhubProfile
): CompanyProfile | null {
  if (!profile.name) return null;
  return {
    name: profile.name,
    ticker: profile.ticker ?? symbol,
    country: profile.country,
    currency: profile.currency,
    exchange: profile.exchange,
    industry: profile.finnhubIndustry,
    website: profile.weburl,
    marketCapitalization: profile.marketCapitalization,
  };
}

export class FinnhubDataSource implements FinancialDataSource {
  constructor(private readonly client: FinnhubClient) {}

  async fetch(symbol: string): Promise<RawMetrics | null> {
    logger.info({ symbol }, 'Fetching fundamentals from Finnhub');
    const response = await this.client.fetchMetrics(symbol);
    const block = response.metric ?? {};

    const raw = mapFinnhubMetrics(block);
    if (!hasUsableMetrics(raw)) {
      logger.warn({ symbol, keys: Object.keys(block).length }, 'No usable metrics returned');
      return null;
    }
    return raw;
  }

  async getCompanyProfile(symbol: string): Promise<CompanyProfile | null> {
    const profile = await this.client.fetchProfile(symbol);
    return mapFinnhubProfile(symbol, profile);
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }
}
