/**
 * Finnhub API response types
 *
 * Percent-valued fields (roe, margins, growth, yield) are reported as
 * percentages, e.g. 18.5 for 18.5%. Debt/equity fields are plain ratios and
 * carry a slash in their names. Market capitalization is in millions.
 */

export interface FinnhubMetric {
  metric: {
    beta?: number | null;
    currentRatioAnnual?: number | null;
    currentRatioQuarterly?: number | null;
    dividendYieldIndicatedAnnual?: number | null;
    currentDividendYieldTTM?: number | null;
    epsBasicExclExtraItemsTTM?: number | null;
    epsExclExtraItemsTTM?: number | null;
    epsTTM?: number | null;
    netProfitMarginTTM?: number | null;
    netMarginTTM?: number | null;
    netMarginAnnual?: number | null;
    pbAnnual?: number | null;
    pbQuarterly?: number | null;
    peBasicExclExtraTTM?: number | null;
    peExclExtraTTM?: number | null;
    peTTM?: number | null;
    revenueGrowthTTMYoy?: number | null;
    revenueGrowthQuarterlyYoy?: number | null;
    revenueGrowth3Y?: number | null;
    roeTTM?: number | null;
    roeRfy?: number | null;
    'totalDebt/totalEquityAnnual'?: number | null;
    'totalDebt/totalEquityQuarterly'?: number | null;
    'longTermDebt/equityAnnual'?: number | null;
    'longTermDebt/equityQuarterly'?: number | null;
    totalDebtEquityAnnual?: number | null;
    totalDebtEquityQuarterly?: number | null;
    longTermDebtEquityAnnual?: number | null;
    longTermDebtEquityQuarterly?: number | null;
    roaTTM?: number | null;
    roaRfy?: number | null;
    operatingMarginTTM?: number | null;
    operatingMarginAnnual?: number | null;
    epsGrowthTTMYoy?: number | null;
    marketCapitalization?: number | null;
  };
  metricType?: string;
  series?: Record<string, unknown>;
  symbol?: string;
}

export interface FinnhubProfile {
  country?: string;
  currency?: string;
  exchange?: string;
  finnhubIndustry?: string;
  ipo?: string;
  logo?: string;
  marketCapitalization?: number;
  name?: string;
  phone?: string;
  shareOutstanding?: number;
  ticker?: string;
  weburl?: string;
}
