import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FinnhubClient } from '@/providers/finnhub/client';
import {
  FinnhubDataSource,
  mapFinnhubMetrics,
  mapFinnhubProfile,
} from '@/providers/finnhub/provider';
import { RateLimiter } from '@/providers/finnhub/rate_limiter';
import { ProviderError } from '@/providers/types';
import { normalizeMetrics } from '@/scoring/metric_normalizer';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeClient(maxRetries = 2): FinnhubClient {
  return new FinnhubClient('test-secret', {
    maxRetries,
    initialBackoffMs: 0,
    rateLimiter: new RateLimiter(),
  });
}

describe('mapFinnhubMetrics', () => {
  it('calibrates Finnhub units to raw-key units', () => {
    const raw = mapFinnhubMetrics({
      peTTM: 24,
      pbQuarterly: 3.2,
      roeTTM: 18,
      'totalDebt/totalEquityQuarterly': 0.45,
      currentRatioQuarterly: 1.6,
      netProfitMarginTTM: 12.5,
      dividendYieldIndicatedAnnual: 1.5,
      revenueGrowthTTMYoy: 9,
      epsTTM: 42.1,
      beta: 0.95,
    });

    expect(raw.trailingPE).toBe(24);
    expect(raw.priceToBook).toBe(3.2);
    expect(raw.returnOnEquity).toBeCloseTo(0.18, 10);
    expect(raw.debtToEquity).toBeCloseTo(45, 10);
    expect(raw.currentRatio).toBe(1.6);
    expect(raw.profitMargins).toBeCloseTo(0.125, 10);
    expect(raw.dividendYield).toBeCloseTo(0.015, 10);
    expect(raw.revenueGrowth).toBeCloseTo(0.09, 10);
    expect(raw.trailingEps).toBe(42.1);
    expect(raw.beta).toBe(0.95);
  });

  it('omits metrics Finnhub did not report', () => {
    expect(mapFinnhubMetrics({ peTTM: 20, beta: null })).toEqual({ trailingPE: 20 });
  });

  it('reads the slash-named leverage fields before the flat ones', () => {
    expect(
      mapFinnhubMetrics({
        'totalDebt/totalEquityAnnual': 0.5,
        'longTermDebt/equityQuarterly': 0.2,
        totalDebtEquityQuarterly: 2.5,
      })
    ).toEqual({ debtToEquity: 50 });
    expect(mapFinnhubMetrics({ 'longTermDebt/equityAnnual': 1.25 })).toEqual({
      debtToEquity: 125,
    });
  });

  it('maps informational figures alongside the scored ones', () => {
    const raw = mapFinnhubMetrics({
      roaTTM: 7.5,
      operatingMarginAnnual: 21,
      epsGrowthTTMYoy: -4,
      marketCapitalization: 2500,
    });

    expect(raw.returnOnAssets).toBeCloseTo(0.075, 10);
    expect(raw.operatingMargins).toBeCloseTo(0.21, 10);
    expect(raw.earningsGrowth).toBeCloseTo(-0.04, 10);
    expect(raw.marketCap).toBe(2_500_000_000);
  });

  it('falls back to secondary fields', () => {
    expect(
      mapFinnhubMetrics({ peExclExtraTTM: 19, pbAnnual: 2.2, longTermDebtEquityAnnual: 1.5 })
    ).toEqual({ trailingPE: 19, priceToBook: 2.2, debtToEquity: 150 });
  });

  it('round-trips through the normalizer into record units', () => {
    const record = normalizeMetrics(
      mapFinnhubMetrics({ dividendYieldIndicatedAnnual: 1.5, totalDebtEquityAnnual: 0.45 })
    );
    expect(record.dividendYield).toBeCloseTo(1.5, 10);
    expect(record.debtToEquity).toBeCloseTo(45, 10);
    expect(record.beta).toBe(1);
  });
});

describe('mapFinnhubProfile', () => {
  it('returns null for an unknown symbol', () => {
    expect(mapFinnhubProfile('NOPE.NS', {})).toBeNull();
  });

  it('maps the profile fields', () => {
    expect(
      mapFinnhubProfile('TCS.NS', {
        name: 'Tata Consultancy Services Ltd',
        country: 'IN',
        currency: 'INR',
        exchange: 'NATIONAL STOCK EXCHANGE OF INDIA',
        finnhubIndustry: 'Technology',
        weburl: 'https://example.com/',
        marketCapitalization: 1000,
      })
    ).toEqual({
      name: 'Tata Consultancy Services Ltd',
      ticker: 'TCS.NS',
      country: 'IN',
      currency: 'INR',
      exchange: 'NATIONAL STOCK EXCHANGE OF INDIA',
      industry: 'Technology',
      website: 'https://example.com/',
      marketCapitalization: 1000,
    });
  });
});

describe('FinnhubClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends symbol, metric and token parameters', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ metric: { beta: 1 } }));

    await makeClient().fetchMetrics('TCS.NS');

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.pathname).toBe('/api/v1/stock/metric');
    expect(requested.searchParams.get('symbol')).toBe('TCS.NS');
    expect(requested.searchParams.get('metric')).toBe('all');
    expect(requested.searchParams.get('token')).toBe('test-secret');
  });

  it('retries server errors and returns the eventual response', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 500, 'Internal Server Error'))
      .mockResolvedValueOnce(jsonResponse({ metric: { peTTM: 21 } }));

    const client = makeClient();
    const result = await client.fetchMetrics('INFY.NS');

    expect(result.metric.peTTM).toBe(21);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(client.getRequestCount()).toBe(2);
  });

  it('retries rate-limit responses', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 429, 'Too Many Requests'))
      .mockResolvedValueOnce(jsonResponse({ name: 'Infosys Ltd' }));

    const profile = await makeClient().fetchProfile('INFY.NS');

    expect(profile.name).toBe('Infosys Ltd');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValue(jsonResponse({}, 401, 'Unauthorized'));

    const error = await makeClient().fetchMetrics('TCS.NS').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'Finnhub API error: 401 Unauthorized',
      provider: 'finnhub',
      symbol: 'TCS.NS',
      method: '/stock/metric',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of retries', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error = await makeClient(2).fetchMetrics('TCS.NS').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ message: 'fetch failed' });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe('FinnhubDataSource', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns null when Finnhub has no metrics for the symbol', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ metric: {}, metricType: 'all' }));

    const source = new FinnhubDataSource(makeClient());

    await expect(source.fetch('NOPE.NS')).resolves.toBeNull();
  });

  it('returns null when none of the reported metrics are scored ones', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ metric: { '52WeekHigh': 1810, roaTTM: 4.2, marketCapitalization: 900 } })
    );

    const source = new FinnhubDataSource(makeClient());

    await expect(source.fetch('THIN.NS')).resolves.toBeNull();
  });

  it('returns calibrated raw metrics', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ metric: { peTTM: 30, roeTTM: 25 } }));

    const source = new FinnhubDataSource(makeClient());
    const raw = await source.fetch('HDFCBANK.NS');

    expect(raw?.trailingPE).toBe(30);
    expect(raw?.returnOnEquity).toBeCloseTo(0.25, 10);
    expect(source.getRequestCount()).toBe(1);
  });

  it('maps the company profile', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ name: 'HDFC Bank Ltd', ticker: 'HDFCBANK.NS' }));

    const source = new FinnhubDataSource(makeClient());

    await expect(source.getCompanyProfile('HDFCBANK.NS')).resolves.toMatchObject({
      name: 'HDFC Bank Ltd',
      ticker: 'HDFCBANK.NS',
    });
  });
});
