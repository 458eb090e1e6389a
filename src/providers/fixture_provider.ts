/**
 * Offline data source backed by a JSON file:
 *
 *   { "TCS.NS": { "metrics": { "trailingPE": 28.4, ... }, "profile": { "name": "..." } } }
 *
 * Metrics use the same raw keys and units as any other FinancialDataSource.
 */

import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { RawMetrics } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import { ProviderError, type CompanyProfile, type FinancialDataSource } from './types';

const logger = createChildLogger('fixture_provider');

interface FixtureEntry {
  metrics: RawMetrics;
  profile: CompanyProfile | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseProfile(symbol: string, raw: unknown): CompanyProfile | null {
  if (!isRecord(raw)) return null;
  const name = optionalString(raw.name);
  if (!name) return null;
  return {
    name,
    ticker: optionalString(raw.ticker) ?? symbol,
    country: optionalString(raw.country),
    currency: optionalString(raw.currency),
    exchange: optionalString(raw.exchange),
    sector: optionalString(raw.sector),
    industry: optionalString(raw.industry),
    website: optionalString(raw.website),
    city: optionalString(raw.city),
    summary: optionalString(raw.summary),
    employees: optionalNumber(raw.employees),
    marketCapitalization: optionalNumber(raw.marketCapitalization),
  };
}

export function parseFixtures(raw: unknown): Map<string, FixtureEntry> {
  const entries = new Map<string, FixtureEntry>();
  if (!isRecord(raw)) return entries;

  for (const [key, value] of Object.entries(raw)) {
    const symbol = key.trim().toUpperCase();
    if (!symbol || !isRecord(value) || !isRecord(value.metrics)) {
      logger.warn({ symbol: key }, 'Skipping malformed fixture entry');
      continue;
    }
    entries.set(symbol, {
      metrics: value.metrics,
      profile: parseProfile(symbol, value.profile),
    });
  }
  return entries;
}

export class FixtureDataSource implements FinancialDataSource {
  private readonly entries: Map<string, FixtureEntry>;
  private requestCount = 0;

  constructor(entries: Map<string, FixtureEntry>) {
    this.entries = entries;
  }

  static fromFile(path: string, projectRoot: string = process.cwd()): FixtureDataSource {
    const fullPath = isAbsolute(path) ? path : join(projectRoot, path);
    try {
      return new FixtureDataSource(parseFixtures(JSON.parse(readFileSync(fullPath, 'utf-8'))));
    } catch (error) {
      throw new ProviderError(
        `Cannot load fixture file ${fullPath}`,
        'fixture',
        '*',
        'fromFile',
        error instanceof Error ? error : undefined
      );
    }
  }

  async fetch(symbol: string): Promise<RawMetrics | null> {
    this.requestCount++;
    return this.entries.get(symbol.toUpperCase())?.metrics ?? null;
  }

  async getCompanyProfile(symbol: string): Promise<CompanyProfile | null> {
    this.requestCount++;
    return this.entries.get(symbol.toUpperCase())?.profile ?? null;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  symbols(): string[] {
    return [...this.entries.keys()];
  }
}
