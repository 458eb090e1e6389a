/**
 * Turns whatever a data source returned into a fully populated MetricRecord.
 * Missing or malformed entries fall back to per-field defaults; nothing here throws.
 */

import type {
  MetricField,
  MetricRecord,
  RawMetrics,
  SupplementaryMetrics,
} from './types';

interface FieldMapping {
  rawKey: string;
  fallback: number;
  scale?: number;
}

export const METRIC_FIELDS: Readonly<Record<MetricField, FieldMapping>> = Object.freeze({
  peRatio: { rawKey: 'trailingPE', fallback: 0 },
  pbRatio: { rawKey: 'priceToBook', fallback: 0 },
  roe: { rawKey: 'returnOnEquity', fallback: 0 },
  debtToEquity: { rawKey: 'debtToEquity', fallback: 0 },
  currentRatio: { rawKey: 'currentRatio', fallback: 0 },
  profitMargin: { rawKey: 'profitMargins', fallback: 0 },
  // Source reports a fraction (0.02); the record keeps percentage points.
  dividendYield: { rawKey: 'dividendYield', fallback: 0, scale: 100 },
  revenueGrowth: { rawKey: 'revenueGrowth', fallback: 0 },
  eps: { rawKey: 'trailingEps', fallback: 0 },
  beta: { rawKey: 'beta', fallback: 1 },
});

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readField(raw: RawMetrics, field: FieldMapping): number {
  const value = toFiniteNumber(raw[field.rawKey]);
  if (value === null) return field.fallback;
  return field.scale !== undefined ? value * field.scale : value;
}

export function normalizeMetrics(raw: RawMetrics | null | undefined): MetricRecord {
  const source: RawMetrics = raw ?? {};
  return Object.freeze({
    peRatio: readField(source, METRIC_FIELDS.peRatio),
    pbRatio: readField(source, METRIC_FIELDS.pbRatio),
    roe: readField(source, METRIC_FIELDS.roe),
    debtToEquity: readField(source, METRIC_FIELDS.debtToEquity),
    currentRatio: readField(source, METRIC_FIELDS.currentRatio),
    profitMargin: readField(source, METRIC_FIELDS.profitMargin),
    dividendYield: readField(source, METRIC_FIELDS.dividendYield),
    revenueGrowth: readField(source, METRIC_FIELDS.revenueGrowth),
    eps: readField(source, METRIC_FIELDS.eps),
    beta: readField(source, METRIC_FIELDS.beta),
  });
}

/**
 * Raw keys that were absent or unusable, for diagnostics.
 */
export function listMissingMetrics(raw: RawMetrics | null | undefined): string[] {
  const source: RawMetrics = raw ?? {};
  return Object.values(METRIC_FIELDS)
    .filter((field) => toFiniteNumber(source[field.rawKey]) === null)
    .map((field) => field.rawKey);
}

export function hasUsableMetrics(raw: RawMetrics | null | undefined): boolean {
  return listMissingMetrics(raw).length < Object.keys(METRIC_FIELDS).length;
}

export const SUPPLEMENTARY_FIELDS: Readonly<Record<keyof SupplementaryMetrics, string>> =
  Object.freeze({
    forwardPE: 'forwardPE',
    returnOnAssets: 'returnOnAssets',
    operatingMargin: 'operatingMargins',
    pegRatio: 'pegRatio',
    earningsGrowth: 'earningsGrowth',
    marketCap: 'marketCap',
  });

export function extractSupplementaryMetrics(
  raw: RawMetrics | null | undefined
): SupplementaryMetrics {
  const source: RawMetrics = raw ?? {};
  return Object.freeze({
    forwardPE: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.forwardPE]),
    returnOnAssets: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.returnOnAssets]),
    operatingMargin: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.operatingMargin]),
    pegRatio: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.pegRatio]),
    earningsGrowth: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.earningsGrowth]),
    marketCap: toFiniteNumber(source[SUPPLEMENTARY_FIELDS.marketCap]),
  });
}
