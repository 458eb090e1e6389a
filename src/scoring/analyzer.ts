/**
 * Stock analysis pipeline
 * fetch raw fundamentals -> normalize -> score -> report
 */

import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import {
  DataUnavailableError,
  type CompanyProfile,
  type FinancialDataSource,
} from '@/providers/types';
import { buildScoreBoard } from './engine';
import {
  extractSupplementaryMetrics,
  hasUsableMetrics,
  listMissingMetrics,
  normalizeMetrics,
} from './metric_normalizer';
import type { MetricRecord, RawMetrics, ScoreBoard, SupplementaryMetrics } from './types';

const logger = createChildLogger('analyzer');

export interface AnalysisReport {
  symbol: string;
  analyzedAt: string;
  company: CompanyProfile | null;
  metrics: MetricRecord;
  supplementary: SupplementaryMetrics;
  /** Raw keys the source did not supply; their fields hold defaults */
  missingMetrics: string[];
  scoreBoard: ScoreBoard;
}

export interface AnalyzeOptions {
  now?: () => Date;
  includeProfile?: boolean;
}

export interface BatchOptions extends AnalyzeOptions {
  throttler?: RequestThrottler;
  maxConcurrency?: number;
}

export interface BatchResult {
  reports: AnalysisReport[];
  errors: string[];
}

async function fetchRawMetrics(
  symbol: string,
  source: FinancialDataSource
): Promise<RawMetrics> {
  let raw: RawMetrics | null;
  try {
    raw = await source.fetch(symbol);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new DataUnavailableError(symbol, cause.message, cause);
  }
  if (!raw) {
    throw new DataUnavailableError(symbol, 'no data returned by provider');
  }
  if (!hasUsableMetrics(raw)) {
    throw new DataUnavailableError(symbol, 'no usable metrics');
  }
  return raw;
}

async function fetchProfile(
  symbol: string,
  source: FinancialDataSource
): Promise<CompanyProfile | null> {
  if (!source.getCompanyProfile) return null;
  try {
    return await source.getCompanyProfile(symbol);
  } catch (error) {
    // Profile is decorative; the score stands without it.
    logger.warn(
      { symbol, error: error instanceof Error ? error.message : String(error) },
      'Company profile unavailable'
    );
    return null;
  }
}

export async function analyzeSymbol(
  symbol: string,
  source: FinancialDataSource,
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  const { now = () => new Date(), includeProfile = true } = options;

  const raw = await fetchRawMetrics(symbol, source);
  const company = includeProfile ? await fetchProfile(symbol, source) : null;

  const metrics = normalizeMetrics(raw);
  const missingMetrics = listMissingMetrics(raw);
  const scoreBoard = buildScoreBoard(metrics);

  logger.info(
    {
      symbol,
      overallScore: scoreBoard.overallScore,
      recommendation: scoreBoard.recommendation.label,
      missingCount: missingMetrics.length,
    },
    'Symbol analyzed'
  );

  return {
    symbol,
    analyzedAt: now().toISOString(),
    company,
    metrics,
    supplementary: extractSupplementaryMetrics(raw),
    missingMetrics,
    scoreBoard,
  };
}

export async function analyzeSymbols(
  symbols: readonly string[],
  source: FinancialDataSource,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const { throttler = new RequestThrottler(0), maxConcurrency = 4, ...analyzeOptions } = options;
  const slots: Array<AnalysisReport | null> = symbols.map(() => null);
  const errors: string[] = [];

  logger.info({ symbolCount: symbols.length }, 'Starting batch analysis');

  await runWithConcurrency(
    symbols.map((symbol, index) => ({ symbol, index })),
    async ({ symbol, index }) => {
      try {
        slots[index] = await throttler.schedule(() =>
          analyzeSymbol(symbol, source, analyzeOptions)
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(`${symbol}: ${message}`);
        logger.error({ symbol, error: message }, 'Failed to analyze symbol');
      }
    },
    Math.max(1, Math.min(maxConcurrency, symbols.length))
  );

  const reports = slots.filter((report): report is AnalysisReport => report !== null);
  logger.info(
    { analyzed: reports.length, failed: errors.length, requests: source.getRequestCount() },
    'Batch analysis complete'
  );
  return { reports, errors };
}

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: concurrency }, async () => {
    while (index < items.length) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}
