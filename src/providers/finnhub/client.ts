/**
 * Finnhub API Client
 * Rate-limited with bounded retries and exponential backoff
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError } from '@/providers/types';
import { getRateLimiter, type RateLimiter } from './rate_limiter';
import type { FinnhubMetric, FinnhubProfile } from './types';

const logger = createChildLogger('finnhub');

const BASE_URL = 'https://finnhub.io/api/v1';

export interface FinnhubClientOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  baseUrl?: string;
  rateLimiter?: RateLimiter;
}

class HttpStatusError extends Error {
  constructor(
    public status: number,
    statusText: string
  ) {
    super(`Finnhub API error: ${status} ${statusText}`);
    this.name = 'HttpStatusError';
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class FinnhubClient {
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private requestCount = 0;

  constructor(apiKey: string, options: FinnhubClientOptions = {}) {
    this.apiKey = apiKey;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.rateLimiter = options.rateLimiter ?? getRateLimiter();
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry<T>(
    endpoint: string,
    symbol: string,
    params: Record<string, string | number> = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('token', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.rateLimiter.run(async () => {
          const response = await fetch(url.toString());
          this.requestCount++;
          if (!response.ok) {
            throw new HttpStatusError(response.status, response.statusText);
          }
          return (await response.json()) as T;
        });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (lastError instanceof HttpStatusError && !lastError.retryable) {
          break;
        }

        if (attempt < this.maxRetries) {
          const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
          logger.warn(
            { endpoint, symbol, attempt, backoffMs, error: lastError.message },
            'Finnhub request failed, retrying'
          );
          await sleep(backoffMs);
        }
      }
    }

    throw new ProviderError(
      lastError?.message ?? 'Finnhub request failed after retries',
      'finnhub',
      symbol,
      endpoint,
      lastError ?? undefined
    );
  }

  async fetchMetrics(symbol: string): Promise<FinnhubMetric> {
    return this.fetchWithRetry<FinnhubMetric>('/stock/metric', symbol, {
      symbol,
      metric: 'all',
    });
  }

  async fetchProfile(symbol: string): Promise<FinnhubProfile> {
    return this.fetchWithRetry<FinnhubProfile>('/stock/profile2', symbol, {
      symbol,
    });
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createFinnhubClient(
  apiKey: string,
  options: FinnhubClientOptions = {}
): FinnhubClient {
  return new FinnhubClient(apiKey, options);
}
