/**
 * Sliding-window rate limiter for the Finnhub API.
 * Free tier allows 60 requests per minute.
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = {
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? 60,
      windowMs: config.windowMs ?? 60_000,
      maxConcurrent: config.maxConcurrent ?? 5,
    };
  }

  private pruneWindow(): void {
    const windowStart = Date.now() - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  /**
   * Waits until both the window and the concurrency cap have room, then takes
   * the slot without yielding in between.
   */
  async acquire(): Promise<void> {
    for (;;) {
      this.pruneWindow();

      if (this.requestTimes.length >= this.config.maxRequestsPerWindow) {
        const waitTime = this.requestTimes[0] + this.config.windowMs - Date.now();
        logger.debug({ waitTime }, 'Rate limit reached, waiting');
        await sleep(Math.max(waitTime, 1));
        continue;
      }

      if (this.activeRequests >= this.config.maxConcurrent) {
        await new Promise<void>((resolve) => {
          this.waitQueue.push(resolve);
        });
        continue;
      }

      break;
    }

    this.activeRequests++;
    this.requestTimes.push(Date.now());
  }

  release(): void {
    if (this.activeRequests > 0) {
      this.activeRequests--;
    }
    this.waitQueue.shift()?.();
  }

  /** Runs `task` inside an acquired slot and always gives the slot back. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): { requestsInWindow: number; activeRequests: number } {
    this.pruneWindow();
    return {
      requestsInWindow: this.requestTimes.length,
      activeRequests: this.activeRequests,
    };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

let globalRateLimiter: RateLimiter | null = null;

export function getRateLimiter(): RateLimiter {
  if (!globalRateLimiter) {
    globalRateLimiter = new RateLimiter();
  }
  return globalRateLimiter;
}

export function resetRateLimiter(): void {
  globalRateLimiter = null;
}
