/**
 * Sliding-window rate limiter for the aggregates API:
 * at most N requests per minute and M in flight.
 */

import { systemClock, type Clock } from '@/core/time';
import { sleep } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

const WINDOW_MS = 60_000;

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.config = {
      maxRequestsPerMinute: Math.max(1, config.maxRequestsPerMinute ?? 300),
      maxConcurrent: Math.max(1, config.maxConcurrent ?? 8),
    };
  }

  private cleanOldRequests(): void {
    const windowStart = this.clock() - WINDOW_MS;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  async acquire(): Promise<void> {
    // slot and window budget are both claimed before any await so concurrent callers see them
    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }
    this.activeRequests++;

    for (;;) {
      this.cleanOldRequests();
      if (this.requestTimes.length < this.config.maxRequestsPerMinute) {
        this.requestTimes.push(this.clock());
        return;
      }
      const waitTime = Math.max(1, this.requestTimes[0] + WINDOW_MS - this.clock());
      logger.debug({ waitTime }, 'Rate limit reached, waiting');
      await sleep(waitTime);
    }
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): { requestsInLastMinute: number; activeRequests: number; queued: number } {
    this.cleanOldRequests();
    return {
      requestsInLastMinute: this.requestTimes.length,
      activeRequests: this.activeRequests,
      queued: this.waitQueue.length,
    };
  }
}
