/**
 * Retry with exponential backoff, per-call timeout and a shared rate budget
 */

import { RateBudgetOptions, RetryOptions } from './config';
import { RateLimitedError, TransientNetworkError, TransientTrackerError, errorMessage, isRetryable } from './errors';
import { Logger, silentLogger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30000,
  timeoutMs: 30000,
};

/**
 * Token bucket shared by every worker of a process. A rate-limit response
 * pauses the whole bucket, not just the worker that hit it.
 */
export class RateBudget {
  private tokens: number;
  private lastRefill: number;
  private pausedUntil = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private options: RateBudgetOptions,
    private clock: () => number = Date.now,
    private sleep: Sleep = defaultSleep
  ) {
    this.tokens = options.burst;
    this.lastRefill = clock();
  }

  /**
   * Wait for one request slot. Callers are served in arrival order.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  /**
   * Hold every caller back until the tracker's retry-after window has passed
   */
  penalize(retryAfterMs: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, this.clock() + retryAfterMs);
  }

  get available(): number {
    this.refill(this.clock());
    return this.tokens;
  }

  private async take(): Promise<void> {
    for (;;) {
      const now = this.clock();
      if (now < this.pausedUntil) {
        await this.sleep(this.pausedUntil - now);
        continue;
      }

      this.refill(now);
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      await this.sleep(Math.ceil(((1 - this.tokens) / this.options.requestsPerSecond) * 1000));
    }
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.options.burst, this.tokens + (elapsed / 1000) * this.options.requestsPerSecond);
    this.lastRefill = now;
  }
}

export interface RetryExecutorOptions {
  retry?: Partial<RetryOptions>;
  budget?: RateBudget | null;
  sleep?: Sleep;
  logger?: Logger;
}

export class RetryExecutor {
  readonly options: RetryOptions;
  private budget: RateBudget | null;
  private sleep: Sleep;
  private logger: Logger;

  constructor(options: RetryExecutorOptions = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options.retry };
    this.budget = options.budget ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Delay before retry number `attempt` (1-based)
   */
  backoff(attempt: number): number {
    return Math.min(this.options.maxDelayMs, this.options.baseDelayMs * 2 ** (attempt - 1));
  }

  /**
   * Run a tracker call. Rate-limit and transient network failures are retried;
   * once attempts run out they surface as TransientTrackerError. Any other
   * error is rethrown unchanged on first occurrence.
   */
  async run<T>(label: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (this.budget) {
        await this.budget.acquire();
      }

      try {
        return await this.withTimeout(label, call);
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }
        if (attempt >= this.options.maxAttempts) {
          throw new TransientTrackerError(
            `${label} failed after ${attempt} attempts: ${errorMessage(error)}`,
            attempt,
            error
          );
        }

        let delay = this.backoff(attempt);
        if (error instanceof RateLimitedError) {
          if (this.budget) {
            // Every worker waits out the window; without a hint the backoff is the window
            this.budget.penalize(error.retryAfterMs ?? delay);
          } else if (error.retryAfterMs !== null) {
            delay = Math.max(delay, error.retryAfterMs);
          }
        }

        this.logger.debug(`Retrying ${label}`, { attempt, delayMs: delay, error: errorMessage(error) });
        await this.sleep(delay);
      }
    }
  }

  private async withTimeout<T>(label: string, call: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransientNetworkError(`${label} timed out after ${this.options.timeoutMs}ms`)),
        this.options.timeoutMs
      );
    });

    try {
      return await Promise.race([call(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
