import { errorMessage, isRetriable } from '../errors/syncErrors.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import { log } from '../utils/logger.js';

/**
 * Sliding-window rate governor for Google Drive API requests
 *
 * Admits at most `rateLimit` requests in any trailing `timeWindow` seconds by
 * waiting, never by dropping. Wraps calls with truncated exponential backoff
 * for retriable failures (403/429/500/503 equivalents).
 */

export interface RateGovernorOptions {
  rateLimit?: number;           // requests per window (default 1000)
  timeWindowSeconds?: number;   // window length (default 60)
  maxRetries?: number;          // retries after the first attempt (default 10)
  baseDelayMs?: number;         // first backoff step (default 1s)
  maxBackoffMs?: number;        // backoff ceiling before jitter (default 64s)
  jitterMs?: number;            // upper bound of uniform jitter (default 1s)
}

const DEFAULTS: Required<RateGovernorOptions> = {
  rateLimit: 1000,
  timeWindowSeconds: 60,
  maxRetries: 10,
  baseDelayMs: 1000,
  maxBackoffMs: 64_000,
  jitterMs: 1000
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RateGovernor {
  private requestTimes: number[] = [];
  private readonly admission = new AsyncMutex();
  private rateLimit: number;
  private windowMs: number;
  private maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxBackoffMs: number;
  private readonly jitterMs: number;

  constructor(options: RateGovernorOptions = {}) {
    const settings = { ...DEFAULTS, ...options };
    RateGovernor.assertLimits(settings.rateLimit, settings.timeWindowSeconds);
    this.rateLimit = settings.rateLimit;
    this.windowMs = settings.timeWindowSeconds * 1000;
    this.maxRetries = settings.maxRetries;
    this.baseDelayMs = settings.baseDelayMs;
    this.maxBackoffMs = settings.maxBackoffMs;
    this.jitterMs = settings.jitterMs;
  }

  /**
   * Override limits with operator-supplied values (e.g. 12000 requests / 60s)
   */
  configure(rateLimit: number, timeWindowSeconds: number, maxRetries?: number): void {
    RateGovernor.assertLimits(rateLimit, timeWindowSeconds);
    this.rateLimit = rateLimit;
    this.windowMs = timeWindowSeconds * 1000;
    if (maxRetries !== undefined) {
      this.maxRetries = maxRetries;
    }
    log.info(`[GOVERNOR] Configured: ${rateLimit} requests per ${timeWindowSeconds}s, ${this.maxRetries} retries`);
  }

  /**
   * Wait until one more request fits the window, then record it
   */
  async admit(): Promise<void> {
    await this.admission.runExclusive(async () => {
      let now = Date.now();
      this.prune(now);

      // timers may fire early against Date.now(), so re-check after every sleep
      while (this.requestTimes.length >= this.rateLimit) {
        const waitMs = Math.max(1, this.windowMs - (now - this.requestTimes[0]));
        log.debug(`[GOVERNOR] Rate limit reached. Waiting ${(waitMs / 1000).toFixed(2)}s`);
        await sleep(waitMs);
        now = Date.now();
        this.prune(now);
      }

      this.requestTimes.push(now);
    });
  }

  /**
   * Admit and run `operation`, retrying retriable failures with jittered backoff.
   * Attempts at most `maxRetries + 1` times.
   */
  async executeWithRetry<T>(operation: () => Promise<T>, label = 'remote call'): Promise<T> {
    let retryCount = 0;

    while (true) {
      await this.admit();
      try {
        return await operation();
      } catch (error) {
        if (!isRetriable(error)) {
          throw error;
        }
        if (retryCount >= this.maxRetries) {
          log.error(`[GOVERNOR] Max retries (${this.maxRetries}) reached. Giving up on ${label}`);
          throw error;
        }

        const backoffMs = Math.min(this.baseDelayMs * 2 ** retryCount, this.maxBackoffMs);
        const waitMs = backoffMs + Math.random() * this.jitterMs;
        retryCount++;

        log.warn(
          `[GOVERNOR] ${label} failed. Retry ${retryCount}/${this.maxRetries} in ${(waitMs / 1000).toFixed(1)}s: ${errorMessage(error)}`
        );
        await sleep(waitMs);
      }
    }
  }

  /**
   * Requests recorded in the current window (for monitoring)
   */
  getWindowSize(): number {
    this.prune(Date.now());
    return this.requestTimes.length;
  }

  getLimits(): { rateLimit: number; timeWindowSeconds: number; maxRetries: number } {
    return {
      rateLimit: this.rateLimit,
      timeWindowSeconds: this.windowMs / 1000,
      maxRetries: this.maxRetries
    };
  }

  /**
   * Forget recorded requests (for testing)
   */
  reset(): void {
    this.requestTimes = [];
  }

  private prune(now: number): void {
    let firstLive = 0;
    while (firstLive < this.requestTimes.length && now - this.requestTimes[firstLive] >= this.windowMs) {
      firstLive++;
    }
    if (firstLive > 0) {
      this.requestTimes.splice(0, firstLive);
    }
  }

  private static assertLimits(rateLimit: number, timeWindowSeconds: number): void {
    if (!Number.isInteger(rateLimit) || rateLimit < 1) {
      throw new RangeError(`rateLimit must be a positive integer, got ${rateLimit}`);
    }
    if (!(timeWindowSeconds > 0)) {
      throw new RangeError(`timeWindow must be positive, got ${timeWindowSeconds}`);
    }
  }
}
