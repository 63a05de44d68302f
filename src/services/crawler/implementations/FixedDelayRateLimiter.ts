import { IRateLimiter } from '../interfaces/IRateLimiter';
import { DelayUtils } from '../utils/DelayUtils';

/**
 * Waits one fixed delay before every request.
 * Acquisitions are chained, so callers sharing an instance are spaced by the
 * delay even if they ask at the same time.
 */
export class FixedDelayRateLimiter implements IRateLimiter {
  private tail: Promise<void> = Promise.resolve();

  /**
   * @param rateLimit Milliseconds to wait before each request
   */
  constructor(private rateLimit: number = 1000) {}

  acquireToken(): Promise<void> {
    const turn = this.tail.then(() => DelayUtils.delay(this.rateLimit));
    this.tail = turn;
    return turn;
  }

  setRateLimit(rateLimit: number): void {
    if (!Number.isFinite(rateLimit) || rateLimit < 0) {
      throw new RangeError(`Invalid rate limit: ${rateLimit}`);
    }
    this.rateLimit = rateLimit;
  }

  getRateLimit(): number {
    return this.rateLimit;
  }
}
