/**
 * Interface defining the contract for the politeness delay
 */
export interface IRateLimiter {
  /**
   * Wait until the next request may start
   * @returns A promise that resolves when the request may go out
   */
  acquireToken(): Promise<void>;

  /**
   * Sets the delay applied before every request
   * @param rateLimit Milliseconds between requests
   */
  setRateLimit(rateLimit: number): void;

  getRateLimit(): number;
}
