/**
 * Utilities for managing delays and retries in the crawler service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay
   * @param ms The number of milliseconds to delay
   */
  public static delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  /**
   * Implements exponential backoff strategy for retries
   * @param attempt Current attempt number (0-based)
   * @param baseDelay Base delay in milliseconds
   * @param maxDelay Maximum delay in milliseconds
   * @returns The calculated delay in milliseconds
   */
  static exponentialBackoff(attempt: number, baseDelay = 1000, maxDelay = 30000): number {
    const delay = baseDelay * Math.pow(2, attempt);

    // Jitter keeps retries from lining up
    const jitter = Math.random() * 0.3 * delay;

    return Math.min(delay + jitter, maxDelay);
  }

  /**
   * Executes a function with retry capability using exponential backoff
   * @param fn The function to execute that returns a promise
   * @param maxRetries Maximum number of retry attempts
   * @param shouldRetry Decides whether an error is worth another attempt
   * @param baseDelay Base delay in milliseconds
   * @param maxDelay Maximum delay in milliseconds
   * @returns Promise resolving with the return value of the function or rejecting with the last error
   */
  static async withRetry<T>(
    fn: () => Promise<T>,
    maxRetries = 3,
    shouldRetry: (error: Error) => boolean = () => true,
    baseDelay = 1000,
    maxDelay = 30000
  ): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt === maxRetries || !shouldRetry(lastError)) {
          throw lastError;
        }

        await this.delay(this.exponentialBackoff(attempt, baseDelay, maxDelay));
      }
    }

    throw lastError || new Error('Retry failed');
  }
}
