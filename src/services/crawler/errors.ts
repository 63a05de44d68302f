/**
 * Base error for everything the crawler raises on purpose
 */
export class CrawlerError extends Error {
  constructor(message: string, public readonly code: string = 'CRAWLER_ERROR', public readonly originalError?: unknown) {
    super(message);
    this.name = 'CrawlerError';
  }
}

/**
 * A page could not be fetched: network failure, non-2xx status or non-HTML body
 */
export class TransportError extends CrawlerError {
  constructor(message: string, public readonly url: string, public readonly status?: number, originalError?: unknown) {
    super(message, 'TRANSPORT_ERROR', originalError);
    this.name = 'TransportError';
  }
}

/**
 * Setup failed before any page was crawled; the only fatal category
 */
export class CrawlSetupError extends CrawlerError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'CRAWL_SETUP_ERROR', originalError);
    this.name = 'CrawlSetupError';
  }
}
