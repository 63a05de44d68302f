import { CrawlResult } from './types';

/**
 * Interface for crawler implementations that handle the web crawling process.
 */
export interface ICrawler {
  /**
   * Run one crawl to exhaustion or budget
   * @param startUrl The URL to start crawling from
   * @returns Summary of the crawl
   */
  crawl(startUrl: string): Promise<CrawlResult>;
}
