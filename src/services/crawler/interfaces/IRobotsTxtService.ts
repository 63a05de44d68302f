import { RobotsPolicy } from './types';

/**
 * Interface for robots.txt handling.
 * Implementations parse and enforce robots.txt rules for crawled websites.
 */
export interface IRobotsTxtService {
  /**
   * Load and parse the robots.txt file for a domain.
   * Never rejects: a failed load leaves the service allowing everything.
   * @param baseUrl The base URL of the website
   * @param userAgent The user agent to check permissions for
   */
  loadRobotsTxt(baseUrl: string, userAgent: string): Promise<void>;

  /**
   * Check if a URL is allowed by the robots.txt rules
   * @param url The URL to check
   * @param userAgent Defaults to the user agent given to loadRobotsTxt
   */
  isAllowed(url: string, userAgent?: string): boolean;

  /**
   * Get the crawl delay specified in robots.txt
   * @returns The crawl delay in milliseconds, or null if not specified
   */
  getCrawlDelay(): number | null;

  /**
   * Resolve the politeness delay: Crawl-delay, then Request-rate, then the default
   * @returns Delay in milliseconds
   */
  getMinDelay(): number;

  /**
   * Sitemap URLs listed in robots.txt
   */
  getSitemapUrls(): string[];

  getPolicy(): RobotsPolicy;
}
