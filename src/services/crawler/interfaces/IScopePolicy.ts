import { CrawlScope } from './types';

/**
 * Pure predicate deciding whether a URL is eligible for traversal.
 */
export interface IScopePolicy {
  /**
   * Check if a URL belongs to the crawl
   * @param url Absolute URL to check
   * @returns True if the URL is on the same host and looks like a content page
   */
  isInScope(url: string): boolean;

  /**
   * The immutable scope this policy was built from
   */
  getScope(): CrawlScope;
}
