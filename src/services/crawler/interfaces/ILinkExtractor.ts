/**
 * Interface for link extraction.
 * Implementations find the URLs a page references and keep the ones the crawl may follow.
 */
export interface ILinkExtractor {
  /**
   * Extract followable links from HTML content
   * @param htmlContent The HTML content to extract links from
   * @param currentUrl The page URL, used to resolve relative links
   * @returns Unique absolute URLs in document order
   */
  extractLinks(htmlContent: string, currentUrl: string): Promise<string[]>;
}
