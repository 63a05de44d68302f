import { ExtractedContent } from './types';

/**
 * Interface for content extraction.
 * Turns fetched page markup into the text the crawl records.
 */
export interface IContentExtractor {
  /**
   * Extract the main content of a page
   * @param html Raw page markup
   * @param url The page URL
   * @returns The extracted content, or null when the page has no text
   */
  extract(html: string, url: string): ExtractedContent | null;
}
