import { IContentExtractor } from '../interfaces/IContentExtractor';
import { ExtractedContent } from '../interfaces/types';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Content extractor implementation using Cheerio for static pages.
 * Picks the documentation body and drops navigation, scripts and styles.
 */
export class CheerioExtractor implements IContentExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('content-extractor');

  /**
   * Extract the main content of a page
   * @param html Raw page markup
   * @param url The page URL
   * @returns The extracted content, or null when the page holds no text
   */
  extract(html: string, url: string): ExtractedContent | null {
    const startTime = Date.now();
    const $ = HtmlUtils.load(html);

    const title = HtmlUtils.extractTitle($);
    const main = HtmlUtils.extractMainContent($);

    if (main.text.length === 0) {
      this.logger.debug(`No text content found on ${url}`);
      return null;
    }

    this.logger.debug(`Extraction completed for ${url} in ${Date.now() - startTime}ms (${main.text.length} chars)`);

    return {
      url,
      title,
      html: main.html,
      text: main.text
    };
  }
}
