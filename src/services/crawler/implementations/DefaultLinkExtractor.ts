import * as cheerio from 'cheerio';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { IScopePolicy } from '../interfaces/IScopePolicy';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:'];

/**
 * Default implementation of the link extractor.
 * Keeps links that the scope policy and robots.txt both accept.
 */
export class DefaultLinkExtractor implements ILinkExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('link-extractor');

  constructor(
    private readonly scopePolicy: IScopePolicy,
    private readonly robotsTxtService: IRobotsTxtService
  ) {}

  /**
   * Extract all followable links from HTML content
   * @param htmlContent The HTML content to extract links from
   * @param currentUrl The page URL, used to resolve relative links
   * @returns Unique absolute URLs in document order, fragments removed
   */
  async extractLinks(htmlContent: string, currentUrl: string): Promise<string[]> {
    try {
      const $ = cheerio.load(htmlContent);
      const links = new Set<string>();

      $('a[href]').each((_, element) => {
        const href = ($(element).attr('href') ?? '').trim();

        if (
          href === '' ||
          href.startsWith('#') ||
          SKIPPED_SCHEMES.some(scheme => href.toLowerCase().startsWith(scheme))
        ) {
          return;
        }

        const resolvedUrl = UrlUtils.resolveUrl(href, currentUrl);
        if (!resolvedUrl) {
          this.logger.debug(`Skipping invalid URL: ${href}`);
          return;
        }

        const normalizedUrl = UrlUtils.normalize(resolvedUrl);
        if (this.scopePolicy.isInScope(normalizedUrl) && this.robotsTxtService.isAllowed(normalizedUrl)) {
          links.add(normalizedUrl);
        }
      });

      this.logger.debug(`Found ${links.size} followable links on ${currentUrl}`);
      return [...links];
    } catch (error) {
      this.logger.error(`Error extracting links from ${currentUrl}: ${LoggingUtils.describeError(error)}`);
      return [];
    }
  }
}
