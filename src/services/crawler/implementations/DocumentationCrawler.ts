import { ICrawler } from '../interfaces/ICrawler';
import { IScopePolicy } from '../interfaces/IScopePolicy';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { IHttpTransport } from '../interfaces/IHttpTransport';
import { IContentSink } from '../interfaces/IContentSink';
import { IRateLimiter } from '../interfaces/IRateLimiter';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import { CrawlOptions, CrawlResult, PageResult, PageState } from '../interfaces/types';
import { CrawlerError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

/**
 * Depth-first documentation crawler.
 *
 * One instance runs one crawl and owns its state: the frontier, the visited
 * set and the per-URL states. For every URL popped from the frontier it:
 * - stops when the page budget is spent
 * - marks it visited before any network access, skipping it if it already was
 * - waits the politeness delay resolved from robots.txt
 * - fetches, extracts, records, then pushes the page's links
 *
 * Page-level failures are logged and never end the crawl.
 */
export class DocumentationCrawler implements ICrawler {
  private readonly logger = LoggingUtils.createTaggedLogger('crawler');
  private readonly pages = new Map<string, PageState>();
  private readonly options: CrawlOptions;
  private started = false;
  private pagesRecorded = 0;
  private pagesFailed = 0;
  private linksDiscovered = 0;

  constructor(
    private readonly scopePolicy: IScopePolicy,
    private readonly robotsTxtService: IRobotsTxtService,
    private readonly linkExtractor: ILinkExtractor,
    private readonly contentExtractor: IContentExtractor,
    private readonly transport: IHttpTransport,
    private readonly contentSink: IContentSink,
    private readonly rateLimiter: IRateLimiter,
    private readonly frontier: IUrlFrontier,
    options: CrawlOptions
  ) {
    if (options.maxPages !== undefined && (!Number.isInteger(options.maxPages) || options.maxPages < 0)) {
      throw new RangeError(`maxPages must be a non-negative integer, got ${options.maxPages}`);
    }
    this.options = { ...options };
  }

  /**
   * Run the crawl until the frontier is exhausted or the page budget is spent
   * @param startUrl The seed URL
   * @throws CrawlSetupError when the output cannot be prepared
   */
  async crawl(startUrl: string): Promise<CrawlResult> {
    if (this.started) {
      throw new CrawlerError('A crawler instance runs a single crawl', 'CRAWLER_REUSED');
    }
    this.started = true;

    const startedAt = new Date();
    const seed = UrlUtils.normalize(startUrl);
    const scope = this.scopePolicy.getScope();

    this.logger.info(`Starting crawl of ${scope.libraryName || scope.host} at ${seed}`, {
      maxPages: this.options.maxPages ?? 'unbounded',
      userAgent: this.options.userAgent
    });

    await this.contentSink.initialize();
    await this.robotsTxtService.loadRobotsTxt(scope.baseDomain, this.options.userAgent);
    const robotsPolicy = this.robotsTxtService.getPolicy();

    const crawlDelayMs = this.robotsTxtService.getMinDelay();
    this.rateLimiter.setRateLimit(crawlDelayMs);
    const declaredDelay = this.robotsTxtService.getCrawlDelay();
    this.logger.info(
      `Politeness delay: ${crawlDelayMs}ms${declaredDelay === null ? '' : ' (Crawl-delay from robots.txt)'}`
    );

    if (robotsPolicy.sitemaps.length > 0) {
      this.logger.debug(`robots.txt lists ${robotsPolicy.sitemaps.length} sitemaps: ${robotsPolicy.sitemaps.join(', ')}`);
    }

    let budgetExhausted = false;
    if (this.robotsTxtService.isAllowed(seed, this.options.userAgent)) {
      this.frontier.pushAll([seed]);
      budgetExhausted = await this.drainFrontier();
    } else {
      this.logger.warn(`Start URL ${seed} is disallowed by robots.txt, nothing to crawl`);
    }

    const result: CrawlResult = {
      startUrl: seed,
      libraryName: scope.libraryName,
      pagesVisited: this.frontier.visitedCount(),
      pagesRecorded: this.pagesRecorded,
      pagesFailed: this.pagesFailed,
      linksDiscovered: this.linksDiscovered,
      budgetExhausted,
      crawlDelayMs,
      robotsPolicy,
      outputPath: this.contentSink.getOutputPath(),
      startedAt,
      finishedAt: new Date(),
      pages: new Map(this.pages)
    };

    this.logger.info(
      `Crawl finished: ${result.pagesVisited} visited, ${result.pagesRecorded} recorded, ${result.pagesFailed} failed`
    );

    return result;
  }

  /**
   * @returns True when the page budget stopped the crawl
   */
  private async drainFrontier(): Promise<boolean> {
    const { maxPages } = this.options;

    for (let url = this.frontier.pop(); url !== null; url = this.frontier.pop()) {
      if (maxPages !== undefined && this.frontier.visitedCount() >= maxPages) {
        // Leftover duplicates do not count as pending work
        if (this.frontier.isVisited(url)) {
          continue;
        }
        this.logger.info(`Page budget of ${maxPages} reached, stopping with ${this.frontier.size() + 1} URLs pending`);
        return true;
      }

      if (!this.frontier.markVisited(url)) {
        continue;
      }
      this.pages.set(url, PageState.VISITING);

      const page = await this.visit(url);
      if (page) {
        this.pages.set(url, PageState.COMPLETED);
        this.pagesRecorded++;
        this.linksDiscovered += page.links.length;
        for (const link of page.links) {
          if (!this.pages.has(link)) {
            this.pages.set(link, PageState.UNVISITED);
          }
        }
        this.frontier.pushAll(page.links);
      } else {
        this.pages.set(url, PageState.FAILED);
        this.pagesFailed++;
      }
    }

    return false;
  }

  /**
   * Process a single URL
   * @returns The page result, or null when the page failed
   */
  private async visit(url: string): Promise<PageResult | null> {
    this.logger.info(`Crawling: ${url}`);

    await this.rateLimiter.acquireToken();

    const html = await this.attempt(url, 'fetch', () => this.transport.fetchRaw(url, this.options.userAgent));
    if (html === null) {
      return null;
    }

    const content = await this.attempt(url, 'extract', async () => this.contentExtractor.extract(html, url));
    if (!content) {
      this.logger.warn(`Could not extract content from ${url}`);
      return null;
    }

    const recorded = await this.attempt(url, 'record', () => this.contentSink.record(url, content));
    if (!recorded) {
      return null;
    }

    const links = await this.attempt(url, 'link discovery', () => this.linkExtractor.extractLinks(html, url));

    return { url, content, links: links ?? [] };
  }

  /**
   * Run one page step; any error is logged and becomes null
   */
  private async attempt<T>(url: string, step: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      this.logger.warn(`${step} failed for ${url}: ${LoggingUtils.describeError(error)}`);
      return null;
    }
  }
}
