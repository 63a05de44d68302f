import { ICrawler } from '../interfaces/ICrawler';
import { IScopePolicy } from '../interfaces/IScopePolicy';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { IHttpTransport } from '../interfaces/IHttpTransport';
import { IContentSink } from '../interfaces/IContentSink';
import { IRateLimiter } from '../interfaces/IRateLimiter';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import { IFormatConverter } from '../interfaces/IFormatConverter';
import { OutputMode } from '../interfaces/types';
import { DocsScopePolicy } from '../implementations/DocsScopePolicy';
import { RobotsTxtService } from '../implementations/RobotsTxtService';
import { DefaultLinkExtractor } from '../implementations/DefaultLinkExtractor';
import { CheerioExtractor } from '../implementations/CheerioExtractor';
import { HttpTransport } from '../implementations/HttpTransport';
import { AggregateFileSink } from '../implementations/AggregateFileSink';
import { PerPageFileSink } from '../implementations/PerPageFileSink';
import { MarkdownConverter } from '../implementations/MarkdownConverter';
import { FixedDelayRateLimiter } from '../implementations/FixedDelayRateLimiter';
import { InMemoryUrlFrontier } from '../implementations/InMemoryUrlFrontier';
import { DocumentationCrawler } from '../implementations/DocumentationCrawler';

/**
 * Everything one crawl needs
 */
export interface CrawlerSettings {
  startUrl: string;
  userAgent: string;
  maxPages?: number;
  outputDir: string;
  outputFileName: string;
  mode: OutputMode;
  restrictToBasePath: boolean;
  requestTimeoutMs: number;
  maxRedirects: number;
  defaultCrawlDelayMs: number;
  robotsFetchRetries: number;
}

/**
 * The collaborators wired into a crawler
 */
export interface CrawlerServices {
  scopePolicy: IScopePolicy;
  robotsTxtService: IRobotsTxtService;
  linkExtractor: ILinkExtractor;
  contentExtractor: IContentExtractor;
  transport: IHttpTransport;
  converter: IFormatConverter;
  contentSink: IContentSink;
  rateLimiter: IRateLimiter;
  frontier: IUrlFrontier;
}

/**
 * Builds the services of one crawl instance.
 * Any service can be replaced, which is how tests swap in stand-ins.
 */
export class ServiceFactory {
  constructor(private readonly settings: CrawlerSettings) {}

  /**
   * Create the collaborators, preferring the given overrides
   * @param overrides Pre-built services to use instead of the defaults
   */
  createServices(overrides: Partial<CrawlerServices> = {}): CrawlerServices {
    const { settings } = this;

    const scopePolicy = overrides.scopePolicy
      ?? DocsScopePolicy.fromUrl(settings.startUrl, settings.restrictToBasePath);
    const robotsTxtService = overrides.robotsTxtService ?? new RobotsTxtService({
      defaultDelayMs: settings.defaultCrawlDelayMs,
      timeoutMs: settings.requestTimeoutMs,
      retries: settings.robotsFetchRetries
    });
    const converter = overrides.converter ?? new MarkdownConverter();

    return {
      scopePolicy,
      robotsTxtService,
      converter,
      linkExtractor: overrides.linkExtractor ?? new DefaultLinkExtractor(scopePolicy, robotsTxtService),
      contentExtractor: overrides.contentExtractor ?? new CheerioExtractor(),
      transport: overrides.transport ?? new HttpTransport({
        timeoutMs: settings.requestTimeoutMs,
        maxRedirects: settings.maxRedirects
      }),
      contentSink: overrides.contentSink ?? this.createSink(converter),
      rateLimiter: overrides.rateLimiter ?? new FixedDelayRateLimiter(settings.defaultCrawlDelayMs),
      frontier: overrides.frontier ?? new InMemoryUrlFrontier()
    };
  }

  /**
   * Get a crawler wired with default or overridden services
   */
  createCrawler(overrides: Partial<CrawlerServices> = {}): ICrawler {
    const services = this.createServices(overrides);

    return new DocumentationCrawler(
      services.scopePolicy,
      services.robotsTxtService,
      services.linkExtractor,
      services.contentExtractor,
      services.transport,
      services.contentSink,
      services.rateLimiter,
      services.frontier,
      {
        userAgent: this.settings.userAgent,
        maxPages: this.settings.maxPages
      }
    );
  }

  private createSink(converter: IFormatConverter): IContentSink {
    const sinkOptions = {
      outputDir: this.settings.outputDir,
      outputFileName: this.settings.outputFileName
    };

    return this.settings.mode === OutputMode.PER_PAGE
      ? new PerPageFileSink(sinkOptions)
      : new AggregateFileSink(sinkOptions, converter);
  }
}
