import axios from 'axios';
import robotsParser from 'robots-parser';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { RobotsPolicy } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { DelayUtils } from '../utils/DelayUtils';
import { RobotsTxtUtils } from '../utils/RobotsTxtUtils';

export interface RobotsTxtServiceOptions {
  /** Delay used when robots.txt declares neither Crawl-delay nor Request-rate */
  defaultDelayMs: number;
  timeoutMs: number;
  /** Retries for network errors; HTTP error statuses are not retried */
  retries: number;
}

/** robots.txt answers that forbid the whole site */
const ACCESS_DENIED_STATUSES = [401, 403];

/** Network error codes that another attempt will not fix */
const NON_TRANSIENT_CODES = ['ENOTFOUND', 'ERR_INVALID_URL'];

const DEFAULT_OPTIONS: RobotsTxtServiceOptions = {
  defaultDelayMs: 1000,
  timeoutMs: 10000,
  retries: 2,
};

/**
 * Implementation of the robots.txt service.
 * Loads the policy once per crawl and fails open: when robots.txt is missing
 * or unreadable every URL is allowed and the default delay applies.
 * A 401 or 403 answer is the exception and disallows every URL.
 */
export class RobotsTxtService implements IRobotsTxtService {
  private robotsTxt: ReturnType<typeof robotsParser> | null = null;
  private userAgent: string = '';
  private policy: RobotsPolicy;
  private readonly options: RobotsTxtServiceOptions;
  private readonly logger = LoggingUtils.createTaggedLogger('robots');
  private cache = new Map<string, boolean>();

  constructor(options: Partial<RobotsTxtServiceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.policy = this.emptyPolicy('');
  }

  /**
   * Load and parse the robots.txt file from a URL
   * @param baseUrl Any URL on the site; only its scheme and host are used
   * @param userAgent The user agent to use when checking permissions
   */
  async loadRobotsTxt(baseUrl: string, userAgent: string): Promise<void> {
    this.reset();
    this.userAgent = userAgent;

    const robotsUrl = `${UrlUtils.getRootUrl(baseUrl)}/robots.txt`;
    this.policy = this.emptyPolicy(robotsUrl);
    this.logger.info(`Loading robots.txt from ${robotsUrl}`);

    try {
      const response = await DelayUtils.withRetry(
        () => axios.get<string>(robotsUrl, {
          headers: {
            'User-Agent': userAgent
          },
          timeout: this.options.timeoutMs,
          responseType: 'text',
          // Statuses are inspected below instead of thrown
          validateStatus: () => true
        }),
        this.options.retries,
        RobotsTxtService.isTransient
      );

      if (ACCESS_DENIED_STATUSES.includes(response.status)) {
        this.policy = { ...this.emptyPolicy(robotsUrl), disallowAll: true };
        this.logger.warn(`Access to ${robotsUrl} denied (HTTP ${response.status}), disallowing all URLs`);
        return;
      }

      if (response.status !== 200) {
        this.logger.warn(`No robots.txt at ${robotsUrl} (HTTP ${response.status}), allowing all URLs`);
        return;
      }

      const content = typeof response.data === 'string' ? response.data : String(response.data);
      this.robotsTxt = robotsParser(robotsUrl, content);

      const crawlDelay = this.robotsTxt.getCrawlDelay(userAgent);
      this.policy = {
        robotsUrl,
        loaded: true,
        disallowAll: false,
        crawlDelayMs: crawlDelay !== undefined && crawlDelay > 0 ? crawlDelay * 1000 : null,
        requestRateDelayMs: RobotsTxtUtils.findRequestRateDelay(content, userAgent),
        sitemaps: this.robotsTxt.getSitemaps(),
        fetchedAt: new Date()
      };

      if (this.policy.crawlDelayMs !== null) {
        this.logger.info(`Found crawl delay: ${this.policy.crawlDelayMs}ms`);
      } else if (this.policy.requestRateDelayMs !== null) {
        this.logger.info(`Found request rate, delay: ${this.policy.requestRateDelayMs}ms`);
      }

      this.logger.info(`Successfully loaded and parsed robots.txt from ${robotsUrl}`);
    } catch (error) {
      this.robotsTxt = null;
      this.policy = this.emptyPolicy(robotsUrl);
      this.logger.warn(`Could not load robots.txt from ${robotsUrl}, allowing all URLs: ${LoggingUtils.describeError(error)}`);
    }
  }

  /**
   * Check if a URL is allowed to be crawled
   * @param url The URL to check
   * @param userAgent Defaults to the user agent the policy was loaded for
   */
  isAllowed(url: string, userAgent: string = this.userAgent): boolean {
    if (this.policy.disallowAll) {
      return false;
    }
    if (!this.robotsTxt) {
      return true;
    }

    const cacheKey = `${userAgent}\n${url}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    // undefined means the URL is on another origin; the scope policy handles those
    const allowed = this.robotsTxt.isAllowed(url, userAgent) !== false;
    this.cache.set(cacheKey, allowed);

    if (!allowed) {
      this.logger.debug(`Disallowed by robots.txt: ${url}`);
    }

    return allowed;
  }

  /**
   * @returns The crawl delay in milliseconds, or null if not specified
   */
  getCrawlDelay(): number | null {
    return this.policy.crawlDelayMs;
  }

  getMinDelay(): number {
    return this.policy.crawlDelayMs ?? this.policy.requestRateDelayMs ?? this.options.defaultDelayMs;
  }

  getSitemapUrls(): string[] {
    return [...this.policy.sitemaps];
  }

  getPolicy(): RobotsPolicy {
    return { ...this.policy, sitemaps: [...this.policy.sitemaps] };
  }

  /**
   * Reset the robots.txt service
   */
  reset(): void {
    this.robotsTxt = null;
    this.userAgent = '';
    this.policy = this.emptyPolicy('');
    this.cache.clear();
  }

  private static isTransient(error: Error): boolean {
    const code = 'code' in error ? error.code : undefined;
    return !(typeof code === 'string' && NON_TRANSIENT_CODES.includes(code));
  }

  private emptyPolicy(robotsUrl: string): RobotsPolicy {
    return {
      robotsUrl,
      loaded: false,
      disallowAll: false,
      crawlDelayMs: null,
      requestRateDelayMs: null,
      sitemaps: [],
      fetchedAt: new Date()
    };
  }
}
