import { IHttpTransport } from '../interfaces/IHttpTransport';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { IContentSink } from '../interfaces/IContentSink';
import { ExtractedContent, RobotsPolicy } from '../interfaces/types';
import { TransportError } from '../errors';

/**
 * Serves pages from a map and records every fetch
 */
export class FakeSiteTransport implements IHttpTransport {
  readonly fetches: string[] = [];
  readonly fetchStartTimes: number[] = [];
  readonly userAgents: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchRaw(url: string, userAgent: string): Promise<string> {
    this.fetches.push(url);
    this.fetchStartTimes.push(performance.now());
    this.userAgents.push(userAgent);

    const html = this.pages[url];
    if (html === undefined) {
      throw new TransportError(`HTTP 404 for ${url}`, url, 404);
    }
    return html;
  }
}

/**
 * robots.txt stand-in with a fixed disallow list and delay
 */
export class StubRobotsTxtService implements IRobotsTxtService {
  readonly loadCalls: Array<{ baseUrl: string; userAgent: string }> = [];

  constructor(
    private readonly disallowed: string[] = [],
    private readonly minDelayMs = 0,
    private readonly sitemaps: string[] = []
  ) {}

  async loadRobotsTxt(baseUrl: string, userAgent: string): Promise<void> {
    this.loadCalls.push({ baseUrl, userAgent });
  }

  isAllowed(url: string): boolean {
    return !this.disallowed.includes(url);
  }

  getCrawlDelay(): number | null {
    return this.minDelayMs;
  }

  getMinDelay(): number {
    return this.minDelayMs;
  }

  getSitemapUrls(): string[] {
    return [...this.sitemaps];
  }

  getPolicy(): RobotsPolicy {
    return {
      robotsUrl: 'https://docs.example.org/robots.txt',
      loaded: true,
      disallowAll: false,
      crawlDelayMs: this.minDelayMs,
      requestRateDelayMs: null,
      sitemaps: [...this.sitemaps],
      fetchedAt: new Date(0)
    };
  }
}

/**
 * Keeps recorded pages in memory; can be told to fail for some URLs
 */
export class RecordingSink implements IContentSink {
  readonly records: Array<{ url: string; content: ExtractedContent }> = [];
  initialized = false;

  constructor(private readonly failFor: string[] = []) {}

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async record(url: string, content: ExtractedContent): Promise<boolean> {
    if (this.failFor.includes(url)) {
      return false;
    }
    this.records.push({ url, content });
    return true;
  }

  getOutputPath(): string {
    return 'memory://records';
  }
}

/**
 * Minimal documentation page: a title, a paragraph and links inside the main area
 */
export function docPage(title: string, links: string[] = []): string {
  const anchors = links.map(href => `<a href="${href}">${href}</a>`).join('\n');
  return `<html>
<head><title>${title}</title></head>
<body>
<div role="main">
<p>${title} content</p>
${anchors}
</div>
</body>
</html>`;
}
