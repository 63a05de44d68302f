import { DocumentationCrawler } from '../DocumentationCrawler';
import { DocsScopePolicy } from '../DocsScopePolicy';
import { DefaultLinkExtractor } from '../DefaultLinkExtractor';
import { CheerioExtractor } from '../CheerioExtractor';
import { FixedDelayRateLimiter } from '../FixedDelayRateLimiter';
import { InMemoryUrlFrontier } from '../InMemoryUrlFrontier';
import { ILinkExtractor } from '../../interfaces/ILinkExtractor';
import { IContentSink } from '../../interfaces/IContentSink';
import { ExtractedContent, PageState } from '../../interfaces/types';
import { CrawlerError, CrawlSetupError } from '../../errors';
import { FakeSiteTransport, RecordingSink, StubRobotsTxtService, docPage } from '../../test-utils/fakes';

const base = 'https://docs.example.org/lib/';
const u = (page: string): string => `${base}${page}`;

interface Setup {
  seed?: string;
  maxPages?: number;
  robots?: StubRobotsTxtService;
  sink?: IContentSink;
  linkExtractor?: ILinkExtractor;
  userAgent?: string;
}

function createCrawler(pages: Record<string, string>, setup: Setup = {}) {
  const seed = setup.seed ?? u('index.html');
  const scopePolicy = DocsScopePolicy.fromUrl(seed);
  const robots = setup.robots ?? new StubRobotsTxtService();
  const transport = new FakeSiteTransport(pages);
  const sink = setup.sink ?? new RecordingSink();
  const crawler = new DocumentationCrawler(
    scopePolicy,
    robots,
    setup.linkExtractor ?? new DefaultLinkExtractor(scopePolicy, robots),
    new CheerioExtractor(),
    transport,
    sink,
    new FixedDelayRateLimiter(0),
    new InMemoryUrlFrontier(),
    { userAgent: setup.userAgent ?? 'TestAgent/1.0', maxPages: setup.maxPages }
  );
  return { crawler, transport, robots };
}

describe('DocumentationCrawler', () => {
  describe('traversal', () => {
    it('should follow a chain of pages', async () => {
      const sink = new RecordingSink();
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html']),
        [u('a.html')]: docPage('A', ['b.html']),
        [u('b.html')]: docPage('B')
      }, { sink });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html'), u('b.html')]);
      expect(result.pagesVisited).toBe(3);
      expect(result.pagesRecorded).toBe(3);
      expect(result.pagesFailed).toBe(0);
      expect(result.budgetExhausted).toBe(false);
      expect(result.libraryName).toBe('lib');
      expect(result.outputPath).toBe('memory://records');
      expect(sink.records.map(r => r.content.text)).toEqual([
        'Index content\na.html',
        'A content\nb.html',
        'B content'
      ]);
    });

    it('should visit pages depth-first in link order', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['b.html', 'c.html']),
        [u('b.html')]: docPage('B', ['d.html']),
        [u('c.html')]: docPage('C'),
        [u('d.html')]: docPage('D')
      });

      await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('b.html'), u('d.html'), u('c.html')]);
    });

    it('should fetch every page once when links form a cycle', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html']),
        [u('a.html')]: docPage('A', ['index.html', 'b.html']),
        [u('b.html')]: docPage('B', ['a.html', 'a.html#top'])
      });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html'), u('b.html')]);
      expect(result.linksDiscovered).toBe(4);
    });

    it('should not follow out-of-scope links', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', [
          'https://elsewhere.example.com/page.html',
          '_static/theme.html',
          '_sources/index.rst.txt',
          'objects.inv',
          'a.html'
        ]),
        [u('a.html')]: docPage('A')
      });

      await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html')]);
    });

    it('should crawl a seed that the scope rules would not follow as a link', async () => {
      const seed = 'https://docs.example.org/lib';
      const { crawler, transport } = createCrawler({ [seed]: docPage('Root') }, { seed });

      const result = await crawler.crawl(seed);

      expect(transport.fetches).toEqual([seed]);
      expect(result.pagesRecorded).toBe(1);
    });

    it('should drop the fragment of the seed', async () => {
      const { crawler, transport } = createCrawler({ [u('index.html')]: docPage('Index') });

      const result = await crawler.crawl(u('index.html#install'));

      expect(result.startUrl).toBe(u('index.html'));
      expect(transport.fetches).toEqual([u('index.html')]);
    });
  });

  describe('page budget', () => {
    const chain: Record<string, string> = {};
    for (let i = 0; i < 10; i++) {
      chain[u(`p${i}.html`)] = docPage(`Page ${i}`, i < 9 ? [`p${i + 1}.html`] : []);
    }

    it('should stop after maxPages pages', async () => {
      const { crawler, transport } = createCrawler(chain, { seed: u('p0.html'), maxPages: 3 });

      const result = await crawler.crawl(u('p0.html'));

      expect(transport.fetches).toEqual([u('p0.html'), u('p1.html'), u('p2.html')]);
      expect(result.pagesVisited).toBe(3);
      expect(result.budgetExhausted).toBe(true);
      expect([...result.pages.entries()]).toEqual([
        [u('p0.html'), PageState.COMPLETED],
        [u('p1.html'), PageState.COMPLETED],
        [u('p2.html'), PageState.COMPLETED],
        [u('p3.html'), PageState.UNVISITED]
      ]);
    });

    it('should not report the budget when only visited pages remain', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html']),
        [u('a.html')]: docPage('A', ['index.html'])
      }, { maxPages: 2 });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html')]);
      expect(result.budgetExhausted).toBe(false);
    });

    it('should not report the budget when the site runs out first', async () => {
      const { crawler } = createCrawler(chain, { seed: u('p7.html'), maxPages: 3 });

      const result = await crawler.crawl(u('p7.html'));

      expect(result.pagesVisited).toBe(3);
      expect(result.budgetExhausted).toBe(false);
    });

    it('should visit nothing with a budget of zero', async () => {
      const { crawler, transport, robots } = createCrawler(chain, { seed: u('p0.html'), maxPages: 0 });

      const result = await crawler.crawl(u('p0.html'));

      expect(transport.fetches).toEqual([]);
      expect(robots.loadCalls).toHaveLength(1);
      expect(result.pagesVisited).toBe(0);
      expect(result.budgetExhausted).toBe(true);
    });

    it('should reject an invalid budget', () => {
      expect(() => createCrawler(chain, { maxPages: -1 })).toThrow(RangeError);
      expect(() => createCrawler(chain, { maxPages: 1.5 })).toThrow(RangeError);
    });
  });

  describe('page failures', () => {
    it('should continue past a page that cannot be fetched', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['missing.html', 'a.html']),
        [u('a.html')]: docPage('A')
      });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('missing.html'), u('a.html')]);
      expect(result.pagesFailed).toBe(1);
      expect(result.pagesRecorded).toBe(2);
      expect(result.pages.get(u('missing.html'))).toBe(PageState.FAILED);
      expect(result.pages.get(u('a.html'))).toBe(PageState.COMPLETED);
    });

    it('should not record or follow a page without content', async () => {
      const sink = new RecordingSink();
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['empty.html']),
        [u('empty.html')]: '<html><body><nav><a href="hidden.html">Hidden</a></nav></body></html>',
        [u('hidden.html')]: docPage('Hidden')
      }, { sink });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('empty.html')]);
      expect(result.pages.get(u('empty.html'))).toBe(PageState.FAILED);
      expect(sink.records.map(r => r.url)).toEqual([u('index.html')]);
    });

    it('should not follow links of a page the sink rejected', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html']),
        [u('a.html')]: docPage('A', ['b.html']),
        [u('b.html')]: docPage('B')
      }, { sink: new RecordingSink([u('a.html')]) });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html')]);
      expect(result.pages.get(u('a.html'))).toBe(PageState.FAILED);
    });

    it('should keep a recorded page when link discovery fails', async () => {
      const linkExtractor: ILinkExtractor = {
        extractLinks: jest.fn<Promise<string[]>, [string, string]>().mockRejectedValue(new Error('boom'))
      };
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html'])
      }, { linkExtractor });

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html')]);
      expect(result.pages.get(u('index.html'))).toBe(PageState.COMPLETED);
      expect(result.linksDiscovered).toBe(0);
    });
  });

  describe('robots.txt', () => {
    it('should load robots.txt for the seed with the user agent', async () => {
      const { crawler, transport, robots } = createCrawler(
        { [u('index.html')]: docPage('Index') },
        { userAgent: 'PoliteBot/2.0' }
      );

      await crawler.crawl(u('index.html'));

      expect(robots.loadCalls).toEqual([{ baseUrl: 'https://docs.example.org', userAgent: 'PoliteBot/2.0' }]);
      expect(transport.userAgents).toEqual(['PoliteBot/2.0']);
    });

    it('should skip disallowed links', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['secret.html', 'a.html']),
        [u('secret.html')]: docPage('Secret'),
        [u('a.html')]: docPage('A')
      }, { robots: new StubRobotsTxtService([u('secret.html')]) });

      await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([u('index.html'), u('a.html')]);
    });

    it('should crawl nothing when the seed is disallowed', async () => {
      const sink = new RecordingSink();
      const { crawler, transport } = createCrawler(
        { [u('index.html')]: docPage('Index') },
        { robots: new StubRobotsTxtService([u('index.html')]), sink }
      );

      const result = await crawler.crawl(u('index.html'));

      expect(transport.fetches).toEqual([]);
      expect(result.pagesVisited).toBe(0);
      expect(result.budgetExhausted).toBe(false);
      expect(sink.initialized).toBe(true);
    });

    it('should space requests by the politeness delay', async () => {
      const { crawler, transport } = createCrawler({
        [u('index.html')]: docPage('Index', ['a.html']),
        [u('a.html')]: docPage('A', ['b.html']),
        [u('b.html')]: docPage('B')
      }, { robots: new StubRobotsTxtService([], 30) });

      const result = await crawler.crawl(u('index.html'));

      expect(result.crawlDelayMs).toBe(30);
      expect(result.robotsPolicy).toMatchObject({ loaded: true, crawlDelayMs: 30 });
      const [first, second, third] = transport.fetchStartTimes;
      // Timers can fire a millisecond early
      expect(second - first).toBeGreaterThanOrEqual(28);
      expect(third - second).toBeGreaterThanOrEqual(28);
    });
  });

  describe('lifecycle', () => {
    it('should run a single crawl per instance', async () => {
      const { crawler } = createCrawler({ [u('index.html')]: docPage('Index') });

      await crawler.crawl(u('index.html'));

      const error = await crawler.crawl(u('index.html')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(CrawlerError);
      expect(error).toMatchObject({ code: 'CRAWLER_REUSED' });
    });

    it('should fail before any request when the sink cannot be prepared', async () => {
      const sink: IContentSink = {
        initialize: jest.fn<Promise<void>, []>().mockRejectedValue(new CrawlSetupError('read-only')),
        record: jest.fn<Promise<boolean>, [string, ExtractedContent]>(),
        getOutputPath: () => '/read-only'
      };
      const { crawler, transport, robots } = createCrawler({ [u('index.html')]: docPage('Index') }, { sink });

      await expect(crawler.crawl(u('index.html'))).rejects.toBeInstanceOf(CrawlSetupError);
      expect(robots.loadCalls).toEqual([]);
      expect(transport.fetches).toEqual([]);
    });
  });
});
