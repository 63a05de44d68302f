/**
 * Common types and enums for the crawler service
 */

/**
 * Lifecycle of a single URL inside one crawl.
 * COMPLETED and FAILED are terminal.
 */
export enum PageState {
  UNVISITED = 'UNVISITED',
  VISITING = 'VISITING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED'
}

/**
 * How extracted content is persisted
 */
export enum OutputMode {
  AGGREGATE = 'aggregate',
  PER_PAGE = 'per-page'
}

/**
 * Domain and path constraint of one crawl, fixed at construction
 */
export interface CrawlScope {
  /** scheme + host, e.g. `https://docs.example.org` */
  baseDomain: string;
  /** hostname plus port when present */
  host: string;
  basePath: string;
  libraryName: string;
  restrictToBasePath: boolean;
}

/**
 * Snapshot of the robots.txt policy loaded at crawl start
 */
export interface RobotsPolicy {
  robotsUrl: string;
  loaded: boolean;
  /** Access to robots.txt was refused (401/403); no URL may be fetched */
  disallowAll: boolean;
  crawlDelayMs: number | null;
  requestRateDelayMs: number | null;
  sitemaps: string[];
  fetchedAt: Date;
}

/**
 * Result of content extraction
 */
export interface ExtractedContent {
  url: string;
  title: string | null;
  /** Markup of the main content area */
  html: string;
  /** Plain text of the main content area */
  text: string;
}

/**
 * Outcome of one traversal step. Not retained after the step.
 */
export interface PageResult {
  url: string;
  content: ExtractedContent | null;
  links: string[];
}

/**
 * Options for crawling
 */
export interface CrawlOptions {
  userAgent: string;
  /** Page budget; unbounded when undefined */
  maxPages?: number;
}

/**
 * Options for the output sinks
 */
export interface SinkOptions {
  outputDir: string;
  outputFileName: string;
}

/**
 * Summary returned once a crawl terminates
 */
export interface CrawlResult {
  startUrl: string;
  libraryName: string;
  pagesVisited: number;
  pagesRecorded: number;
  pagesFailed: number;
  linksDiscovered: number;
  budgetExhausted: boolean;
  crawlDelayMs: number;
  robotsPolicy: RobotsPolicy;
  outputPath: string;
  startedAt: Date;
  finishedAt: Date;
  pages: Map<string, PageState>;
}
