import { IScopePolicy } from '../interfaces/IScopePolicy';
import { CrawlScope } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';

/** Suffix of a content page on generated documentation sites */
const PAGE_SUFFIX = '.html';

/** Path segments holding page sources and static assets, never content */
const EXCLUDED_SEGMENTS = ['/_sources/', '/_static/'];

/**
 * Scope policy for Sphinx / Read the Docs style sites.
 * A URL is in scope when it is on the seed's host, names an `.html` page or a
 * directory index, and avoids the `_sources` and `_static` trees.
 */
export class DocsScopePolicy implements IScopePolicy {
  constructor(private readonly scope: CrawlScope) {}

  /**
   * Build the scope from the crawl seed
   * @param startUrl The seed URL
   * @param restrictToBasePath Also require the seed's directory as path prefix
   */
  static fromUrl(startUrl: string, restrictToBasePath = false): DocsScopePolicy {
    const parsedUrl = UrlUtils.parse(startUrl);
    if (!parsedUrl) {
      throw new TypeError(`Invalid start URL: ${startUrl}`);
    }

    // Directory of the seed: `/polars/api/index.html` -> `/polars/api/`
    const basePath = parsedUrl.pathname.substring(0, parsedUrl.pathname.lastIndexOf('/') + 1) || '/';

    return new DocsScopePolicy(Object.freeze({
      baseDomain: `${parsedUrl.protocol}//${parsedUrl.host}`,
      host: parsedUrl.host,
      basePath,
      libraryName: UrlUtils.firstPathSegment(startUrl),
      restrictToBasePath,
    }));
  }

  isInScope(url: string): boolean {
    const parsedUrl = UrlUtils.parse(url);
    if (!parsedUrl || (parsedUrl.protocol !== 'http:' && parsedUrl.protocol !== 'https:')) {
      return false;
    }

    if (parsedUrl.host !== this.scope.host) {
      return false;
    }

    const path = parsedUrl.pathname;
    if (!(path.endsWith(PAGE_SUFFIX) || path.endsWith('/'))) {
      return false;
    }

    if (EXCLUDED_SEGMENTS.some(segment => path.includes(segment))) {
      return false;
    }

    return !this.scope.restrictToBasePath || path.startsWith(this.scope.basePath);
  }

  getScope(): CrawlScope {
    return this.scope;
  }
}
