import { URL } from 'url';

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Normalizes a URL by dropping its fragment.
   * Trailing slashes are kept: they mark directory index pages.
   * @param url The URL to normalize
   * @returns The normalized URL string, or the input when it does not parse
   */
  static normalize(url: string): string {
    try {
      const parsedUrl = new URL(url);
      parsedUrl.hash = '';
      return parsedUrl.toString();
    } catch (error) {
      return url;
    }
  }

  /**
   * Parse a URL without throwing
   */
  static parse(url: string): URL | null {
    try {
      return new URL(url);
    } catch (error) {
      return null;
    }
  }

  /**
   * Resolves a relative URL against a base URL
   * @param relativeUrl The relative URL to resolve
   * @param baseUrl The base URL to resolve against
   * @returns The resolved absolute URL, or null when it cannot be resolved
   */
  static resolveUrl(relativeUrl: string, baseUrl: string): string | null {
    try {
      return new URL(relativeUrl, baseUrl).toString();
    } catch (error) {
      return null;
    }
  }

  /**
   * Gets the root URL (protocol + host, port included) from a URL
   * @param url The URL to get the root from
   */
  static getRootUrl(url: string): string {
    const parsedUrl = this.parse(url);
    return parsedUrl ? `${parsedUrl.protocol}//${parsedUrl.host}` : url;
  }

  /**
   * First non-empty path segment, e.g. `polars` for `https://docs.example.org/polars/`
   */
  static firstPathSegment(url: string): string {
    const parsedUrl = this.parse(url);
    if (!parsedUrl) {
      return '';
    }
    return parsedUrl.pathname.split('/').filter(Boolean)[0] ?? '';
  }

  /**
   * Build a flat file name from a URL path.
   * The first segment is dropped and the rest joined with `_`:
   * `/polars/user-guide/intro.html` becomes `user-guide_intro.html`.
   * @returns `index` when nothing is left
   */
  static toFileStem(url: string): string {
    const parsedUrl = this.parse(url);
    if (!parsedUrl) {
      return 'index';
    }
    const segments = parsedUrl.pathname
      .split('/')
      .filter(Boolean)
      .map(segment => segment.replace(/[^A-Za-z0-9._-]/g, '-'));
    const stem = segments.slice(1).join('_');
    return stem || 'index';
  }
}
