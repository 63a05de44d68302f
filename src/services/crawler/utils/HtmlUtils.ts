import * as cheerio from 'cheerio';

/**
 * Containers that hold the page body on generated documentation sites,
 * most specific first. Sphinx / Read the Docs themes come before generic markup.
 */
const MAIN_CONTENT_SELECTORS = [
  'div[role="main"]',
  '[itemprop="articleBody"]',
  'article',
  'main',
  '.document',
  '#content',
  '.content',
];

/**
 * Chrome that never belongs to the extracted text
 */
const NOISE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'nav',
  'header',
  'footer',
  'a.headerlink',
  '.sphinxsidebar',
  '.related',
  '.wy-nav-side',
  '.rst-footer-buttons',
].join(', ');

/**
 * Utilities for handling HTML content in the crawler service
 */
export class HtmlUtils {
  static load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Extract the title from a parsed document
   * @returns The trimmed title or null if absent
   */
  static extractTitle($: cheerio.CheerioAPI): string | null {
    const title = $('title').first().text().trim();
    return title || null;
  }

  /**
   * Locate the main content area and return its markup and text.
   * Removes navigation chrome from the document first.
   * Falls back to `body`, then to the whole document.
   */
  static extractMainContent($: cheerio.CheerioAPI): { html: string; text: string } {
    $(NOISE_SELECTORS).remove();

    for (const selector of MAIN_CONTENT_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) {
        continue;
      }
      const text = this.normalizeText(element.text());
      if (text.length > 0) {
        return { html: element.html() ?? '', text };
      }
    }

    const body = $('body');
    if (body.length > 0) {
      return { html: body.html() ?? '', text: this.normalizeText(body.text()) };
    }

    return { html: $.html(), text: this.normalizeText($.root().text()) };
  }

  /**
   * Collapse whitespace inside lines and runs of blank lines between them
   */
  static normalizeText(text: string): string {
    return text
      .split(/\r?\n/)
      .map(line => line.replace(/\s+/g, ' ').trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}
