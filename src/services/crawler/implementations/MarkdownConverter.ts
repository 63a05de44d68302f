import { convertHtmlToMarkdown } from 'dom-to-semantic-markdown';
import { JSDOM } from 'jsdom';
import { IFormatConverter } from '../interfaces/IFormatConverter';

/**
 * HTML to Markdown converter built on dom-to-semantic-markdown.
 * jsdom supplies the DOMParser that Node lacks.
 */
export class MarkdownConverter implements IFormatConverter {
  convert(html: string): string {
    const dom = new JSDOM('');
    const markdown = convertHtmlToMarkdown(html, {
      overrideDOMParser: new dom.window.DOMParser(),
      enableTableColumnTracking: true
    });

    const trimmed = markdown.trim();
    if (trimmed.length === 0) {
      throw new Error('Markdown conversion produced no output');
    }
    return trimmed;
  }
}
