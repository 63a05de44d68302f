/**
 * Converts extracted page content into the output document format.
 */
export interface IFormatConverter {
  /**
   * @param html Main-content markup of a page
   * @returns The converted document
   * @throws When conversion fails; callers keep the plain text instead
   */
  convert(html: string): string;
}
