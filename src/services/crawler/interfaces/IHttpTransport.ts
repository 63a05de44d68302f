/**
 * Raw page transport.
 */
export interface IHttpTransport {
  /**
   * Fetch a page body
   * @param url The URL to fetch
   * @param userAgent Sent as the User-Agent header
   * @returns The response body
   * @throws TransportError on network failure, non-2xx status or non-HTML content
   */
  fetchRaw(url: string, userAgent: string): Promise<string>;
}
