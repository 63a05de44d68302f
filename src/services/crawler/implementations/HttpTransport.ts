import axios from 'axios';
import { IHttpTransport } from '../interfaces/IHttpTransport';
import { TransportError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

export interface HttpTransportOptions {
  timeoutMs: number;
  maxRedirects: number;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Page transport backed by axios
 */
export class HttpTransport implements IHttpTransport {
  private readonly logger = LoggingUtils.createTaggedLogger('http');

  constructor(private readonly options: HttpTransportOptions = { timeoutMs: 30000, maxRedirects: 5 }) {}

  async fetchRaw(url: string, userAgent: string): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await axios.get<string>(url, {
        headers: {
          'User-Agent': userAgent,
          'Accept': 'text/html,application/xhtml+xml',
        },
        timeout: this.options.timeoutMs,
        maxRedirects: this.options.maxRedirects,
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        throw new TransportError(`HTTP ${response.status} for ${url}`, url, response.status);
      }

      const contentType = String(response.headers['content-type'] ?? '');
      if (contentType && !HTML_CONTENT_TYPES.some(type => contentType.includes(type))) {
        throw new TransportError(`Unexpected content type "${contentType}" for ${url}`, url, response.status);
      }

      const body = typeof response.data === 'string' ? response.data : String(response.data);
      this.logger.debug(`Fetched ${url} in ${Date.now() - startTime}ms (${body.length} bytes)`);
      return body;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`Request for ${url} failed: ${LoggingUtils.describeError(error)}`, url, undefined, error);
    }
  }
}
