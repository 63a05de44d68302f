import { promises as fs } from 'fs';
import path from 'path';
import { IContentSink } from '../interfaces/IContentSink';
import { ExtractedContent, SinkOptions } from '../interfaces/types';
import { CrawlSetupError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

const FILE_EXTENSION = '.txt';

/**
 * Writes each page's text to its own file, named from the URL path.
 * Distinct URLs can map to the same name; the later page overwrites the earlier one.
 */
export class PerPageFileSink implements IContentSink {
  private readonly logger = LoggingUtils.createTaggedLogger('sink');
  private readonly writtenBy = new Map<string, string>();

  constructor(private readonly options: Pick<SinkOptions, 'outputDir'>) {}

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.options.outputDir, { recursive: true });
    } catch (error) {
      throw new CrawlSetupError(`Cannot create output directory ${this.options.outputDir}: ${LoggingUtils.describeError(error)}`, error);
    }
  }

  async record(url: string, content: ExtractedContent): Promise<boolean> {
    const fileName = PerPageFileSink.fileNameFor(url);
    const filePath = path.join(this.options.outputDir, fileName);

    const previousUrl = this.writtenBy.get(fileName);
    if (previousUrl !== undefined && previousUrl !== url) {
      this.logger.warn(`${url} overwrites ${filePath}, previously written for ${previousUrl}`);
    }

    try {
      await fs.writeFile(filePath, content.text, 'utf-8');
      this.writtenBy.set(fileName, url);
      this.logger.info(`Saved ${url} to ${filePath}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to write ${filePath}: ${LoggingUtils.describeError(error)}`);
      return false;
    }
  }

  getOutputPath(): string {
    return this.options.outputDir;
  }

  static fileNameFor(url: string): string {
    return `${UrlUtils.toFileStem(url)}${FILE_EXTENSION}`;
  }
}
