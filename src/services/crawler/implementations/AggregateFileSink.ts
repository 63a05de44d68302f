import { promises as fs } from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { IContentSink } from '../interfaces/IContentSink';
import { IFormatConverter } from '../interfaces/IFormatConverter';
import { ExtractedContent, SinkOptions } from '../interfaces/types';
import { CrawlSetupError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Appends every crawled page to one Markdown artifact.
 *
 * Each record is delimited by a front-matter style header:
 *
 * ```
 * ---
 * source: https://docs.example.org/guide/index.html
 * crawled_at: 2024-05-01 12:00:00
 * ---
 * ```
 *
 * Records are built in full and written with a single append, so a record is
 * either present whole or not at all.
 */
export class AggregateFileSink implements IContentSink {
  private readonly logger = LoggingUtils.createTaggedLogger('sink');
  private readonly outputPath: string;

  constructor(
    private readonly options: SinkOptions,
    private readonly converter: IFormatConverter,
    private readonly now: () => Date = () => new Date()
  ) {
    this.outputPath = path.join(options.outputDir, options.outputFileName);
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.options.outputDir, { recursive: true });
    } catch (error) {
      throw new CrawlSetupError(`Cannot create output directory ${this.options.outputDir}: ${LoggingUtils.describeError(error)}`, error);
    }
  }

  async record(url: string, content: ExtractedContent): Promise<boolean> {
    const record = AggregateFileSink.formatRecord(url, this.now(), this.toMarkdown(url, content));

    try {
      await fs.appendFile(this.outputPath, record, 'utf-8');
      this.logger.info(`Appended ${url} to ${this.outputPath}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to append ${url} to ${this.outputPath}: ${LoggingUtils.describeError(error)}`);
      return false;
    }
  }

  getOutputPath(): string {
    return this.outputPath;
  }

  /**
   * Render one artifact record
   */
  static formatRecord(url: string, crawledAt: Date, body: string): string {
    return [
      '',
      '---',
      `source: ${url}`,
      `crawled_at: ${format(crawledAt, TIMESTAMP_FORMAT)}`,
      '---',
      '',
      body,
      '',
      '---',
      ''
    ].join('\n');
  }

  private toMarkdown(url: string, content: ExtractedContent): string {
    try {
      return this.converter.convert(content.html);
    } catch (error) {
      this.logger.warn(`Markdown conversion failed for ${url}, storing plain text: ${LoggingUtils.describeError(error)}`);
      return content.text;
    }
  }
}
