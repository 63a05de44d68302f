import { ExtractedContent } from './types';

/**
 * Interface for persisting extracted pages.
 */
export interface IContentSink {
  /**
   * Prepare the destination (create the output directory)
   * @throws CrawlSetupError when the destination cannot be created
   */
  initialize(): Promise<void>;

  /**
   * Record the content of one page. Never rejects.
   * @returns False when the write failed
   */
  record(url: string, content: ExtractedContent): Promise<boolean>;

  /**
   * Path of the artifact, or of the directory holding per-page files
   */
  getOutputPath(): string;
}
