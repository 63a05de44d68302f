/**
 * Interface for frontier management.
 * Implementations hold discovered-but-unprocessed URLs and the visited set.
 */
export interface IUrlFrontier {
  /**
   * Push discovered URLs. The first URL of the list is popped first.
   * @param urls URLs in the order the page listed them
   */
  pushAll(urls: string[]): void;

  /**
   * Get the next URL to process
   * @returns The next URL, or null if the frontier is empty
   */
  pop(): string | null;

  /**
   * Number of URLs waiting in the frontier
   */
  size(): number;

  /**
   * Add a URL to the visited set
   * @returns True if the URL was not visited before
   */
  markVisited(url: string): boolean;

  isVisited(url: string): boolean;

  visitedCount(): number;
}
