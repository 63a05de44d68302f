import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * In-memory LIFO frontier.
 * Popping from a stack gives the same visiting order as recursive descent
 * over each page's links, without growing the call stack.
 */
export class InMemoryUrlFrontier implements IUrlFrontier {
  private stack: string[] = [];
  private visited: Set<string> = new Set();
  private readonly logger = LoggingUtils.createTaggedLogger('frontier');

  /**
   * Push URLs so that the first one is popped next
   * @param urls URLs in page order
   */
  pushAll(urls: string[]): void {
    for (let i = urls.length - 1; i >= 0; i--) {
      this.stack.push(urls[i]);
    }
    if (urls.length > 0) {
      this.logger.debug(`Pushed ${urls.length} URLs, frontier size ${this.stack.length}`);
    }
  }

  pop(): string | null {
    return this.stack.pop() ?? null;
  }

  size(): number {
    return this.stack.length;
  }

  /**
   * Check-and-insert in one step
   * @returns True if the URL had not been visited
   */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }
    this.visited.add(url);
    return true;
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  visitedCount(): number {
    return this.visited.size;
  }
}
