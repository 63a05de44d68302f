/**
 * Helpers for robots.txt directives that robots-parser does not expose.
 */

interface AgentGroup {
  agents: string[];
  requestRate: string | null;
}

const RATE_PATTERN = /^(\d+)\s*\/\s*(\d+(?:\.\d+)?)\s*([smh])?/i;
const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600 };

export class RobotsTxtUtils {
  /**
   * Product token of a user agent, lower-cased: `DocCrawler/1.0` becomes `doccrawler`
   */
  static productToken(userAgent: string): string {
    return userAgent.split('/')[0].trim().toLowerCase();
  }

  /**
   * Split robots.txt into user-agent groups.
   * Consecutive User-agent lines share one group.
   */
  static parseGroups(content: string): AgentGroup[] {
    const groups: AgentGroup[] = [];
    let current: AgentGroup | null = null;
    let previousWasAgent = false;

    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.replace(/#.*$/, '').trim();
      const separator = line.indexOf(':');
      if (separator === -1) {
        continue;
      }

      const key = line.substring(0, separator).trim().toLowerCase();
      const value = line.substring(separator + 1).trim();

      if (key === 'user-agent') {
        if (!current || !previousWasAgent) {
          current = { agents: [], requestRate: null };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        previousWasAgent = true;
        continue;
      }

      previousWasAgent = false;
      if (key === 'request-rate' && current) {
        current.requestRate = value;
      }
    }

    return groups;
  }

  /**
   * Delay implied by a Request-rate value such as `1/5` or `2/1m`
   * @returns Milliseconds between requests, or null when the value is malformed
   */
  static requestRateToDelay(value: string): number | null {
    const match = RATE_PATTERN.exec(value.trim());
    if (!match) {
      return null;
    }

    const requests = Number(match[1]);
    const period = Number(match[2]) * UNIT_SECONDS[(match[3] ?? 's').toLowerCase()];
    if (requests <= 0 || period <= 0) {
      return null;
    }

    return (period / requests) * 1000;
  }

  /**
   * Request-rate delay for a user agent: its own group first, then `*`
   * @returns Milliseconds, or null when neither group declares a rate
   */
  static findRequestRateDelay(content: string, userAgent: string): number | null {
    const token = this.productToken(userAgent);
    const groups = this.parseGroups(content);

    const ownGroup = groups.find(group => group.agents.some(agent => agent === token));
    const wildcardGroup = groups.find(group => group.agents.includes('*'));

    for (const group of [ownGroup, wildcardGroup]) {
      if (group?.requestRate) {
        const delay = this.requestRateToDelay(group.requestRate);
        if (delay !== null) {
          return delay;
        }
      }
    }

    return null;
  }
}
