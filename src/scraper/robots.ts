/**
 * robots.txt policy
 *
 * Rules are fetched once per origin and cached for the life of the process.
 * Group selection: the first group naming our user agent, else the `*` group.
 * Within a group the longest matching rule wins; Allow wins a tie.
 * A missing robots.txt (4xx) allows everything, and so does one that cannot
 * be fetched, with a warning.
 */

import { logger } from '../utils/logger.js';
import type { RobotsPolicy } from './types.js';

export interface RobotsRules {
  allow: string[];
  disallow: string[];
  /** Seconds */
  crawlDelay: number | null;
}

interface RobotsGroup extends RobotsRules {
  agents: string[];
}

export interface RobotsTxtPolicyOptions {
  userAgent: string;
  timeoutMs: number;
}

const EMPTY_RULES: RobotsRules = { allow: [], disallow: [], crawlDelay: null };

function emptyGroup(): RobotsGroup {
  return { agents: [], allow: [], disallow: [], crawlDelay: null };
}

/**
 * Parse robots.txt and keep the group that applies to `userAgent`
 */
export function parseRobotsTxt(text: string, userAgent: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let previousWasAgent = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    if (directive === 'user-agent') {
      if (!current || !previousWasAgent) {
        current = emptyGroup();
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      previousWasAgent = true;
      continue;
    }

    previousWasAgent = false;
    if (!current) continue;

    if (directive === 'disallow' && value) {
      current.disallow.push(value);
    } else if (directive === 'allow' && value) {
      current.allow.push(value);
    } else if (directive === 'crawl-delay') {
      const delay = parseFloat(value);
      if (!Number.isNaN(delay) && delay > 0) {
        current.crawlDelay = delay;
      }
    }
  }

  const agent = userAgent.toLowerCase();
  const group =
    groups.find((candidate) =>
      candidate.agents.some((name) => name !== '*' && agent.includes(name))
    ) ?? groups.find((candidate) => candidate.agents.includes('*'));

  if (!group) {
    return { ...EMPTY_RULES };
  }

  return { allow: group.allow, disallow: group.disallow, crawlDelay: group.crawlDelay };
}

/**
 * Length of the rule if it matches the path, else -1.
 * Supports `*` wildcards and a trailing `$` anchor.
 */
function matchLength(rule: string, path: string): number {
  const anchored = rule.endsWith('$');
  const body = anchored ? rule.slice(0, -1) : rule;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  const pattern = new RegExp(`^${source}${anchored ? '$' : ''}`);
  return pattern.test(path) ? rule.length : -1;
}

export function isPathAllowed(rules: RobotsRules, path: string): boolean {
  const longest = (patterns: string[]) =>
    patterns.reduce((best, rule) => Math.max(best, matchLength(rule, path)), -1);

  const disallowed = longest(rules.disallow);
  if (disallowed < 0) {
    return true;
  }
  return longest(rules.allow) >= disallowed;
}

export class RobotsTxtPolicy implements RobotsPolicy {
  private readonly cache = new Map<string, Promise<RobotsRules>>();

  constructor(private readonly options: RobotsTxtPolicyOptions) {}

  async isAllowed(url: string): Promise<boolean> {
    const parsed = new URL(url);
    const rules = await this.rulesFor(parsed.origin);
    return isPathAllowed(rules, parsed.pathname + parsed.search);
  }

  async getCrawlDelay(origin: string): Promise<number | null> {
    const rules = await this.rulesFor(origin);
    return rules.crawlDelay;
  }

  private rulesFor(origin: string): Promise<RobotsRules> {
    let rules = this.cache.get(origin);
    if (!rules) {
      rules = this.load(origin);
      this.cache.set(origin, rules);
    }
    return rules;
  }

  private async load(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(robotsUrl, {
        headers: { 'User-Agent': this.options.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.ok) {
        const rules = parseRobotsTxt(await response.text(), this.options.userAgent);
        logger.debug(
          { origin, disallow: rules.disallow.length, crawlDelay: rules.crawlDelay },
          'Loaded robots.txt'
        );
        return rules;
      }

      if (response.status >= 500) {
        logger.warn({ origin, statusCode: response.status }, 'robots.txt unavailable, allowing all');
      }
      return { ...EMPTY_RULES };
    } catch (error) {
      logger.warn({ origin, error }, 'Failed to fetch robots.txt, allowing all');
      return { ...EMPTY_RULES };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
