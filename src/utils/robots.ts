/**
 * robots.txt utility - Check if URL is allowed by robots.txt
 *
 * Parsed robots.txt files are cached per origin for an hour, so a scrape run
 * fetches each one at most once.
 */

import axios from 'axios';
import robotsParser from 'robots-parser';
import { USER_AGENT } from '@/scraper/config/source.js';
import { describeError } from '@/utils/errors.js';

type RobotsParser = ReturnType<typeof robotsParser>;

interface CachedRobots {
  parser: RobotsParser;
  fetchedAt: number;
}

const robotsCache = new Map<string, CachedRobots>();
const CACHE_TTL = 60 * 60 * 1000; // 1 hour

/**
 * Fetch and parse robots.txt for an origin (e.g. "https://www.example.gov").
 * A missing or unreachable robots.txt yields a parser that allows everything.
 */
async function fetchRobotsTxt(origin: string): Promise<RobotsParser> {
  const now = Date.now();
  const cached = robotsCache.get(origin);
  if (cached && now - cached.fetchedAt < CACHE_TTL) {
    return cached.parser;
  }

  const robotsUrl = `${origin}/robots.txt`;
  let body = '';

  try {
    const response = await axios.get<string>(robotsUrl, {
      timeout: 5000,
      responseType: 'text',
      validateStatus: (status) => status === 200,
    });
    body = typeof response.data === 'string' ? response.data : '';
  } catch (error) {
    console.warn(`[robots.txt] Could not fetch ${robotsUrl}:`, describeError(error));
  }

  const parser = robotsParser(robotsUrl, body);
  robotsCache.set(origin, { parser, fetchedAt: now });
  return parser;
}

/**
 * Check if a URL is allowed by robots.txt
 *
 * @example
 * if (await isAllowedByRobots('https://www.example.gov/advice/')) {
 *   // fetch the page
 * }
 */
export async function isAllowedByRobots(url: string, userAgent: string = USER_AGENT): Promise<boolean> {
  let target: URL;
  try {
    target = new URL(url);
  } catch (error) {
    console.error(`[robots.txt] Invalid URL ${url}:`, describeError(error));
    return true;
  }

  const parser = await fetchRobotsTxt(target.origin);
  const allowed = parser.isAllowed(url, userAgent) ?? true;

  if (!allowed) {
    console.warn(`[robots.txt] Path ${target.pathname} is disallowed for ${target.hostname}`);
  }

  return allowed;
}

/**
 * Clear the robots.txt cache
 */
export function clearRobotsCache(): void {
  robotsCache.clear();
}
