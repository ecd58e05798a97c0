/**
 * Source configuration for the advisory website
 *
 * The defaults point at the Irish Department of Foreign Affairs travel advice
 * index. Every value can be overridden from the command line.
 */

export interface SourceConfig {
  /** Advisory index page listing every country */
  indexUrl: string;

  /** Path segment every country advisory link contains */
  advicePathSegment: string;

  /** Minimum number of "/" characters in a country link */
  minSlashCount: number;

  /** Links containing any of these (case-insensitive) are not country pages */
  excludedKeywords: string[];

  /** Per-request socket timeout in milliseconds */
  timeoutMs: number;

  /** Pause after each country page request in milliseconds */
  delayMs: number;
}

export const USER_AGENT = 'travel-advisory-map/1.0';

export const HEADERS = {
  'User-Agent': `Mozilla/5.0 (compatible; ${USER_AGENT})`,
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-IE,en;q=0.9',
};

export const DEFAULT_SOURCE: SourceConfig = {
  indexUrl: 'https://www.ireland.ie/en/dfa/overseas-travel/advice/',
  advicePathSegment: '/advice/',
  minSlashCount: 5,
  excludedKeywords: ['covid', 'index', 'search', 'about'],
  timeoutMs: 10000,
  delayMs: 1000,
};

export const DEFAULT_CSV_FILE = 'output/travel_advisories.csv';
