/**
 * Listing parser - discovers per-country advisory pages on the index page
 *
 * A link counts as a country page when its href contains the advice path
 * segment, has at least `minSlashCount` slashes and carries none of the
 * excluded keywords. The display name comes from the last path segment:
 * "united-arab-emirates" becomes "United Arab Emirates".
 */

import fs from 'fs';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { CountryLink } from '@/types/advisory.js';
import { DEFAULT_SOURCE, USER_AGENT, type SourceConfig } from '@/scraper/config/source.js';
import { fetchHTML } from '@/utils/http.js';
import { isAllowedByRobots } from '@/utils/robots.js';
import { describeError } from '@/utils/errors.js';

export type ListingRules = Pick<SourceConfig, 'advicePathSegment' | 'minSlashCount' | 'excludedKeywords'>;

export function isCountryHref(href: string, rules: ListingRules = DEFAULT_SOURCE): boolean {
  const at = href.indexOf(rules.advicePathSegment);
  if (at === -1) return false;
  if (href.split('/').length - 1 < rules.minSlashCount) return false;

  // The index page links back to itself; a country page has a slug after the segment
  const rest = href.slice(at + rules.advicePathSegment.length).split(/[?#]/)[0];
  if (!rest.replace(/\//g, '')) return false;

  const lower = href.toLowerCase();
  return !rules.excludedKeywords.some((keyword) => lower.includes(keyword));
}

/**
 * "cote-d'ivoire" -> "Cote D'ivoire"
 */
export function countryNameFromSlug(slug: string): string {
  return slug
    .replace(/-/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function lastPathSegment(href: string): string {
  const path = href.split(/[?#]/)[0].replace(/\/+$/, '');
  const segments = path.split('/');
  return segments[segments.length - 1] ?? '';
}

function absoluteUrl(href: string, indexUrl: string): string | null {
  try {
    return new URL(href, indexUrl).href;
  } catch {
    return null;
  }
}

/**
 * Extract unique country links from the index page HTML.
 * Order of first appearance is kept; duplicates share both name and URL.
 */
export function parseCountryLinks(
  html: string,
  indexUrl: string,
  rules: ListingRules = DEFAULT_SOURCE
): CountryLink[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const links: CountryLink[] = [];

  $('a[href]').each((_, a) => {
    const href = $(a).attr('href')?.trim();
    if (!href || !isCountryHref(href, rules)) return;

    const slug = lastPathSegment(href);
    if (!slug) return;

    const url = absoluteUrl(href, indexUrl);
    if (!url) return;

    const link: CountryLink = { country: countryNameFromSlug(slug), url };

    const key = `${link.country}|${link.url}`;
    if (seen.has(key)) return;
    seen.add(key);
    links.push(link);
  });

  return links;
}

/**
 * Browser-console snippet for collecting the links by hand when the index
 * page cannot be scraped. Its output is the file `--links` accepts.
 */
export function manualFallbackSnippet(rules: ListingRules = DEFAULT_SOURCE): string {
  return `
const countries = [];
document.querySelectorAll('a[href*="${rules.advicePathSegment}"]').forEach((link) => {
  const href = link.getAttribute('href');
  if (href && href.split('/').length - 1 >= ${rules.minSlashCount}) {
    const slug = href.split('/').filter(Boolean).pop();
    if (!${JSON.stringify(rules.excludedKeywords)}.some((k) => href.toLowerCase().includes(k))) {
      countries.push({
        country: slug.replace(/-/g, ' '),
        url: new URL(href, location.href).href,
      });
    }
  }
});
console.log(JSON.stringify(countries, null, 2));`;
}

export function printManualFallback(indexUrl: string, rules: ListingRules = DEFAULT_SOURCE): void {
  console.error('[listing] The website may be blocking automated requests.');
  console.error('[listing] Manual fallback:');
  console.error(`  1. Open ${indexUrl} in a browser`);
  console.error('  2. Open the developer console (F12) and run:');
  console.error(manualFallbackSnippet(rules));
  console.error('  3. Save the printed JSON as countries.json');
  console.error('  4. Re-run the scraper with --links countries.json');
}

/**
 * Fetch the index page and return every country link on it.
 * Any failure returns [] after printing the manual fallback procedure.
 */
export async function discoverCountryLinks(
  indexUrl: string = DEFAULT_SOURCE.indexUrl,
  config: SourceConfig = DEFAULT_SOURCE
): Promise<CountryLink[]> {
  if (absoluteUrl(indexUrl, indexUrl) === null) {
    console.error(`[listing] ${indexUrl} is not an absolute URL`);
    printManualFallback(indexUrl, config);
    return [];
  }

  const allowed = await isAllowedByRobots(indexUrl, USER_AGENT);
  if (!allowed) {
    console.error(`[listing] ${indexUrl} is blocked by robots.txt`);
    printManualFallback(indexUrl, config);
    return [];
  }

  const html = await fetchHTML(indexUrl, config);
  if (html === null) {
    printManualFallback(indexUrl, config);
    return [];
  }

  try {
    return parseCountryLinks(html, indexUrl, config);
  } catch (error) {
    console.error('[listing] Failed to parse index page:', describeError(error));
    printManualFallback(indexUrl, config);
    return [];
  }
}

const countryLinkSchema = z.object({
  country: z.string().trim().min(1),
  url: z.string().url(),
});

/**
 * Load links collected with the manual fallback snippet.
 * Names are re-title-cased so they match the names a scrape would produce.
 */
export function loadCountryLinks(file: string): CountryLink[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    console.error(`[listing] Could not read ${file}:`, describeError(error));
    return [];
  }

  if (!Array.isArray(raw)) {
    console.error(`[listing] ${file} must contain a JSON array of { country, url } objects`);
    return [];
  }

  const seen = new Set<string>();
  const links: CountryLink[] = [];

  raw.forEach((entry: unknown, i) => {
    const parsed = countryLinkSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(`[listing] Skipping entry ${i} in ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }

    const link = { country: countryNameFromSlug(parsed.data.country), url: parsed.data.url };
    const key = `${link.country}|${link.url}`;
    if (seen.has(key)) return;
    seen.add(key);
    links.push(link);
  });

  return links;
}
