/**
 * Advisory extractor - reads the advisory level from a country page
 *
 * The level is taken from the class list of the advisory container, e.g.
 * `<div class="accordion_travel do-not-travel accordion is-open">`. When the
 * container is missing or carries no marker, the accordion heading text is
 * tried instead.
 */

import * as cheerio from 'cheerio';
import type { AdvisoryLevel } from '@/types/advisory.js';
import {
  CONTAINER_SELECTOR,
  HEADING_SELECTOR,
  LEVEL_MARKERS,
  type LevelMarker,
} from '@/scraper/config/advisory-levels.js';
import { DEFAULT_SOURCE } from '@/scraper/config/source.js';
import { fetchHTML, type FetchOptions } from '@/utils/http.js';
import { describeError } from '@/utils/errors.js';

/**
 * "Avoid Non-Essential_Travel" -> "avoid non essential travel"
 */
export function normalizeMarkerText(text: string): string {
  return text.toLowerCase().replace(/[-_]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Match text against the ordered marker table. The first entry with a
 * matching phrase wins, so the most severe level takes precedence.
 */
export function levelFromText(
  text: string,
  markers: readonly LevelMarker[] = LEVEL_MARKERS
): AdvisoryLevel | null {
  const normalized = normalizeMarkerText(text);
  for (const marker of markers) {
    if (marker.phrases.some((phrase) => normalized.includes(phrase))) {
      return marker.level;
    }
  }
  return null;
}

export function extractAdvisoryLevel(html: string): AdvisoryLevel | null {
  const $ = cheerio.load(html);

  const container = $(CONTAINER_SELECTOR).first();
  if (container.length > 0) {
    const level = levelFromText(container.attr('class') ?? '');
    if (level !== null) return level;
  }

  const heading = $(HEADING_SELECTOR).first();
  if (heading.length > 0) {
    return levelFromText(heading.text());
  }

  return null;
}

/**
 * Fetch a country page and extract its level.
 * Network and parse failures are logged and yield null.
 */
export async function fetchAdvisoryLevel(
  url: string,
  options: FetchOptions = DEFAULT_SOURCE
): Promise<AdvisoryLevel | null> {
  const html = await fetchHTML(url, options);
  if (html === null) return null;

  try {
    return extractAdvisoryLevel(html);
  } catch (error) {
    console.error(`[advisory] Failed to parse ${url}:`, describeError(error));
    return null;
  }
}
