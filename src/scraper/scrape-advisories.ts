/**
 * Scrape travel advisory levels for every country on the advisory index
 * Output: CSV (country, url, advisory_level, country_standardized, advisory_label)
 *
 * Country pages are fetched one at a time with a fixed pause between them.
 */

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import dayjs from 'dayjs';
import { program } from 'commander';
import type { AdvisoryRecord, CountryLink } from '@/types/advisory.js';
import { DEFAULT_CSV_FILE, DEFAULT_SOURCE, type SourceConfig } from '@/scraper/config/source.js';
import { discoverCountryLinks, loadCountryLinks } from '@/scraper/listing-parser.js';
import { fetchAdvisoryLevel } from '@/scraper/advisory-extractor.js';
import { assembleDataset, datasetToCSV, formatDistribution, toAdvisoryRecord } from '@/scraper/dataset.js';
import { describeError } from '@/utils/errors.js';
import delay from '@/utils/delay.js';

export interface ScrapeOptions {
  indexUrl: string;
  csv: string;
  delayMs: number;
  /** JSON file of links collected by hand; skips the index page */
  links?: string;
  timeoutMs?: number;
}

export interface ScrapeResult {
  status: 'ok' | 'aborted';
  discovered: number;
  classified: number;
  csv: string | null;
}

interface CliOptions {
  indexUrl: string;
  csv: string;
  delay: string;
  links?: string;
}

function writeCSV(file: string, contents: string): boolean {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents, 'utf8');
    return true;
  } catch (error) {
    console.error(`[scrape] Failed to write ${file}:`, describeError(error));
    return false;
  }
}

export async function runScrape(options: ScrapeOptions): Promise<ScrapeResult> {
  const config: SourceConfig = {
    ...DEFAULT_SOURCE,
    indexUrl: options.indexUrl,
    delayMs: options.delayMs,
    timeoutMs: options.timeoutMs ?? DEFAULT_SOURCE.timeoutMs,
  };
  const startedAt = dayjs();

  let links: CountryLink[];
  if (options.links) {
    console.error(`[scrape] Loading country links from ${options.links} …`);
    links = loadCountryLinks(options.links);
  } else {
    console.error(`[scrape] Fetching country list from ${config.indexUrl} …`);
    links = await discoverCountryLinks(config.indexUrl, config);
  }

  if (links.length === 0) {
    console.error('[scrape] No country pages found, aborting.');
    return { status: 'aborted', discovered: 0, classified: 0, csv: null };
  }

  console.error(`[scrape] Found ${links.length} countries`);

  const records: AdvisoryRecord[] = [];
  for (const [i, link] of links.entries()) {
    const level = await fetchAdvisoryLevel(link.url, config);
    console.error(
      `[scrape] ${i + 1}/${links.length}: ${link.country} … ${level === null ? 'unable to determine' : `Level ${level}`}`
    );
    records.push(toAdvisoryRecord(link, level));
    await delay(config.delayMs);
  }

  const rows = assembleDataset(records);
  const written = writeCSV(options.csv, datasetToCSV(rows));

  console.error(`[scrape] Classified ${rows.length} of ${links.length} countries in ${dayjs().diff(startedAt, 'second')}s`);
  console.error('[scrape] Advisory level distribution:');
  console.error(formatDistribution(rows));
  if (written) {
    console.error(`[scrape] Data saved to ${options.csv}; run the map stage next.`);
  }

  return {
    status: written ? 'ok' : 'aborted',
    discovered: links.length,
    classified: rows.length,
    csv: written ? options.csv : null,
  };
}

// Main execution - only run if this file is executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program
    .option('--index-url <url>', 'advisory index page', DEFAULT_SOURCE.indexUrl)
    .option('--csv <file>', 'CSV output file', DEFAULT_CSV_FILE)
    .option('--delay <ms>', 'pause between country requests in milliseconds', String(DEFAULT_SOURCE.delayMs))
    .option('--links <file>', 'JSON file of { country, url } links collected by hand')
    .parse(process.argv);

  const opt = program.opts<CliOptions>();
  const delayMs = Number.parseInt(opt.delay, 10);

  runScrape({
    indexUrl: opt.indexUrl,
    csv: opt.csv,
    delayMs: Number.isNaN(delayMs) ? DEFAULT_SOURCE.delayMs : delayMs,
    links: opt.links,
  })
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
      if (result.status !== 'ok') process.exitCode = 1;
    })
    .catch((error: unknown) => {
      console.error('[scrape] Unexpected failure:', describeError(error));
      process.exitCode = 1;
    });
}
