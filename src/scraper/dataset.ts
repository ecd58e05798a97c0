/**
 * Dataset assembly: joins scraped levels with normalised names, drops
 * unclassified countries and attaches the human-readable labels.
 */

import {
  ADVISORY_LEVELS,
  type AdvisoryDatasetRow,
  type AdvisoryLevel,
  type AdvisoryRecord,
  type CountryLink,
} from '@/types/advisory.js';
import { ADVISORY_LABELS } from '@/scraper/config/advisory-levels.js';
import { standardizeCountryName } from '@/scraper/name-normalizer.js';
import { toCSV } from '@/utils/csv.js';

export const CSV_COLUMNS = [
  'country',
  'url',
  'advisory_level',
  'country_standardized',
  'advisory_label',
] as const;

export function toAdvisoryRecord(link: CountryLink, level: AdvisoryLevel | null): AdvisoryRecord {
  return {
    country: link.country,
    url: link.url,
    advisoryLevel: level,
    countryStandardized: standardizeCountryName(link.country),
  };
}

export function assembleDataset(records: readonly AdvisoryRecord[]): AdvisoryDatasetRow[] {
  const rows: AdvisoryDatasetRow[] = [];
  for (const record of records) {
    if (record.advisoryLevel === null) continue;
    rows.push(
      Object.freeze({
        country: record.country,
        url: record.url,
        advisoryLevel: record.advisoryLevel,
        countryStandardized: record.countryStandardized,
        advisoryLabel: ADVISORY_LABELS[record.advisoryLevel],
      })
    );
  }
  return rows;
}

export function levelDistribution(rows: readonly AdvisoryDatasetRow[]): Record<AdvisoryLevel, number> {
  const counts: Record<AdvisoryLevel, number> = { 1: 0, 2: 0, 3: 0, 4: 0 };
  for (const row of rows) {
    counts[row.advisoryLevel]++;
  }
  return counts;
}

export function formatDistribution(rows: readonly AdvisoryDatasetRow[]): string {
  const counts = levelDistribution(rows);
  return ADVISORY_LEVELS.map(
    (level) => `  Level ${level} (${ADVISORY_LABELS[level]}): ${counts[level]}`
  ).join('\n');
}

export function datasetToCSV(rows: readonly AdvisoryDatasetRow[]): string {
  return toCSV(
    CSV_COLUMNS,
    rows.map((r) => [r.country, r.url, r.advisoryLevel, r.countryStandardized, r.advisoryLabel])
  );
}
