/**
 * Shared types for the advisory pipeline: discovered links, scraped records
 * and the assembled dataset written to CSV.
 */

/** Government-issued travel risk rating, 1 = lowest risk */
export type AdvisoryLevel = 1 | 2 | 3 | 4;

export const ADVISORY_LEVELS: readonly AdvisoryLevel[] = [1, 2, 3, 4];

export interface CountryLink {
  /** Display name derived from the page slug (e.g. "United States Of America") */
  country: string;

  /** Absolute URL of the country's advisory page */
  url: string;
}

export interface AdvisoryRecord extends CountryLink {
  /** null when the level could not be extracted */
  advisoryLevel: AdvisoryLevel | null;

  /** Name from the map's location vocabulary */
  countryStandardized: string;
}

export interface AdvisoryDatasetRow extends CountryLink {
  advisoryLevel: AdvisoryLevel;
  countryStandardized: string;
  advisoryLabel: string;
}

export function isAdvisoryLevel(value: number): value is AdvisoryLevel {
  return value === 1 || value === 2 || value === 3 || value === 4;
}
