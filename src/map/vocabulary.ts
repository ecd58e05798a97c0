/**
 * Location vocabulary of the map's "country names" mode. A dataset name
 * outside it still gets plotted, but the country stays blank.
 */

import type { AdvisoryDatasetRow } from '@/types/advisory.js';
import countryNames from './data/country-names.json' with { type: 'json' };

const vocabulary: ReadonlySet<string> = new Set(countryNames.map((name) => name.toLowerCase()));

export function isKnownCountryName(name: string): boolean {
  return vocabulary.has(name.toLowerCase());
}

/** Standardised names in the dataset the map will not recognise */
export function unrecognizedCountries(rows: readonly AdvisoryDatasetRow[]): string[] {
  return Array.from(
    new Set(rows.map((r) => r.countryStandardized).filter((name) => !isKnownCountryName(name)))
  );
}
