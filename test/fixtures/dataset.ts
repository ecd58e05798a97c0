import type { AdvisoryDatasetRow, AdvisoryLevel } from '@/types/advisory.js';
import { ADVISORY_LABELS } from '@/scraper/config/advisory-levels.js';

export function row(country: string, advisoryLevel: AdvisoryLevel, countryStandardized = country): AdvisoryDatasetRow {
  return {
    country,
    url: `https://www.example.gov/en/dfa/overseas-travel/advice/${country.toLowerCase().replace(/\s+/g, '-')}/`,
    advisoryLevel,
    countryStandardized,
    advisoryLabel: ADVISORY_LABELS[advisoryLevel],
  };
}

/** Levels [1, 1, 2, 3, 4] */
export const SAMPLE_ROWS: AdvisoryDatasetRow[] = [
  row('France', 1),
  row('Spain', 1),
  row("Cote D'ivoire", 2, "Côte d'Ivoire"),
  row('Drc', 3, 'Democratic Republic of the Congo'),
  row('Syria', 4),
];
