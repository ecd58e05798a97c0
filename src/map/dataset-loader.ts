/**
 * Reads the CSV written by the scrape stage back into dataset rows.
 */

import fs from 'fs';
import { z } from 'zod';
import { isAdvisoryLevel, type AdvisoryDatasetRow } from '@/types/advisory.js';
import { ADVISORY_LABELS } from '@/scraper/config/advisory-levels.js';
import { parseCSVRecords } from '@/utils/csv.js';
import { describeError } from '@/utils/errors.js';

const rowSchema = z.object({
  country: z.string().trim().min(1),
  url: z.string().trim(),
  // "3" and "3.0" are both accepted
  advisory_level: z.coerce
    .number()
    .int()
    .transform((n, ctx) => {
      if (!isAdvisoryLevel(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'advisory_level must be 1, 2, 3 or 4' });
        return z.NEVER;
      }
      return n;
    }),
  country_standardized: z.string().trim().min(1),
  advisory_label: z.string().trim().default(''),
});

/**
 * Parse dataset CSV text. Invalid rows are skipped with a warning.
 */
export function parseDataset(text: string): AdvisoryDatasetRow[] {
  const rows: AdvisoryDatasetRow[] = [];

  parseCSVRecords(text).forEach((record, i) => {
    const parsed = rowSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      console.warn(`[map] Skipping row ${i + 2}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
      return;
    }

    const { data } = parsed;
    rows.push(
      Object.freeze({
        country: data.country,
        url: data.url,
        advisoryLevel: data.advisory_level,
        countryStandardized: data.country_standardized,
        advisoryLabel: data.advisory_label || ADVISORY_LABELS[data.advisory_level],
      })
    );
  });

  return rows;
}

/**
 * @returns null when the file does not exist or cannot be read
 */
export function loadDataset(file: string): AdvisoryDatasetRow[] | null {
  if (!fs.existsSync(file)) return null;

  try {
    return parseDataset(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    console.error(`[map] Could not read ${file}: ${describeError(error)}`);
    return null;
  }
}
