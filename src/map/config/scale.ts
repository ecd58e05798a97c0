/**
 * Fixed ordinal colour scale and legend names for the advisory map
 */

import type { AdvisoryLevel } from '@/types/advisory.js';

export const LEVEL_COLORS: Readonly<Record<AdvisoryLevel, string>> = {
  1: 'green',
  2: 'yellow',
  3: 'orange',
  4: 'red',
};

/** Fill for countries without data */
export const NO_DATA_COLOR = '#e5e5e5';

/**
 * Legend names keyed by level code. Codes read back from CSV may be
 * float-like ("2.0"), so both spellings are listed.
 */
const LEGEND_NAMES: Readonly<Record<string, string>> = {
  '1': 'Level 1: Normal Precautions',
  '2': 'Level 2: High Degree of Caution',
  '3': 'Level 3: Avoid Unnecessary Travel',
  '4': 'Level 4: Do Not Travel',
  '1.0': 'Level 1: Normal Precautions',
  '2.0': 'Level 2: High Degree of Caution',
  '3.0': 'Level 3: Avoid Unnecessary Travel',
  '4.0': 'Level 4: Do Not Travel',
};

/** Unknown codes are returned unchanged */
export function legendName(code: string | number): string {
  const key = String(code).trim();
  return LEGEND_NAMES[key] ?? key;
}

export const DEFAULT_TITLE = 'Irish Department of Foreign Affairs Travel Advisory Levels';
export const LEGEND_TITLE = 'Advisory Level';
