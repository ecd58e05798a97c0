/**
 * Advisory level markers and labels
 *
 * Markers are matched against normalised text (lower-case, "-" and "_" read
 * as spaces), so the class `do-not-travel` and the heading "Do Not Travel"
 * hit the same entry. Entries are tried in order; the first match wins, which
 * puts the most severe level first.
 */

import type { AdvisoryLevel } from '@/types/advisory.js';

export interface LevelMarker {
  level: AdvisoryLevel;
  phrases: string[];
}

export const LEVEL_MARKERS: readonly LevelMarker[] = [
  { level: 4, phrases: ['do not travel'] },
  { level: 3, phrases: ['avoid non essential travel', 'avoid unnecessary travel'] },
  { level: 2, phrases: ['high degree of caution', 'high degree caution'] },
  { level: 1, phrases: ['normal precautions'] },
];

export const ADVISORY_LABELS: Readonly<Record<AdvisoryLevel, string>> = {
  1: 'Normal Precautions',
  2: 'High Degree of Caution',
  3: 'Avoid Unnecessary Travel',
  4: 'Do Not Travel',
};

/** Primary container, e.g. `<div class="accordion_travel do-not-travel accordion is-open">` */
export const CONTAINER_SELECTOR = 'div.accordion_travel';

/** Secondary heading used when the container carries no level marker */
export const HEADING_SELECTOR = 'h3.accordion__title';
