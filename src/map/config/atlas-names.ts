/**
 * Canonical country names whose world-atlas (Natural Earth 1:110m) shape
 * carries a different name. Used only by the static image renderer.
 */
export const ATLAS_NAMES: Readonly<Record<string, string>> = {
  'United States': 'United States of America',
  'Democratic Republic of the Congo': 'Dem. Rep. Congo',
  'Republic of the Congo': 'Congo',
  'Central African Republic': 'Central African Rep.',
  'South Sudan': 'S. Sudan',
  'Bosnia and Herzegovina': 'Bosnia and Herz.',
  'Dominican Republic': 'Dominican Rep.',
  'Equatorial Guinea': 'Eq. Guinea',
  'Solomon Islands': 'Solomon Is.',
  'Western Sahara': 'W. Sahara',
  'Eswatini': 'eSwatini',
  'Lao PDR': 'Laos',
  'North Macedonia': 'Macedonia',
};
