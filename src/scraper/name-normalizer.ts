/**
 * Country name normalizer
 *
 * Maps names derived from page slugs to the names the map's "country names"
 * location mode recognises. When a country stays blank on the map, add its
 * scraped name here.
 */

const COUNTRY_ALIASES: ReadonlyMap<string, string> = new Map([
  ['Usa', 'United States'],
  ['United States Of America', 'United States'],
  ['Uk', 'United Kingdom'],
  ['Uae', 'United Arab Emirates'],
  ['Democratic Republic Of The Congo', 'Democratic Republic of the Congo'],
  ['Drc', 'Democratic Republic of the Congo'],
  ['Congo', 'Republic of the Congo'],
  ['Republic Of The Congo', 'Republic of the Congo'],
  ['Dpr Korea', 'North Korea'],
  ['Republic Of Korea', 'South Korea'],
  ['Czech Republic', 'Czechia'],
  ["Cote D'ivoire", "Côte d'Ivoire"],
  ['Cote Divoire', "Côte d'Ivoire"],
  ['Ivory Coast', "Côte d'Ivoire"],
  ['Burma', 'Myanmar'],
  ['Cape Verde', 'Cabo Verde'],
  ['East Timor', 'Timor-Leste'],
  ['Timor Leste', 'Timor-Leste'],
  ['Laos', 'Lao PDR'],
  ['Macedonia', 'North Macedonia'],
  ['Swaziland', 'Eswatini'],
  ['The Bahamas', 'Bahamas'],
  ['The Gambia', 'Gambia'],
  ['Guinea Bissau', 'Guinea-Bissau'],
]);

export function standardizeCountryName(country: string): string {
  return COUNTRY_ALIASES.get(country) ?? country;
}

/** Canonical names the alias table produces */
export function canonicalAliasTargets(): string[] {
  return Array.from(new Set(COUNTRY_ALIASES.values()));
}
