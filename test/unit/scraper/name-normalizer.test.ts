import { describe, it, expect } from 'vitest';
import { canonicalAliasTargets, standardizeCountryName } from '@/scraper/name-normalizer.js';

describe('Name Normalizer', () => {
  it('should map known aliases to canonical names', () => {
    expect(standardizeCountryName('Uae')).toBe('United Arab Emirates');
    expect(standardizeCountryName('Usa')).toBe('United States');
    expect(standardizeCountryName('United States Of America')).toBe('United States');
    expect(standardizeCountryName('Uk')).toBe('United Kingdom');
    expect(standardizeCountryName('Drc')).toBe('Democratic Republic of the Congo');
    expect(standardizeCountryName('Congo')).toBe('Republic of the Congo');
    expect(standardizeCountryName("Cote D'ivoire")).toBe("Côte d'Ivoire");
    expect(standardizeCountryName('Swaziland')).toBe('Eswatini');
  });

  it('should pass unknown names through unchanged', () => {
    expect(standardizeCountryName('France')).toBe('France');
    expect(standardizeCountryName('Atlantis')).toBe('Atlantis');
  });

  it('should be case-sensitive on aliases', () => {
    expect(standardizeCountryName('UAE')).toBe('UAE');
  });

  it('should be idempotent', () => {
    for (const name of ['Uae', 'Drc', 'Burma', 'France', 'The Gambia']) {
      const once = standardizeCountryName(name);
      expect(standardizeCountryName(once)).toBe(once);
    }
  });

  it('should leave every canonical target unchanged', () => {
    const targets = canonicalAliasTargets();
    expect(targets.length).toBeGreaterThan(0);
    for (const name of targets) {
      expect(standardizeCountryName(name)).toBe(name);
    }
  });
});
