import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import MockAdapter from 'axios-mock-adapter';
import axios from 'axios';
import {
  extractAdvisoryLevel,
  fetchAdvisoryLevel,
  levelFromText,
  normalizeMarkerText,
} from '@/scraper/advisory-extractor.js';
import { containerPage, countryUrl, headingPage } from '@test/fixtures/pages.js';

describe('Advisory Extractor', () => {
  describe('normalizeMarkerText', () => {
    it('should lower-case and read hyphens and underscores as spaces', () => {
      expect(normalizeMarkerText('  Avoid Non-Essential_Travel\n now ')).toBe('avoid non essential travel now');
    });
  });

  describe('levelFromText', () => {
    it('should return 4 for "do not travel" regardless of case', () => {
      expect(levelFromText('do not travel')).toBe(4);
      expect(levelFromText('Please DO NOT TRAVEL to this region')).toBe(4);
      expect(levelFromText('do-not-travel')).toBe(4);
    });

    it('should prefer the most severe marker when several match', () => {
      expect(levelFromText('high degree of caution, do not travel to the north')).toBe(4);
      expect(levelFromText('normal precautions except avoid unnecessary travel')).toBe(3);
    });

    it('should return null when no marker matches', () => {
      expect(levelFromText('Security status')).toBeNull();
      expect(levelFromText('')).toBeNull();
    });
  });

  describe('extractAdvisoryLevel', () => {
    it('should read the level from the container class list', () => {
      expect(extractAdvisoryLevel(containerPage('do-not-travel'))).toBe(4);
      expect(extractAdvisoryLevel(containerPage('avoid-non-essential-travel'))).toBe(3);
      expect(extractAdvisoryLevel(containerPage('avoid-unnecessary-travel'))).toBe(3);
      expect(extractAdvisoryLevel(containerPage('high-degree-of-caution'))).toBe(2);
      expect(extractAdvisoryLevel(containerPage('high-degree-caution'))).toBe(2);
      expect(extractAdvisoryLevel(containerPage('normal-precautions'))).toBe(1);
    });

    it('should match container classes regardless of case', () => {
      expect(extractAdvisoryLevel(containerPage('DO-NOT-TRAVEL'))).toBe(4);
    });

    it('should resolve a container with two markers to the most severe level', () => {
      expect(extractAdvisoryLevel(containerPage('high-degree-of-caution do-not-travel'))).toBe(4);
    });

    it('should handle the exact container markup of a do-not-travel page', () => {
      const html = '<div class="accordion_travel do-not-travel accordion is-open"></div>';
      expect(extractAdvisoryLevel(html)).toBe(4);
    });

    it('should fall back to the accordion heading when there is no container', () => {
      expect(extractAdvisoryLevel(headingPage('Avoid Non-Essential Travel'))).toBe(3);
      expect(extractAdvisoryLevel(headingPage('  Normal Precautions '))).toBe(1);
    });

    it('should fall back to the heading when the container has no marker', () => {
      const html = `
        <div class="accordion_travel accordion is-open"></div>
        <h3 class="accordion__title">High Degree of Caution</h3>
      `;
      expect(extractAdvisoryLevel(html)).toBe(2);
    });

    it('should return null when neither container nor heading carries a marker', () => {
      expect(extractAdvisoryLevel(containerPage('unknown-level'))).toBeNull();
      expect(extractAdvisoryLevel('<html><body><p>Do not travel</p></body></html>')).toBeNull();
    });
  });

  describe('fetchAdvisoryLevel', () => {
    let mock: MockAdapter;

    beforeEach(() => {
      mock = new MockAdapter(axios);
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      mock.restore();
      vi.restoreAllMocks();
    });

    it('should fetch the page and extract the level', async () => {
      mock.onGet(countryUrl('syria')).reply(200, containerPage('do-not-travel'));

      expect(await fetchAdvisoryLevel(countryUrl('syria'))).toBe(4);
    });

    it('should return null on network errors', async () => {
      mock.onGet(countryUrl('syria')).networkError();

      expect(await fetchAdvisoryLevel(countryUrl('syria'))).toBeNull();
      expect(console.error).toHaveBeenCalled();
    });

    it('should return null on HTTP errors', async () => {
      mock.onGet(countryUrl('syria')).reply(500);

      expect(await fetchAdvisoryLevel(countryUrl('syria'))).toBeNull();
    });

    it('should return null on timeouts', async () => {
      mock.onGet(countryUrl('syria')).timeout();

      expect(await fetchAdvisoryLevel(countryUrl('syria'), { timeoutMs: 50 })).toBeNull();
    });
  });
});
