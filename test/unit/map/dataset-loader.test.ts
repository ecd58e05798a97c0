import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadDataset, parseDataset } from '@/map/dataset-loader.js';

const HEADER = 'country,url,advisory_level,country_standardized,advisory_label';

describe('Dataset loader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should parse rows written by the scrape stage', () => {
    const csv = [
      HEADER,
      '"Uae","https://www.example.gov/uae/","4","United Arab Emirates","Do Not Travel"',
      '',
    ].join('\n');

    expect(parseDataset(csv)).toEqual([
      {
        country: 'Uae',
        url: 'https://www.example.gov/uae/',
        advisoryLevel: 4,
        countryStandardized: 'United Arab Emirates',
        advisoryLabel: 'Do Not Travel',
      },
    ]);
  });

  it('should accept float-like levels and fill in missing labels', () => {
    const csv = [HEADER, 'France,https://www.example.gov/france/,1.0,France,'].join('\n');

    const [row] = parseDataset(csv);

    expect(row.advisoryLevel).toBe(1);
    expect(row.advisoryLabel).toBe('Normal Precautions');
  });

  it('should skip rows with invalid levels or names', () => {
    const csv = [
      HEADER,
      'Atlantis,https://www.example.gov/atlantis/,5,Atlantis,Unknown',
      'Lemuria,https://www.example.gov/lemuria/,,Lemuria,',
      ',https://www.example.gov/blank/,2,Blank,High Degree of Caution',
      'Chad,https://www.example.gov/chad/,2.5,Chad,',
      'Peru,https://www.example.gov/peru/,2,Peru,High Degree of Caution',
    ].join('\r\n');

    expect(parseDataset(csv).map((r) => r.country)).toEqual(['Peru']);
    expect(console.warn).toHaveBeenCalledTimes(4);
  });

  it('should freeze loaded rows', () => {
    const [row] = parseDataset([HEADER, 'Peru,https://www.example.gov/peru/,2,Peru,x'].join('\n'));
    expect(Object.isFrozen(row)).toBe(true);
  });

  describe('loadDataset', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisory-csv-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should return null for a missing file', () => {
      expect(loadDataset(path.join(dir, 'missing.csv'))).toBeNull();
    });

    it('should load rows from disk', () => {
      const file = path.join(dir, 'advisories.csv');
      fs.writeFileSync(file, `${HEADER}\n"Peru","https://www.example.gov/peru/","2","Peru","High Degree of Caution"\n`);

      expect(loadDataset(file)?.map((r) => r.countryStandardized)).toEqual(['Peru']);
    });
  });
});
