import { describe, it, expect } from 'vitest';
import dayjs from 'dayjs';
import { buildChoroplethFigure, traceColor } from '@/map/figure.js';
import { legendName } from '@/map/config/scale.js';
import { SAMPLE_ROWS, row } from '@test/fixtures/dataset.js';

describe('Map Renderer', () => {
  describe('legendName', () => {
    it('should relabel integer-like codes', () => {
      expect(legendName('1')).toBe('Level 1: Normal Precautions');
      expect(legendName(4)).toBe('Level 4: Do Not Travel');
    });

    it('should relabel float-like codes', () => {
      expect(legendName('2.0')).toBe('Level 2: High Degree of Caution');
      expect(legendName('3.0')).toBe('Level 3: Avoid Unnecessary Travel');
    });

    it('should pass unknown codes through', () => {
      expect(legendName('5')).toBe('5');
    });
  });

  describe('buildChoroplethFigure', () => {
    it('should render levels [1,1,2,3,4] as four colours with descriptive legend names', () => {
      const figure = buildChoroplethFigure(SAMPLE_ROWS);

      expect(figure.data.map(traceColor)).toEqual(['green', 'yellow', 'orange', 'red']);
      expect(figure.data.map((t) => t.name)).toEqual([
        'Level 1: Normal Precautions',
        'Level 2: High Degree of Caution',
        'Level 3: Avoid Unnecessary Travel',
        'Level 4: Do Not Travel',
      ]);
    });

    it('should key traces by canonical name and hover on display name and label', () => {
      const [normal, caution] = buildChoroplethFigure(SAMPLE_ROWS).data;

      expect(normal.locationmode).toBe('country names');
      expect(normal.locations).toEqual(['France', 'Spain']);
      expect(normal.z).toEqual([1, 1]);
      expect(caution.locations).toEqual(["Côte d'Ivoire"]);
      expect(caution.hovertext).toEqual(["Cote D'ivoire"]);
      expect(caution.customdata).toEqual(['High Degree of Caution']);
      expect(caution.colorscale).toEqual([
        [0, 'yellow'],
        [1, 'yellow'],
      ]);
    });

    it('should only create traces for levels present in the data', () => {
      const figure = buildChoroplethFigure([row('Syria', 4), row('France', 1)]);

      expect(figure.data.map((t) => t.legendgroup)).toEqual(['1', '4']);
    });

    it('should produce no traces for an empty dataset', () => {
      expect(buildChoroplethFigure([]).data).toEqual([]);
    });

    it('should configure the geo view and legend', () => {
      const { layout } = buildChoroplethFigure(SAMPLE_ROWS);

      expect(layout.title.text).toBe('Irish Department of Foreign Affairs Travel Advisory Levels');
      expect(layout.height).toBe(600);
      expect(layout.geo).toEqual({
        showframe: false,
        showcoastlines: true,
        projection: { type: 'equirectangular' },
      });
      expect(layout.legend.title.text).toBe('Advisory Level');
      expect(layout.legend.x).toBe(1.02);
    });

    it('should add the collection date under a custom title', () => {
      const { layout } = buildChoroplethFigure(SAMPLE_ROWS, {
        title: 'Advisories',
        collectedAt: dayjs('2026-10-18'),
      });

      expect(layout.title.text).toBe('Advisories<br><sup>Data collected 18 October 2026</sup>');
    });
  });
});
