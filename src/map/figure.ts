/**
 * Choropleth figure builder
 *
 * Produces a figure in plotly.js's JSON schema: one choropleth trace per
 * advisory level, each filled with a single colour, so the legend shows one
 * entry per level instead of a continuous colour bar.
 */

import type { Dayjs } from 'dayjs';
import { ADVISORY_LEVELS, type AdvisoryDatasetRow, type AdvisoryLevel } from '@/types/advisory.js';
import { DEFAULT_TITLE, LEGEND_TITLE, LEVEL_COLORS, legendName } from '@/map/config/scale.js';

export interface ChoroplethTrace {
  type: 'choropleth';
  name: string;
  legendgroup: string;
  locationmode: 'country names';
  locations: string[];
  z: number[];
  hovertext: string[];
  customdata: string[];
  hovertemplate: string;
  colorscale: [number, string][];
  showscale: false;
  showlegend: true;
  marker: { line: { color: string; width: number } };
}

export interface ChoroplethLayout {
  title: { text: string };
  height: number;
  geo: {
    showframe: boolean;
    showcoastlines: boolean;
    projection: { type: 'equirectangular' };
  };
  legend: {
    title: { text: string };
    orientation: 'v';
    yanchor: 'middle';
    y: number;
    xanchor: 'left';
    x: number;
  };
}

export interface ChoroplethFigure {
  data: ChoroplethTrace[];
  layout: ChoroplethLayout;
}

export interface FigureOptions {
  title?: string;
  /** When the data was scraped; shown under the title */
  collectedAt?: Dayjs;
}

function levelTrace(level: AdvisoryLevel, rows: AdvisoryDatasetRow[]): ChoroplethTrace {
  const color = LEVEL_COLORS[level];
  return {
    type: 'choropleth',
    name: legendName(level),
    legendgroup: String(level),
    locationmode: 'country names',
    locations: rows.map((r) => r.countryStandardized),
    z: rows.map(() => 1),
    hovertext: rows.map((r) => r.country),
    customdata: rows.map((r) => r.advisoryLabel),
    hovertemplate: '<b>%{hovertext}</b><br>%{customdata}<extra></extra>',
    colorscale: [
      [0, color],
      [1, color],
    ],
    showscale: false,
    showlegend: true,
    marker: { line: { color: 'white', width: 0.5 } },
  };
}

export function buildChoroplethFigure(
  rows: readonly AdvisoryDatasetRow[],
  options: FigureOptions = {}
): ChoroplethFigure {
  const traces = ADVISORY_LEVELS.map((level) => {
    const matching = rows.filter((r) => r.advisoryLevel === level);
    return matching.length > 0 ? levelTrace(level, matching) : null;
  }).filter((trace): trace is ChoroplethTrace => trace !== null);

  const title = options.title ?? DEFAULT_TITLE;
  const subtitle = options.collectedAt
    ? `<br><sup>Data collected ${options.collectedAt.format('D MMMM YYYY')}</sup>`
    : '';

  return {
    data: traces,
    layout: {
      title: { text: title + subtitle },
      height: 600,
      geo: {
        showframe: false,
        showcoastlines: true,
        projection: { type: 'equirectangular' },
      },
      legend: {
        title: { text: LEGEND_TITLE },
        orientation: 'v',
        yanchor: 'middle',
        y: 0.5,
        xanchor: 'left',
        x: 1.02,
      },
    },
  };
}

/** Fill colour of a trace (its single-colour scale) */
export function traceColor(trace: ChoroplethTrace): string {
  return trace.colorscale[0]?.[1] ?? '';
}
