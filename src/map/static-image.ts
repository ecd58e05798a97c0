/**
 * Static map export
 *
 * The figure is drawn to SVG with d3-geo over world-atlas shapes, then
 * rasterised to PNG with sharp. sharp is an optional dependency: when it is
 * missing or fails, the PNG is skipped with a warning.
 */

import fs from 'fs';
import path from 'path';
import { geoEquirectangular, geoPath } from 'd3-geo';
import type { ChoroplethFigure } from '@/map/figure.js';
import { traceColor } from '@/map/figure.js';
import { ATLAS_NAMES } from '@/map/config/atlas-names.js';
import { NO_DATA_COLOR } from '@/map/config/scale.js';
import { loadWorldFeatures, type CountryFeatures } from '@/map/world.js';
import { describeError } from '@/utils/errors.js';

export interface ImageSize {
  width: number;
  height: number;
  /** Pixel density multiplier applied when rasterising */
  scale: number;
}

export const DEFAULT_IMAGE_SIZE: ImageSize = { width: 1920, height: 1080, scale: 2 };

const TITLE_HEIGHT = 90;
const LEGEND_WIDTH = 380;
const MARGIN = 20;

const atlasNames = new Map(
  Object.entries(ATLAS_NAMES).map(([canonical, atlas]) => [canonical.toLowerCase(), atlas.toLowerCase()])
);

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, '').trim();
}

/**
 * Lower-cased shape name -> fill colour for every location in the figure.
 */
export function fillsByShapeName(figure: ChoroplethFigure): Map<string, string> {
  const fills = new Map<string, string>();
  for (const trace of figure.data) {
    const color = traceColor(trace);
    for (const location of trace.locations) {
      const key = location.toLowerCase();
      fills.set(atlasNames.get(key) ?? key, color);
    }
  }
  return fills;
}

export function renderStaticSvg(
  figure: ChoroplethFigure,
  features: CountryFeatures,
  size: Pick<ImageSize, 'width' | 'height'> = DEFAULT_IMAGE_SIZE
): string {
  const { width, height } = size;
  const projection = geoEquirectangular().fitExtent(
    [
      [MARGIN, TITLE_HEIGHT],
      [width - LEGEND_WIDTH, height - MARGIN],
    ],
    features
  );
  const pathFor = geoPath(projection);
  const fills = fillsByShapeName(figure);

  const shapes: string[] = [];
  for (const feature of features.features) {
    const d = pathFor(feature);
    if (!d) continue;
    const name = feature.properties?.name ?? '';
    const fill = fills.get(name.toLowerCase()) ?? NO_DATA_COLOR;
    shapes.push(
      `<path data-country="${escapeXml(name)}" fill="${fill}" stroke="white" stroke-width="0.5" d="${d}"/>`
    );
  }

  const [heading, ...rest] = figure.layout.title.text.split('<br>');
  const subtitle = stripTags(rest.join(' '));

  const legendX = width - LEGEND_WIDTH + 40;
  const legendTop = height / 2 - (figure.data.length * 40) / 2;
  const legend = figure.data.map((trace, i) => {
    const y = legendTop + 40 + i * 40;
    return (
      `<rect x="${legendX}" y="${y - 18}" width="24" height="24" fill="${traceColor(trace)}" stroke="#444"/>` +
      `<text x="${legendX + 36}" y="${y}" font-size="20">${escapeXml(trace.name)}</text>`
    );
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="Arial, sans-serif">`,
    `<rect width="${width}" height="${height}" fill="white"/>`,
    `<text x="${width / 2}" y="48" font-size="32" text-anchor="middle">${escapeXml(stripTags(heading ?? ''))}</text>`,
    subtitle ? `<text x="${width / 2}" y="76" font-size="18" text-anchor="middle" fill="#555">${escapeXml(subtitle)}</text>` : '',
    `<g class="countries">${shapes.join('')}</g>`,
    `<g class="legend">`,
    `<text x="${legendX}" y="${legendTop}" font-size="22" font-weight="bold">${escapeXml(figure.layout.legend.title.text)}</text>`,
    ...legend,
    `</g>`,
    `</svg>`,
  ]
    .filter(Boolean)
    .join('\n');
}

/**
 * Rasterise an SVG document to PNG.
 * @returns false when the optional sharp backend is missing or fails
 */
export async function writeStaticImage(svg: string, file: string, size: ImageSize = DEFAULT_IMAGE_SIZE): Promise<boolean> {
  try {
    const { default: sharp } = await import('sharp');
    fs.mkdirSync(path.dirname(file), { recursive: true });
    await sharp(Buffer.from(svg), { density: 72 * size.scale }).png().toFile(file);
    return true;
  } catch (error) {
    console.warn(`[map] Could not save PNG: ${describeError(error)}`);
    console.warn('[map] Note: PNG export requires the optional "sharp" package: npm install sharp');
    return false;
  }
}

/**
 * Draw the figure over the world atlas and write it as PNG.
 */
export async function exportStaticImage(
  figure: ChoroplethFigure,
  file: string,
  size: ImageSize = DEFAULT_IMAGE_SIZE
): Promise<boolean> {
  let svg: string;
  try {
    svg = renderStaticSvg(figure, loadWorldFeatures(), size);
  } catch (error) {
    console.warn(`[map] Could not draw static map: ${describeError(error)}`);
    return false;
  }
  return writeStaticImage(svg, file, size);
}
