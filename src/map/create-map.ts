/**
 * Render the scraped advisory levels as a colour-coded world map
 * Input: CSV written by the scrape stage
 * Output: PNG (high resolution) + interactive HTML
 */

import fs from 'fs';
import { pathToFileURL } from 'url';
import dayjs, { type Dayjs } from 'dayjs';
import { program } from 'commander';
import { DEFAULT_CSV_FILE } from '@/scraper/config/source.js';
import { loadDataset } from '@/map/dataset-loader.js';
import { buildChoroplethFigure } from '@/map/figure.js';
import { unrecognizedCountries } from '@/map/vocabulary.js';
import { DEFAULT_IMAGE_SIZE, exportStaticImage } from '@/map/static-image.js';
import { writeInteractiveHtml } from '@/map/interactive-html.js';
import { formatDistribution } from '@/scraper/dataset.js';
import { describeError } from '@/utils/errors.js';

export const DEFAULT_PNG_FILE = 'output/travel_advisory_map.png';
export const DEFAULT_HTML_FILE = 'output/travel_advisory_map.html';

export interface CreateMapOptions {
  csv: string;
  png: string;
  html: string;
  width: number;
  height: number;
  scale: number;
  title?: string;
  /** Skip the PNG export */
  image: boolean;
}

export interface CreateMapResult {
  status: 'ok' | 'missing-input';
  rows: number;
  png: string | null;
  html: string | null;
}

interface CliOptions {
  csv: string;
  png: string;
  html: string;
  width: string;
  height: string;
  scale: string;
  title?: string;
  image: boolean;
}

function modifiedAt(file: string): Dayjs | undefined {
  try {
    return dayjs(fs.statSync(file).mtime);
  } catch (error) {
    console.warn(`[map] Could not stat ${file}: ${describeError(error)}`);
    return undefined;
  }
}

export async function runCreateMap(options: CreateMapOptions): Promise<CreateMapResult> {
  const rows = loadDataset(options.csv);
  if (rows === null) {
    console.error(`[map] Error: '${options.csv}' not found.`);
    console.error('[map] Please run the scrape stage (npm run scrape) first to collect the data.');
    return { status: 'missing-input', rows: 0, png: null, html: null };
  }

  console.error(`[map] Loaded data for ${rows.length} countries`);
  console.error(formatDistribution(rows));

  for (const name of unrecognizedCountries(rows)) {
    console.warn(`[map] "${name}" is not a recognised map location and will stay blank; add an alias for it`);
  }

  const figure = buildChoroplethFigure(rows, {
    title: options.title,
    collectedAt: modifiedAt(options.csv),
  });

  let png: string | null = null;
  if (options.image) {
    const saved = await exportStaticImage(figure, options.png, {
      width: options.width,
      height: options.height,
      scale: options.scale,
    });
    if (saved) {
      png = options.png;
      console.error(`[map] Map saved as ${options.png} (${options.width * options.scale}x${options.height * options.scale})`);
    }
  }

  const html = writeInteractiveHtml(figure, options.html) ? options.html : null;
  if (html) {
    console.error(`[map] Interactive map saved as ${options.html}; open it in a browser to explore.`);
  }

  return { status: 'ok', rows: rows.length, png, html };
}

function positiveNumber(value: string, fallback: number): number {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

// Main execution - only run if this file is executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program
    .option('--csv <file>', 'CSV produced by the scrape stage', DEFAULT_CSV_FILE)
    .option('--png <file>', 'PNG output file', DEFAULT_PNG_FILE)
    .option('--html <file>', 'HTML output file', DEFAULT_HTML_FILE)
    .option('--width <px>', 'PNG width', String(DEFAULT_IMAGE_SIZE.width))
    .option('--height <px>', 'PNG height', String(DEFAULT_IMAGE_SIZE.height))
    .option('--scale <n>', 'PNG pixel density multiplier', String(DEFAULT_IMAGE_SIZE.scale))
    .option('--title <text>', 'map title')
    .option('--no-image', 'skip the PNG export')
    .parse(process.argv);

  const opt = program.opts<CliOptions>();

  runCreateMap({
    csv: opt.csv,
    png: opt.png,
    html: opt.html,
    width: positiveNumber(opt.width, DEFAULT_IMAGE_SIZE.width),
    height: positiveNumber(opt.height, DEFAULT_IMAGE_SIZE.height),
    scale: positiveNumber(opt.scale, DEFAULT_IMAGE_SIZE.scale),
    title: opt.title,
    image: opt.image,
  })
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
      if (result.status !== 'ok') process.exitCode = 1;
    })
    .catch((error: unknown) => {
      console.error('[map] Unexpected failure:', describeError(error));
      process.exitCode = 1;
    });
}
