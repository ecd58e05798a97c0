/**
 * Interactive map export: a single HTML file with the plotly.js bundle and
 * the figure inlined, viewable offline.
 */

import fs from 'fs';
import path from 'path';
import { createRequire } from 'module';
import type { ChoroplethFigure } from '@/map/figure.js';
import { escapeXml } from '@/map/static-image.js';
import { describeError } from '@/utils/errors.js';

const require = createRequire(import.meta.url);

/** Serialise for embedding inside a <script> element */
function scriptJSON(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function loadPlotlySource(): string {
  return fs.readFileSync(require.resolve('plotly.js-dist-min'), 'utf8');
}

export function renderInteractiveHtml(figure: ChoroplethFigure, plotlySource: string): string {
  const title = figure.layout.title.text.split('<br>')[0]?.replace(/<[^>]*>/g, '') ?? '';
  const bundle = plotlySource.replace(/<\/script/gi, '<\\/script');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeXml(title)}</title>
<style>html, body { margin: 0; height: 100%; } #map { width: 100%; height: 100%; }</style>
<script>${bundle}</script>
</head>
<body>
<div id="map"></div>
<script>
Plotly.newPlot("map", ${scriptJSON(figure.data)}, ${scriptJSON(figure.layout)}, {"responsive": true});
</script>
</body>
</html>
`;
}

export function writeInteractiveHtml(figure: ChoroplethFigure, file: string): boolean {
  try {
    const html = renderInteractiveHtml(figure, loadPlotlySource());
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, html, 'utf8');
    return true;
  } catch (error) {
    console.error(`[map] Could not save ${file}: ${describeError(error)}`);
    return false;
  }
}
