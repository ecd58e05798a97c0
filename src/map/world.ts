/**
 * Country shapes for the static image, from the world-atlas package
 * (Natural Earth 1:110m, TopoJSON).
 */

import fs from 'fs';
import { createRequire } from 'module';
import * as topojson from 'topojson-client';
import type { GeometryCollection, Topology } from 'topojson-specification';
import type { FeatureCollection, Geometry } from 'geojson';

export type CountryProperties = { name: string };
export type CountryFeatures = FeatureCollection<Geometry, CountryProperties>;

type WorldTopology = Topology<{ countries: GeometryCollection<CountryProperties> }>;

const require = createRequire(import.meta.url);

function isWorldTopology(value: unknown): value is WorldTopology {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || value.type !== 'Topology') return false;
  if (!('objects' in value) || typeof value.objects !== 'object' || value.objects === null) return false;
  return 'countries' in value.objects;
}

export function topologyToFeatures(topology: unknown): CountryFeatures {
  if (!isWorldTopology(topology)) {
    throw new Error('world atlas is not a TopoJSON topology with a "countries" object');
  }
  return topojson.feature(topology, topology.objects.countries);
}

export function loadWorldFeatures(): CountryFeatures {
  const file = require.resolve('world-atlas/countries-110m.json');
  return topologyToFeatures(JSON.parse(fs.readFileSync(file, 'utf8')));
}
