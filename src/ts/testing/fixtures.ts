import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { Feature, FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import GeoJSON from 'ol/format/GeoJSON.js';
import WKT from 'ol/format/WKT.js';

import { buildTable } from '../table/builder.js';
import type { AttributeTable } from '../table/attribute-table.js';

const wktFormat = new WKT();
const geojsonFormat = new GeoJSON();

export const dataDir = fileURLToPath(new URL('../../../test/data/', import.meta.url));

export function readFixture(name: string): unknown {
    return JSON.parse(readFileSync(dataDir + name, 'utf-8'));
}

export function geometryFromWkt(wkt: string): Geometry {
    return geojsonFormat.writeGeometryObject(wktFormat.readGeometry(wkt));
}

export function makeFeature(geometry: Geometry | null, properties: GeoJsonProperties = {}): Feature<Geometry | null> {
    return { type: 'Feature', geometry, properties };
}

export function makeFeatureCollection(
    wkts: Array<string | null>,
    properties?: GeoJsonProperties[],
): FeatureCollection<Geometry | null> {
    return {
        type: 'FeatureCollection',
        features: wkts.map((wkt, i) => makeFeature(wkt === null ? null : geometryFromWkt(wkt), properties?.[i] ?? {})),
    };
}

/** A table of point features carrying the given property bags. */
export function tableOf(properties: GeoJsonProperties[]): AttributeTable {
    return buildTable(makeFeatureCollection(properties.map((_, i) => `POINT(${i} 0)`), properties));
}
