import type { ProjectedCollection } from '../geojson/projector.js';

/** GeoJSON text of a projected collection, indented by two spaces. */
export function toGeoJsonText(collection: ProjectedCollection): string {
    return JSON.stringify(collection, null, 2) + '\n';
}
