import GeoJSON from 'ol/format/GeoJSON.js';
import WKT from 'ol/format/WKT.js';

import { describeError } from '../errors.js';
import { isRecord } from '../utils.js';
import { failed, type Inspection, ok } from './inspection.js';

const geojsonFormat = new GeoJSON();
const wktFormat = new WKT();

function hasFinitePositions(coordinates: unknown): boolean {
    if (!Array.isArray(coordinates)) return false;
    if (coordinates.length > 0 && coordinates.every((c) => typeof c === 'number')) {
        return coordinates.length >= 2 && coordinates.every((c) => Number.isFinite(c));
    }
    return coordinates.every(hasFinitePositions);
}

function checkCoordinates(geometry: Record<string, unknown>): string | undefined {
    if (geometry.type === 'GeometryCollection') {
        if (!Array.isArray(geometry.geometries)) return 'geometry collection has no geometries array';
        for (const member of geometry.geometries) {
            if (!isRecord(member)) return 'geometry is not an object';
            const problem = checkCoordinates(member);
            if (problem) return problem;
        }
        return;
    }
    if (!hasFinitePositions(geometry.coordinates)) return `invalid coordinates in ${String(geometry.type)} geometry`;
}

/**
 * Serialize a GeoJSON geometry object to well-known text. Coordinates are
 * written as they are read, without rounding; positions must be finite numbers.
 */
export function toWkt(geometry: unknown): Inspection<string> {
    if (!isRecord(geometry)) return failed('geometry is not an object');
    const problem = checkCoordinates(geometry);
    if (problem) return failed(problem);
    try {
        return ok(wktFormat.writeGeometry(geojsonFormat.readGeometry(geometry)));
    } catch (e) {
        return failed(`cannot serialize ${String(geometry.type)} geometry: ${describeError(e)}`);
    }
}
