import type { Position } from 'geojson';
import { linearRingIsClockwise } from 'ol/geom/flat/orient.js';

import { MAX_FRACTION_DIGITS } from '../constants.js';
import { fractionDigits, isRecord } from '../utils.js';
import { failed, type Inspection, notApplicable, ok, toCell } from './inspection.js';

export interface InspectorOptions {
    /** Fractional digits a coordinate may carry before it counts as excess precision. */
    maxFractionDigits?: number;
}

const MIN_RING_POSITIONS = 4;

function readPosition(position: unknown): Position | undefined {
    if (!Array.isArray(position) || position.length < 2) return;
    const [x, y] = position;
    if (typeof x !== 'number' || !Number.isFinite(x)) return;
    if (typeof y !== 'number' || !Number.isFinite(y)) return;
    return [x, y];
}

function readRing(ring: unknown): Inspection<Position[]> {
    if (!Array.isArray(ring)) return failed('ring is not an array');
    if (ring.length < MIN_RING_POSITIONS) return failed(`ring has ${ring.length} positions, expected at least ${MIN_RING_POSITIONS}`);
    const positions: Position[] = [];
    for (const p of ring) {
        const position = readPosition(p);
        if (!position) return failed(`invalid position ${JSON.stringify(p)}`);
        positions.push(position);
    }
    return ok(positions);
}

function readPolygonExterior(coordinates: unknown): Inspection<Position[]> {
    if (!Array.isArray(coordinates)) return failed('polygon coordinates are not an array');
    if (coordinates.length === 0) return failed('polygon has no rings');
    return readRing(coordinates[0]);
}

/**
 * Exterior rings of a Polygon or of every part of a MultiPolygon. Interior
 * rings are not read.
 */
export function readExteriorRings(geometry: unknown): Inspection<Position[][]> {
    if (!isRecord(geometry)) return failed('geometry is not an object');
    const { type, coordinates } = geometry;
    switch (type) {
        case 'Polygon': {
            const exterior = readPolygonExterior(coordinates);
            return exterior.status === 'ok' ? ok([exterior.value]) : exterior;
        }
        case 'MultiPolygon': {
            if (!Array.isArray(coordinates)) return failed('multipolygon coordinates are not an array');
            if (coordinates.length === 0) return failed('multipolygon has no polygons');
            const rings: Position[][] = [];
            for (const polygon of coordinates) {
                const exterior = readPolygonExterior(polygon);
                if (exterior.status !== 'ok') return exterior;
                rings.push(exterior.value);
            }
            return ok(rings);
        }
        default:
            return notApplicable;
    }
}

function isClockwise(ring: Position[]): boolean {
    const flatCoordinates = ring.flatMap(([x, y]) => [x, y]);
    // zero-area rings have no orientation and are not flagged
    return linearRingIsClockwise(flatCoordinates, 0, flatCoordinates.length, 2) === true;
}

/**
 * Whether any exterior ring winds clockwise, i.e. would have to be reversed
 * to follow the counter-clockwise exterior convention.
 */
export function inspectWinding(geometry: unknown): Inspection<boolean> {
    const rings = readExteriorRings(geometry);
    if (rings.status !== 'ok') return rings;
    return ok(rings.value.some(isClockwise));
}

/**
 * Whether any exterior-ring longitude or latitude carries more fractional
 * digits than allowed.
 */
export function inspectPrecision(geometry: unknown, options: InspectorOptions = {}): Inspection<boolean> {
    const maxFractionDigits = options.maxFractionDigits ?? MAX_FRACTION_DIGITS;
    const rings = readExteriorRings(geometry);
    if (rings.status !== 'ok') return rings;
    const excess = rings.value.some((ring) =>
        ring.some(([x, y]) => fractionDigits(x) > maxFractionDigits || fractionDigits(y) > maxFractionDigits),
    );
    return ok(excess);
}

/** `true` if the geometry's exterior winding is clockwise; `null` when unknown or not polygonal. */
export function computeWindingFlag(geometry: unknown): boolean | null {
    return toCell(inspectWinding(geometry));
}

/** `true` if a coordinate exceeds the fractional digit limit; `null` when unknown or not polygonal. */
export function computeExcessPrecisionFlag(geometry: unknown, options?: InspectorOptions): boolean | null {
    return toCell(inspectPrecision(geometry, options));
}
