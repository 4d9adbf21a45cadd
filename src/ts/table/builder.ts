import {
    GEOMETRY_WKT_COLUMN,
    HAS_EXCESS_PRECISION_COLUMN,
    IS_CCW_COLUMN,
    SYNTHETIC_COLUMNS,
} from '../constants.js';
import { InvalidFormatError, NoValidFeaturesError } from '../errors.js';
import type { Inspection } from '../geometry/inspection.js';
import { type InspectorOptions, inspectPrecision, inspectWinding } from '../geometry/inspector.js';
import { toWkt } from '../geometry/wkt.js';
import Logger from '../logger.js';
import { isRecord } from '../utils.js';
import type { AttributeRow, AttributeTable, CellIssue, CellValue } from './attribute-table.js';
import { type ColumnMeta, isSyntheticColumn } from './column-meta.js';

export type BuildOptions = InspectorOptions;

interface ValidFeature {
    featureIndex: number;
    geometry: Record<string, unknown>;
    properties: Record<string, unknown>;
}

function toCellValue(value: unknown): CellValue {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value) || isRecord(value)) return value;
    return null;
}

/** Read the `features` array, failing on anything that is not a feature collection shape. */
export function readFeatures(raw: unknown): unknown[] {
    if (!isRecord(raw) || !Array.isArray(raw.features)) throw new InvalidFormatError();
    return raw.features;
}

function collectValidFeatures(features: unknown[]): ValidFeature[] {
    const valid: ValidFeature[] = [];
    features.forEach((feature, featureIndex) => {
        if (!isRecord(feature) || !isRecord(feature.geometry)) {
            Logger.debug(`skipping feature ${featureIndex}: no geometry`);
            return;
        }
        const properties = isRecord(feature.properties) ? feature.properties : {};
        valid.push({ featureIndex, geometry: feature.geometry, properties });
    });
    return valid;
}

function collectPropertyColumns(features: ValidFeature[]): ColumnMeta[] {
    const seen = new Set<string>();
    const columns: ColumnMeta[] = [];
    for (const { properties } of features) {
        for (const name of Object.keys(properties)) {
            if (seen.has(name)) continue;
            seen.add(name);
            if (isSyntheticColumn(name)) {
                Logger.warn(`property "${name}" collides with a computed column and is ignored`);
                continue;
            }
            columns.push({ name, origin: 'property' });
        }
    }
    return columns;
}

function buildRow(
    feature: ValidFeature,
    position: number,
    propertyColumns: ColumnMeta[],
    options: BuildOptions,
): AttributeRow {
    const values: Record<string, CellValue> = {};
    for (const { name } of propertyColumns) {
        // a key such as `__proto__` must land as an own cell, not hit the prototype setter
        Object.defineProperty(values, name, {
            value: Object.hasOwn(feature.properties, name) ? toCellValue(feature.properties[name]) : null,
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }

    const issues: CellIssue[] = [];
    const cell = <T extends CellValue>(column: string, inspection: Inspection<T>): T | null => {
        if (inspection.status === 'ok') return inspection.value;
        if (inspection.status === 'failed') {
            Logger.warn(`feature ${feature.featureIndex}: ${column} unavailable: ${inspection.reason}`);
            issues.push({ column, reason: inspection.reason });
        }
        return null;
    };

    values[GEOMETRY_WKT_COLUMN] = cell(GEOMETRY_WKT_COLUMN, toWkt(feature.geometry));
    values[IS_CCW_COLUMN] = cell(IS_CCW_COLUMN, inspectWinding(feature.geometry));
    values[HAS_EXCESS_PRECISION_COLUMN] = cell(HAS_EXCESS_PRECISION_COLUMN, inspectPrecision(feature.geometry, options));

    return { position, featureIndex: feature.featureIndex, values, issues };
}

/**
 * Build the attribute table of a raw GeoJSON feature collection.
 *
 * Features without an object geometry are skipped; `indexMap` keeps the raw
 * array index of every row so the selection can be projected back later. The
 * caller owns the raw collection and must keep it for that projection.
 *
 * @throws InvalidFormatError when `raw` has no `features` array
 * @throws NoValidFeaturesError when no feature has a geometry
 */
export function buildTable(raw: unknown, options: BuildOptions = {}): AttributeTable {
    const features = readFeatures(raw);
    const valid = collectValidFeatures(features);
    if (valid.length === 0) throw new NoValidFeaturesError(features.length);

    const propertyColumns = collectPropertyColumns(valid);
    const columns: ColumnMeta[] = [
        ...propertyColumns,
        ...SYNTHETIC_COLUMNS.map((name): ColumnMeta => ({ name, origin: 'synthetic' })),
    ];
    const rows = valid.map((feature, position) => buildRow(feature, position, propertyColumns, options));

    Logger.debug(`built table: ${rows.length} rows of ${features.length} features, ${columns.length} columns`);
    return {
        columns,
        rows,
        indexMap: rows.map((row) => row.featureIndex),
        featureCount: features.length,
    };
}
