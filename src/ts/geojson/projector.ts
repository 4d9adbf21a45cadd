import Logger from '../logger.js';
import { isRecord } from '../utils.js';

export interface ProjectedCollection {
    type: 'FeatureCollection';
    /** The selected raw feature objects, not copies. */
    features: unknown[];
}

/**
 * Map table positions back onto the raw features they were built from.
 *
 * Positions index the table, not the raw `features` array; `indexMap`
 * translates between the two. Returns null when there is nothing to export:
 * no or malformed original, an empty selection, or a position that does not
 * resolve to a feature.
 */
export function project(
    original: unknown,
    positions: readonly number[],
    indexMap: readonly number[],
): ProjectedCollection | null {
    if (!isRecord(original) || !Array.isArray(original.features)) return null;
    if (positions.length === 0) return null;

    const source = original.features;
    const features: unknown[] = [];
    for (const position of positions) {
        const featureIndex = indexMap[position];
        if (featureIndex === undefined || featureIndex < 0 || featureIndex >= source.length) {
            Logger.warn(`cannot project row ${position}: no feature behind it`);
            return null;
        }
        features.push(source[featureIndex]);
    }
    return { type: 'FeatureCollection', features };
}
