import { SYNTHETIC_COLUMNS } from '../constants.js';

const synthetic: readonly string[] = SYNTHETIC_COLUMNS;

export type ColumnOrigin = 'property' | 'synthetic';

export interface ColumnMeta {
    name: string;
    origin: ColumnOrigin;
}

export function isSyntheticColumn(name: string): boolean {
    return synthetic.includes(name);
}

export function propertyColumns(columns: readonly ColumnMeta[]): ColumnMeta[] {
    return columns.filter((c) => c.origin === 'property');
}
