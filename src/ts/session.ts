import { InvalidFilterError } from './errors.js';
import { toCsv } from './export/csv.js';
import { checkSpec, evaluate } from './filter/evaluate.js';
import type { FilteredResult, FilterKind, FilterSpec, FilterSpecs } from './filter/filter-spec.js';
import { type FilterOptions, inferKinds } from './filter/infer.js';
import { type ProjectedCollection, project } from './geojson/projector.js';
import { type GeoJsonSource, ingest } from './ingest/reader.js';
import Logger from './logger.js';
import { summarize, type TableSummary } from './summary.js';
import type { AttributeTable } from './table/attribute-table.js';
import { type BuildOptions, buildTable } from './table/builder.js';

export type SessionOptions = BuildOptions & FilterOptions;

/** Everything derived from one successful load. Replaced as a whole, never patched. */
export interface SessionSnapshot {
    /** The raw collection as loaded; projection reads features from it. */
    readonly collection: unknown;
    readonly table: AttributeTable;
    readonly kinds: ReadonlyMap<string, FilterKind>;
    readonly specs: FilterSpecs;
}

function schemaKey(kinds: ReadonlyMap<string, FilterKind>): string {
    return JSON.stringify(Array.from(kinds, ([name, kind]) => [name, kind.kind]));
}

/**
 * State of one interactive inspection: the current collection, its table and
 * the active filters. A failed load leaves the previous state in place.
 */
export class InspectionSession {
    private current: SessionSnapshot | null = null;

    constructor(private readonly options: SessionOptions = {}) {}

    get snapshot(): SessionSnapshot | null {
        return this.current;
    }

    /**
     * Build the table of a parsed collection and make it current. Filter specs
     * survive the load only when the column names and kinds are unchanged.
     */
    load(collection: unknown): SessionSnapshot {
        const table = buildTable(collection, this.options);
        const kinds = inferKinds(table, this.options);
        const previous = this.current;
        const specs = previous && schemaKey(previous.kinds) === schemaKey(kinds) ? previous.specs : {};
        this.current = { collection, table, kinds, specs };
        Logger.debug(`session loaded: ${table.rows.length} rows`);
        return this.current;
    }

    async loadFrom(source: GeoJsonSource): Promise<SessionSnapshot> {
        return this.load(await ingest(source));
    }

    setFilter(column: string, spec: FilterSpec): void {
        const snapshot = this.require();
        if (!snapshot.kinds.has(column)) throw new InvalidFilterError(`Unknown column "${column}"`, column);
        checkSpec(column, spec);
        this.current = { ...snapshot, specs: { ...snapshot.specs, [column]: spec } };
    }

    clearFilter(column: string): void {
        const snapshot = this.require();
        const specs = Object.fromEntries(Object.entries(snapshot.specs).filter(([name]) => name !== column));
        this.current = { ...snapshot, specs };
    }

    clearFilters(): void {
        this.current = { ...this.require(), specs: {} };
    }

    filtered(): FilteredResult {
        const { table, specs } = this.require();
        return evaluate(table, specs);
    }

    summary(): TableSummary {
        const { table, specs } = this.require();
        return summarize(table, evaluate(table, specs));
    }

    /** The filtered features as a collection, or null when nothing is selected. */
    exportGeoJson(): ProjectedCollection | null {
        const { collection, table, specs } = this.require();
        return project(collection, evaluate(table, specs).positions, table.indexMap);
    }

    exportCsv(columns?: readonly string[]): string {
        const { table, specs } = this.require();
        return toCsv(table, evaluate(table, specs).rows, columns);
    }

    private require(): SessionSnapshot {
        if (!this.current) throw new Error('No GeoJSON loaded');
        return this.current;
    }
}
