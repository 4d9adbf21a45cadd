import { Command, InvalidArgumentError, Option } from 'commander';
import { writeFile } from 'node:fs/promises';

import { CLI_NAME, CLI_VERSION } from '../constants.js';
import { describeError, GeoJsonInspectorError } from '../errors.js';
import { toGeoJsonText } from '../export/geojson.js';
import type { FilterKind } from '../filter/filter-spec.js';
import { type GeoJsonSource, isValidUrl } from '../ingest/reader.js';
import Logger, { LogLevel } from '../logger.js';
import { InspectionSession } from '../session.js';
import type { ColumnStats, TableSummary } from '../summary.js';
import { type AttributeRow, type CellValue, columnValues } from '../table/attribute-table.js';
import { parseFilterExpression, toFilterSpec } from './filter-expression.js';
import { formatTable, isOutputFormat, type OutputFormat } from './output.js';

export const EXIT_CODES = {
    SUCCESS: 0,
    DATA_ERROR: 2,
    INGESTION_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface InspectOptions {
    filter: string[];
    format: OutputFormat;
    csv?: string;
    selectedCsv?: string;
    columns?: string[];
    geojson?: string;
    summaryOnly?: boolean;
    maxCategories?: number;
    maxFractionDigits?: number;
    verbose?: boolean;
    quiet?: boolean;
}

export interface CliIo {
    stdout(text: string): void;
    stderr(text: string): void;
    readStdin(): Promise<string>;
}

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) chunks.push(Buffer.from(chunk));
    return Buffer.concat(chunks).toString('utf-8');
}

export const processIo: CliIo = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readStdin,
};

async function resolveSource(source: string, io: CliIo): Promise<GeoJsonSource> {
    if (source === '-') return { kind: 'text', text: await io.readStdin() };
    if (isValidUrl(source)) return { kind: 'url', url: source };
    return { kind: 'file', path: source };
}

function formatCell(value: CellValue | undefined): string {
    if (value === null || value === undefined) return '';
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function describeKind(kind: FilterKind | undefined): string {
    if (!kind) return '';
    if (kind.kind === 'range') return `range ${kind.min}..${kind.max}`;
    return kind.exposed ? `set (${kind.values.length})` : 'none';
}

function formatSummary(summary: TableSummary, kinds: ReadonlyMap<string, FilterKind>): string {
    const lines = [
        `Total features: ${summary.totalFeatures}`,
        `Filtered features: ${summary.filteredFeatures}`,
        `Number of properties: ${summary.propertyCount}`,
    ];
    if (summary.skippedFeatures > 0) lines.push(`Skipped features (no geometry): ${summary.skippedFeatures}`);
    const stats = formatTable<ColumnStats>(summary.columns, [
        { header: 'column', value: (c) => c.name },
        { header: 'type', value: (c) => c.type },
        { header: 'unique', value: (c) => String(c.unique), align: 'right' },
        { header: 'missing', value: (c) => String(c.missing), align: 'right' },
        { header: 'filter', value: (c) => describeKind(kinds.get(c.name)) },
    ]);
    return `${lines.join('\n')}\n\n${stats}\n`;
}

function formatRows(session: InspectionSession, format: OutputFormat): string {
    const { rows } = session.filtered();
    switch (format) {
        case 'csv':
            return session.exportCsv();
        case 'json':
            return JSON.stringify(rows.map((row) => row.values), null, 2) + '\n';
        case 'table': {
            const columns = session.snapshot?.table.columns ?? [];
            return (
                formatTable<AttributeRow>(rows, [
                    { header: '#', value: (row) => String(row.featureIndex), align: 'right' },
                    ...columns.map(({ name }) => ({ header: name, value: (row: AttributeRow) => formatCell(row.values[name]) })),
                ]) + '\n'
            );
        }
    }
}

/**
 * Load, filter, report and export one GeoJSON source. Inspector errors are
 * reported on stderr and mapped to an exit code; anything else propagates.
 */
export async function runInspect(source: string, options: InspectOptions, io: CliIo = processIo): Promise<ExitCode> {
    if (options.quiet) Logger.logLevel = LogLevel.Silent;
    else if (options.verbose) Logger.logLevel = LogLevel.Debug;

    const session = new InspectionSession({
        maxCategoricalValues: options.maxCategories,
        maxFractionDigits: options.maxFractionDigits,
    });

    try {
        const snapshot = await session.loadFrom(await resolveSource(source, io));
        for (const expression of options.filter.map(parseFilterExpression)) {
            const spec = toFilterSpec(
                expression,
                snapshot.kinds.get(expression.column),
                columnValues(snapshot.table, expression.column),
            );
            if (spec) session.setFilter(expression.column, spec);
        }

        const { kinds } = snapshot;
        io.stdout(formatSummary(session.summary(), kinds));
        if (!options.summaryOnly) io.stdout('\n' + formatRows(session, options.format));

        if (options.csv) {
            await writeFile(options.csv, session.exportCsv());
            Logger.info(`wrote ${options.csv}`);
        }
        if (options.selectedCsv) {
            await writeFile(options.selectedCsv, session.exportCsv(options.columns));
            Logger.info(`wrote ${options.selectedCsv}`);
        }
        if (options.geojson) {
            const collection = session.exportGeoJson();
            if (collection) {
                await writeFile(options.geojson, toGeoJsonText(collection));
                Logger.info(`wrote ${options.geojson}`);
            } else {
                io.stderr('Nothing to export: no features match the filters\n');
            }
        }
        return EXIT_CODES.SUCCESS;
    } catch (e) {
        io.stderr(`Error: ${describeError(e)}\n`);
        if (e instanceof GeoJsonInspectorError) {
            return e.code === 'INGESTION_FAILURE' ? EXIT_CODES.INGESTION_ERROR : EXIT_CODES.DATA_ERROR;
        }
        throw e;
    }
}

function parseCount(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
    return parsed;
}

function parseFormat(value: string): OutputFormat {
    if (!isOutputFormat(value)) throw new InvalidArgumentError('Expected table, json or csv.');
    return value;
}

function parseList(value: string): string[] {
    return value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
}

export function createProgram(io: CliIo = processIo): Command {
    const program = new Command();

    program
        .name(CLI_NAME)
        .description('Inspect GeoJSON attributes, check geometry quality, filter and export features')
        .version(CLI_VERSION, '-V, --version', 'Output the version number')
        .argument('<source>', 'GeoJSON file (.json/.geojson), http(s) URL, or - to read text from stdin')
        .option('-f, --filter <expr...>', 'Filter rows: column=min..max or column=a,b (repeatable)', [])
        .addOption(new Option('--format <fmt>', 'Row output format: table|json|csv').default('table').argParser(parseFormat))
        .option('--csv <file>', 'Write all columns of the filtered rows as CSV')
        .option('--columns <list>', 'Columns for --selected-csv, comma separated', parseList)
        .option('--selected-csv <file>', 'Write the --columns of the filtered rows as CSV')
        .option('--geojson <file>', 'Write the filtered features as GeoJSON')
        .option('--summary-only', 'Print metrics and column statistics only')
        .option('--max-categories <n>', 'Distinct values above which a column gets no categorical filter', parseCount)
        .option('--max-fraction-digits <n>', 'Fractional digits allowed before a coordinate is flagged', parseCount)
        .option('-v, --verbose', 'Enable debug logging')
        .option('-q, --quiet', 'Disable logging')
        .action(async (source: string, options: InspectOptions) => {
            process.exitCode = await runInspect(source, options, io);
        });

    return program;
}
