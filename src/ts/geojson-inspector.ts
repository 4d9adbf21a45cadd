export * as constants from './constants.js';
export {
    GeoJsonInspectorError,
    IngestionError,
    InvalidFilterError,
    InvalidFormatError,
    NoValidFeaturesError,
    type ErrorCode,
} from './errors.js';
export { toCsv } from './export/csv.js';
export { toGeoJsonText } from './export/geojson.js';
export { checkSpec, evaluate } from './filter/evaluate.js';
export type {
    CategoricalSet,
    FilteredResult,
    FilterKind,
    FilterSpec,
    FilterSpecs,
    NumericRange,
} from './filter/filter-spec.js';
export { range, set } from './filter/filter-spec.js';
export { defaultSpecs, type FilterOptions, inferKind, inferKinds } from './filter/infer.js';
export { project, type ProjectedCollection } from './geojson/projector.js';
export type { Inspection } from './geometry/inspection.js';
export {
    computeExcessPrecisionFlag,
    computeWindingFlag,
    type InspectorOptions,
    inspectPrecision,
    inspectWinding,
} from './geometry/inspector.js';
export { toWkt } from './geometry/wkt.js';
export { type GeoJsonSource, ingest, isValidUrl, readFromFile, readFromText, readFromUrl } from './ingest/reader.js';
export { default as Logger, LogLevel } from './logger.js';
export { InspectionSession, type SessionOptions, type SessionSnapshot } from './session.js';
export { type ColumnStats, columnStats, summarize, type TableSummary, type ValueType } from './summary.js';
export type { AttributeRow, AttributeTable, CellIssue, CellValue } from './table/attribute-table.js';
export { type BuildOptions, buildTable } from './table/builder.js';
export type { ColumnMeta, ColumnOrigin } from './table/column-meta.js';
