export type ErrorCode = 'INVALID_FORMAT' | 'NO_VALID_FEATURES' | 'INGESTION_FAILURE' | 'INVALID_FILTER';

/**
 * Base class of every error raised by the inspector. Per-cell geometry
 * failures are not errors: they are recorded on the row as issues.
 */
export class GeoJsonInspectorError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'GeoJsonInspectorError';
    }
}

/** Top-level value is not a mapping with a `features` array. */
export class InvalidFormatError extends GeoJsonInspectorError {
    constructor(message = 'Invalid GeoJSON format: expected an object with a "features" array') {
        super(message, 'INVALID_FORMAT');
        this.name = 'InvalidFormatError';
    }
}

/** Every feature lacked a usable geometry. */
export class NoValidFeaturesError extends GeoJsonInspectorError {
    constructor(public readonly featureCount: number) {
        super(`No valid features found (0 of ${featureCount} features have a geometry)`, 'NO_VALID_FEATURES');
        this.name = 'NoValidFeaturesError';
    }
}

/** Reading, fetching or parsing the input failed before any table was built. */
export class IngestionError extends GeoJsonInspectorError {
    constructor(
        message: string,
        public readonly source: string,
        cause?: unknown,
    ) {
        super(message, 'INGESTION_FAILURE', cause === undefined ? undefined : { cause });
        this.name = 'IngestionError';
    }
}

/** A filter or column selection refers to something the table cannot satisfy. */
export class InvalidFilterError extends GeoJsonInspectorError {
    constructor(
        message: string,
        public readonly column?: string,
    ) {
        super(message, 'INVALID_FILTER');
        this.name = 'InvalidFilterError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
