/** Coordinates with more fractional digits than this are flagged. */
export const MAX_FRACTION_DIGITS = 6;

/** Decimal places numeric filter bounds are rounded to. */
export const RANGE_DECIMALS = 2;

/** Added to the upper bound of a numeric range whose min equals its max. */
export const DEGENERATE_RANGE_WIDENING = 1;

/** Categorical columns with more distinct values than this get no selector. */
export const MAX_CATEGORICAL_VALUES = 100;

export const ACCEPTED_EXTENSIONS = ['.json', '.geojson'] as const;

export const GEOMETRY_WKT_COLUMN = 'geometry_wkt';
export const IS_CCW_COLUMN = 'is_ccw';
export const HAS_EXCESS_PRECISION_COLUMN = 'has_excess_precision';

export const SYNTHETIC_COLUMNS = [GEOMETRY_WKT_COLUMN, IS_CCW_COLUMN, HAS_EXCESS_PRECISION_COLUMN] as const;

export const CLI_NAME = 'geojson-inspector';
export const CLI_VERSION = '0.1.0';
