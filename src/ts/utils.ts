const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a number in positional notation, expanding the exponent form
 * `String()` falls back to for very small or very large magnitudes.
 */
export function toPlainDecimal(num: number): string {
    const text = String(num);
    const e = text.search(/e/i);
    if (e < 0) return text;

    const sign = text.startsWith('-') ? '-' : '';
    const mantissa = text.slice(sign.length, e);
    const exponent = Number(text.slice(e + 1));
    const point = mantissa.indexOf('.');
    const digits = mantissa.replace('.', '');
    const shifted = (point < 0 ? mantissa.length : point) + exponent;

    if (shifted <= 0) return `${sign}0.${'0'.repeat(-shifted)}${digits}`;
    if (shifted >= digits.length) return sign + digits + '0'.repeat(shifted - digits.length);
    return `${sign}${digits.slice(0, shifted)}.${digits.slice(shifted)}`;
}

/** Number of digits after the decimal point in the plain rendering of `num`. */
export function fractionDigits(num: number): number {
    const text = toPlainDecimal(num);
    const point = text.indexOf('.');
    return point < 0 ? 0 : text.length - point - 1;
}

/**
 * Read a finite decimal number from a number or a numeric string.
 * Booleans, blanks and anything else yield undefined.
 */
export function parseDecimal(value: unknown): number | undefined {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
    const num = Number(trimmed);
    return Number.isFinite(num) ? num : undefined;
}

/**
 * Round to `decimals` places, moving towards the given side so that the
 * result never lands on the wrong side of `num`.
 */
export function roundTowards(num: number, decimals: number, side: 'down' | 'up'): number {
    const step = 10 ** -decimals;
    let rounded = Number(num.toFixed(decimals));
    if (side === 'down' && rounded > num) rounded = Number((rounded - step).toFixed(decimals));
    if (side === 'up' && rounded < num) rounded = Number((rounded + step).toFixed(decimals));
    return rounded;
}

/** Equality key that keeps `1` and `"1"` apart and compares structures by their JSON text. */
export function valueKey(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'object') return `json:${JSON.stringify(value)}`;
    return `${typeof value}:${String(value)}`;
}
