/**
 * Outcome of computing one quality signal for one geometry. Failures are
 * values so that a bad geometry degrades a single cell instead of the build.
 */
export type Inspection<T> =
    | { readonly status: 'ok'; readonly value: T }
    | { readonly status: 'not-applicable' }
    | { readonly status: 'failed'; readonly reason: string };

export const notApplicable: Inspection<never> = { status: 'not-applicable' };

export function ok<T>(value: T): Inspection<T> {
    return { status: 'ok', value };
}

export function failed(reason: string): Inspection<never> {
    return { status: 'failed', reason };
}

/** Collapse an inspection to the nullable cell value stored in the table. */
export function toCell<T>(inspection: Inspection<T>): T | null {
    return inspection.status === 'ok' ? inspection.value : null;
}
