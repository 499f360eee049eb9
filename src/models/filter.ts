/**
 * Filter expressions accepted by the compiler.
 *
 * A scalar is compiled as-is (with operator detection), a list becomes an
 * OR-chain, a date range becomes a BETWEEN clause and an exclusion becomes a
 * chain of NOT-EQUALS clauses.
 */
export interface DateRange {
    readonly start: string;
    readonly end: string;
}

export interface Exclusion {
    readonly exclude: readonly string[];
}

export type FilterValue = string | readonly string[] | DateRange | Exclusion;

export type FilterSpec = Readonly<Record<string, FilterValue>>;

/** Reserved key carrying an already compiled clause. */
export const COMPLETE_QUERY_KEY = '_complete_query';

export function isStringList(value: unknown): value is readonly string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function isDateRange(value: FilterValue): value is DateRange {
    return typeof value === 'object' && 'start' in value && 'end' in value;
}

export function isExclusion(value: FilterValue): value is Exclusion {
    return typeof value === 'object' && 'exclude' in value;
}

export function isFilterValue(value: unknown): value is FilterValue {
    if (typeof value === 'string' || isStringList(value)) {
        return true;
    }
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    if ('exclude' in value) {
        return isStringList(value.exclude);
    }
    return 'start' in value && 'end' in value
        && typeof value.start === 'string' && typeof value.end === 'string';
}

/**
 * Builds an immutable FilterSpec. Later sources win on key collisions.
 */
export function createFilterSpec(...sources: Array<Record<string, FilterValue> | FilterSpec>): FilterSpec {
    const merged: Record<string, FilterValue> = {};
    for (const source of sources) {
        for (const [field, value] of Object.entries(source)) {
            merged[field] = isStringList(value) ? Object.freeze([...value]) : value;
        }
    }
    return Object.freeze(merged);
}
