import { FetchMode } from './config';
import { FetchError } from '../utils/errors';

/**
 * One row of a remote table. Reference fields are already flattened to
 * their display value.
 */
export type TableRecord = Record<string, unknown>;

export interface Page {
    index: number;
    offset: number;
    records: TableRecord[];
}

export interface ResultSet {
    table: string;
    query: string;
    /** In the order the remote service returned them. */
    records: TableRecord[];
    pagesFetched: number;
    /** True when pagination ran until the source was exhausted. */
    complete: boolean;
    /** True when a record cap or the page ceiling stopped pagination. */
    truncated: boolean;
    /** Set only in best-effort mode, when a page failed. */
    error?: FetchError;
}

export interface FetchRequest {
    table: string;
    query: string;
    fields?: readonly string[];
    pageSize?: number;
    maxRecords?: number;
    mode: FetchMode;
    displayValue?: boolean;
    signal?: AbortSignal;
    timeoutMs?: number;
}

/**
 * Anything that can run a paginated table query.
 */
export interface RecordSource {
    fetchAll(request: FetchRequest): Promise<ResultSet>;
}

export function fieldText(record: TableRecord, field: string): string {
    const value = record[field];
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    return '';
}
