import { PaginationConfig } from '../../models/config';
import { FetchRequest, Page, RecordSource, ResultSet, TableRecord } from '../../models/record';
import { AuthenticationError, BaseError, FetchError } from '../../utils/errors';
import { encodeQuery } from '../../services/filterCompiler';
import { AuthProvider } from '../auth/authProvider';
import { HttpClient, HttpResponse, describeHttpFailure } from '../http';
import { RemoteConnector } from './base';

export interface PageRequest {
    table: string;
    query: string;
    fields?: readonly string[];
    limit: number;
    offset: number;
    displayValue?: boolean;
    signal?: AbortSignal;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replaces `{ display_value, value }` reference objects with their display
 * value.
 */
export function flattenRecord(raw: Record<string, unknown>): TableRecord {
    const record: TableRecord = {};
    for (const [field, value] of Object.entries(raw)) {
        record[field] = isRecordObject(value) && 'display_value' in value ? value.display_value : value;
    }
    return record;
}

/**
 * Reads records from the instance's Table API, one offset-addressed page at
 * a time, until the table is exhausted or a cap is hit.
 */
export class TableApiConnector extends RemoteConnector implements RecordSource {
    constructor(
        instanceUrl: string,
        private readonly pagination: PaginationConfig,
        private readonly http: HttpClient,
        private readonly auth: AuthProvider,
        private readonly clock: () => number = Date.now
    ) {
        super('table-api', instanceUrl);
    }

    public buildUrl(request: PageRequest): string {
        const params: string[] = [];
        if (request.query) {
            params.push(`sysparm_query=${encodeQuery(request.query)}`);
        }
        if (request.fields && request.fields.length > 0) {
            params.push(`sysparm_fields=${request.fields.map(encodeURIComponent).join(',')}`);
        }
        params.push(`sysparm_limit=${request.limit}`);
        params.push(`sysparm_offset=${request.offset}`);
        params.push(`sysparm_display_value=${request.displayValue === false ? 'false' : 'true'}`);
        return `${this.instanceUrl}/api/now/table/${encodeURIComponent(request.table)}?${params.join('&')}`;
    }

    public async testConnection(table: string = 'incident'): Promise<boolean> {
        try {
            await this.fetchPage({ table, query: '', fields: ['sys_id'], limit: 1, offset: 0 }, 0);
            return true;
        } catch (error) {
            this.logOperation('warn', 'Connection test failed', {
                error: error instanceof Error ? error.message : String(error)
            });
            return false;
        }
    }

    /**
     * Fetches one page. An authorization failure invalidates the credential
     * and retries the page once.
     */
    public async fetchPage(request: PageRequest, index: number): Promise<Page> {
        const response = await this.requestPage(request, index, false);
        return { index, offset: request.offset, records: this.parseRecords(response, index) };
    }

    public async fetchAll(request: FetchRequest): Promise<ResultSet> {
        const startTime = this.clock();
        const pageSize = Math.max(1, request.pageSize ?? this.pagination.defaultPageSize);
        const cap = Math.max(1, request.maxRecords ?? this.pagination.maxRecords);
        const deadline = request.timeoutMs !== undefined ? startTime + request.timeoutMs : undefined;

        const result: ResultSet = {
            table: request.table,
            query: request.query,
            records: [],
            pagesFetched: 0,
            complete: false,
            truncated: false
        };

        while (true) {
            this.checkBoundary(request, deadline, result.pagesFetched);

            if (result.pagesFetched >= this.pagination.maxPages) {
                result.truncated = true;
                break;
            }

            const remaining = cap - result.records.length;
            // One record past the cap tells a table that ends at the cap from a longer one.
            const limit = remaining <= pageSize ? remaining + 1 : pageSize;
            let page: Page;
            try {
                page = await this.fetchPage({
                    table: request.table,
                    query: request.query,
                    fields: request.fields,
                    limit,
                    offset: result.records.length,
                    displayValue: request.displayValue,
                    signal: request.signal
                }, result.pagesFetched);
            } catch (error) {
                if (error instanceof AuthenticationError) {
                    throw error;
                }
                const fetchError = this.toFetchError(error, result.pagesFetched);
                if (request.mode === 'best-effort' && fetchError.code !== 'FETCH_ABORTED') {
                    this.logOperation('warn', 'Returning partial results after a failed page', {
                        table: request.table,
                        pageIndex: fetchError.pageIndex,
                        recordsKept: result.records.length
                    });
                    result.error = fetchError;
                    break;
                }
                throw fetchError;
            }

            result.records.push(...page.records.slice(0, remaining));
            result.pagesFetched++;

            if (page.records.length < limit) {
                result.complete = true;
                break;
            }
            if (result.records.length >= cap) {
                result.truncated = true;
                break;
            }
        }

        this.logOperation('info', 'Fetched table records', {
            table: request.table,
            records: result.records.length,
            pages: result.pagesFetched,
            complete: result.complete,
            truncated: result.truncated,
            duration: this.clock() - startTime
        });
        return result;
    }

    private async requestPage(request: PageRequest, index: number, isRetry: boolean): Promise<HttpResponse> {
        const startTime = this.clock();
        const authorization = await this.auth.getAuthorizationHeader();
        try {
            const response = await this.http.request({
                method: 'GET',
                url: this.buildUrl(request),
                headers: { 'Authorization': authorization, 'Accept': 'application/json' },
                signal: request.signal
            });
            this.updateMetrics(true, this.clock() - startTime);
            return response;
        } catch (error) {
            this.updateMetrics(false, 0);
            const failure = describeHttpFailure(error);
            if (failure.status === 401) {
                if (isRetry) {
                    throw new AuthenticationError('Table API rejected the refreshed credential', false, 401, {
                        table: request.table,
                        pageIndex: index
                    });
                }
                this.logOperation('info', 'Credential rejected; refreshing and retrying page', {
                    table: request.table,
                    pageIndex: index
                });
                this.auth.invalidate(authorization);
                return this.requestPage(request, index, true);
            }
            throw this.toFetchError(error, index);
        }
    }

    private parseRecords(response: HttpResponse, index: number): TableRecord[] {
        const data = response.data;
        if (!isRecordObject(data) || !Array.isArray(data.result)) {
            throw new FetchError('Response has no result list', index, false, response.status, 'INVALID_RESPONSE');
        }
        const rows: unknown[] = data.result;
        if (!rows.every(isRecordObject)) {
            throw new FetchError('Response contains a malformed record', index, false, response.status, 'INVALID_RESPONSE');
        }
        return rows.filter(isRecordObject).map(flattenRecord);
    }

    private checkBoundary(request: FetchRequest, deadline: number | undefined, pageIndex: number): void {
        if (request.signal?.aborted) {
            throw new FetchError('Fetch was aborted', pageIndex, false, undefined, 'FETCH_ABORTED', { table: request.table });
        }
        if (deadline !== undefined && this.clock() >= deadline) {
            throw new FetchError('Fetch timed out', pageIndex, true, undefined, 'FETCH_TIMEOUT', { table: request.table });
        }
    }

    private toFetchError(error: unknown, pageIndex: number): FetchError {
        if (error instanceof FetchError) {
            return error;
        }
        if (error instanceof BaseError) {
            return new FetchError(error.message, pageIndex, error.retryable, undefined, 'FETCH_ERROR');
        }
        const failure = describeHttpFailure(error);
        return new FetchError(
            failure.message,
            pageIndex,
            failure.retryable,
            failure.status,
            failure.aborted ? 'FETCH_ABORTED' : 'FETCH_ERROR'
        );
    }
}
