import axios, { AxiosRequestConfig } from 'axios';
import { HttpConfig } from '../models/config';
import { logger } from '../utils/logger';

export interface HttpResponse {
    status: number;
    data: unknown;
}

/**
 * The slice of axios the connectors use. Tests substitute a stub.
 */
export interface HttpClient {
    request(config: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface HttpFailure {
    status?: number;
    retryable: boolean;
    aborted: boolean;
    message: string;
}

const TRANSIENT_STATUSES = new Set([408, 429]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Classifies a request failure. Errors without a response (refused
 * connections, resets, client timeouts) are transient.
 */
export function describeHttpFailure(error: unknown): HttpFailure {
    if (axios.isCancel(error)) {
        return { retryable: false, aborted: true, message: 'Request was cancelled' };
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === undefined) {
            return { retryable: true, aborted: false, message: `Network error: ${error.code ?? error.message}` };
        }
        return {
            status,
            retryable: isTransientStatus(status),
            aborted: false,
            message: `Request failed with status ${status}`
        };
    }
    return {
        retryable: false,
        aborted: false,
        message: error instanceof Error ? error.message : String(error)
    };
}

export function createHttpClient(config: HttpConfig): HttpClient {
    const instance = axios.create({
        timeout: config.timeout,
        headers: {
            'User-Agent': config.userAgent,
            'Accept': 'application/json'
        }
    });

    // Headers are never logged: they carry credentials.
    instance.interceptors.request.use(
        (request) => {
            logger.debug('Making API request', {
                operation: 'http.request',
                method: request.method?.toUpperCase(),
                url: request.url
            });
            return request;
        }
    );

    instance.interceptors.response.use(
        (response) => {
            logger.debug('Received API response', {
                operation: 'http.response',
                status: response.status
            });
            return response;
        },
        (error: unknown) => {
            const failure = describeHttpFailure(error);
            logger.debug('API request failed', {
                operation: 'http.response',
                status: failure.status,
                retryable: failure.retryable,
                message: failure.message
            });
            return Promise.reject(error);
        }
    );

    return instance;
}
