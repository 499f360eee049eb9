import { LogContext, logger } from './logger';

export { LogContext };

// Error categories for structured logging and tracking
export enum ErrorCategory {
    VALIDATION = 'validation',
    PROCESSING = 'processing',
    AUTHENTICATION = 'authentication',
    NETWORK = 'network',
    CONFIGURATION = 'configuration',
    SYSTEM = 'system'
}

/**
 * Rejection reasons produced by the input guard. They double as the
 * `code` of the matching error class.
 */
export type RejectionReason = 'INPUT_TOO_LONG' | 'SUSPICIOUS_PATTERN' | 'TIMEOUT_EXCEEDED';

export interface ErrorResponse {
    error: {
        code: string;
        message: string;
        category: string;
        retryable: boolean;
        timestamp: string;
        correlationId: string;
        details?: LogContext;
    };
}

// Base error class with structured logging support
export class BaseError extends Error {
    public readonly code: string;
    public readonly category: ErrorCategory;
    public readonly retryable: boolean;
    public readonly timestamp: Date;
    public readonly correlationId: string;
    public readonly context: LogContext;

    constructor(
        message: string,
        code: string,
        category: ErrorCategory,
        retryable: boolean = false,
        context: LogContext = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.category = category;
        this.retryable = retryable;
        this.timestamp = new Date();
        this.correlationId = logger.getCorrelationId();
        this.context = context;

        this.logError();
    }

    private logError(): void {
        const entry: LogContext = {
            errorCode: this.code,
            errorCategory: this.category,
            retryable: this.retryable,
            stackTrace: this.stack,
            ...this.context
        };

        // Rejected input is an expected outcome, not a fault
        if (this.category === ErrorCategory.VALIDATION) {
            logger.warn(this.message, entry);
            return;
        }
        logger.error(this.message, entry);
    }

    public toJSON(): object {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            category: this.category,
            retryable: this.retryable,
            timestamp: this.timestamp.toISOString(),
            correlationId: this.correlationId,
            context: this.context
        };
    }
}

export class InputTooLongError extends BaseError {
    public readonly length: number;
    public readonly maxLength: number;

    constructor(length: number, maxLength: number, context: LogContext = {}) {
        super(`Input is ${length} characters long; the maximum is ${maxLength}`, 'INPUT_TOO_LONG', ErrorCategory.VALIDATION, false, {
            ...context,
            length,
            maxLength,
            errorType: 'input_too_long'
        });
        this.length = length;
        this.maxLength = maxLength;
    }
}

export class SuspiciousPatternError extends BaseError {
    public readonly rule: string;

    constructor(message: string, rule: string, context: LogContext = {}) {
        super(message, 'SUSPICIOUS_PATTERN', ErrorCategory.VALIDATION, false, {
            ...context,
            rule,
            errorType: 'suspicious_pattern'
        });
        this.rule = rule;
    }
}

export class PatternTimeoutError extends BaseError {
    public readonly timeoutMs: number;

    constructor(timeoutMs: number, context: LogContext = {}) {
        super(`Pattern evaluation exceeded ${timeoutMs}ms`, 'TIMEOUT_EXCEEDED', ErrorCategory.VALIDATION, false, {
            ...context,
            timeoutMs,
            errorType: 'pattern_timeout'
        });
        this.timeoutMs = timeoutMs;
    }
}

export class UnparseableComponentError extends BaseError {
    public readonly component: string;
    public readonly fragment: string;

    constructor(component: string, fragment: string, detail: string, context: LogContext = {}) {
        super(`Could not interpret ${component} "${fragment}": ${detail}`, 'UNPARSEABLE_COMPONENT', ErrorCategory.PROCESSING, false, {
            ...context,
            component,
            fragment,
            errorType: 'unparseable_component'
        });
        this.component = component;
        this.fragment = fragment;
    }
}

export class ValidationError extends BaseError {
    public readonly field?: string;
    public readonly value?: unknown;

    constructor(message: string, field?: string, value?: unknown, context: LogContext = {}) {
        super(message, 'VALIDATION_ERROR', ErrorCategory.VALIDATION, false, {
            ...context,
            field,
            value: typeof value === 'object' ? JSON.stringify(value) : value,
            errorType: 'validation_failure'
        });
        this.field = field;
        this.value = value;
    }
}

/**
 * Raised by the token manager and by the fetcher after a refreshed token is
 * rejected a second time. `retryable` separates transient failures (network,
 * 5xx) from terminal ones (bad credentials).
 */
export class AuthenticationError extends BaseError {
    public readonly status?: number;

    constructor(message: string, retryable: boolean = false, status?: number, context: LogContext = {}) {
        super(message, 'AUTHENTICATION_ERROR', ErrorCategory.AUTHENTICATION, retryable, {
            ...context,
            status,
            errorType: 'authentication_failure'
        });
        this.status = status;
    }
}

export type FetchErrorCode = 'FETCH_ERROR' | 'FETCH_ABORTED' | 'FETCH_TIMEOUT' | 'INVALID_RESPONSE';

export class FetchError extends BaseError {
    public readonly pageIndex: number;
    public readonly status?: number;

    constructor(
        message: string,
        pageIndex: number,
        retryable: boolean,
        status?: number,
        code: FetchErrorCode = 'FETCH_ERROR',
        context: LogContext = {}
    ) {
        super(message, code, ErrorCategory.NETWORK, retryable, {
            ...context,
            pageIndex,
            status,
            errorType: 'fetch_failure'
        });
        this.pageIndex = pageIndex;
        this.status = status;
    }
}

export class ConfigurationError extends BaseError {
    public readonly details: string[];

    constructor(message: string, details: string[] = [], context: LogContext = {}) {
        super(message, 'CONFIGURATION_ERROR', ErrorCategory.CONFIGURATION, false, {
            ...context,
            details,
            errorType: 'configuration_failure'
        });
        this.details = details;
    }
}

export class OperationCancelledError extends BaseError {
    public readonly operation: string;

    constructor(operation: string, context: LogContext = {}) {
        super(`Operation ${operation} was cancelled`, 'OPERATION_CANCELLED', ErrorCategory.SYSTEM, false, {
            ...context,
            operation,
            errorType: 'cancelled'
        });
        this.operation = operation;
    }
}

export class SystemError extends BaseError {
    public readonly component: string;

    constructor(message: string, component: string, context: LogContext = {}) {
        super(message, 'SYSTEM_ERROR', ErrorCategory.SYSTEM, false, {
            ...context,
            component,
            errorType: 'system_failure'
        });
        this.component = component;
    }
}

export function isRejectionError(error: unknown): error is InputTooLongError | SuspiciousPatternError | PatternTimeoutError {
    return error instanceof InputTooLongError
        || error instanceof SuspiciousPatternError
        || error instanceof PatternTimeoutError;
}

// Error handler utility functions
export class ErrorHandler {
    public static handleError(error: unknown, operation: string, context: LogContext = {}): BaseError {
        if (error instanceof BaseError) {
            return error;
        }

        const original = error instanceof Error ? error : new Error(String(error));
        return new SystemError(original.message, operation, {
            ...context,
            operation,
            originalErrorName: original.name
        });
    }

    public static isRetryable(error: unknown): boolean {
        if (error instanceof BaseError) {
            return error.retryable;
        }
        if (!(error instanceof Error)) {
            return false;
        }

        const retryableErrors = [
            'ECONNRESET',
            'ECONNREFUSED',
            'ETIMEDOUT',
            'ENOTFOUND'
        ];

        return retryableErrors.some(code => error.message.includes(code));
    }

    public static getErrorCategory(error: unknown): ErrorCategory {
        if (error instanceof BaseError) {
            return error.category;
        }
        if (!(error instanceof Error)) {
            return ErrorCategory.SYSTEM;
        }

        const message = error.message.toLowerCase();
        if (message.includes('timeout') || message.includes('connection')) {
            return ErrorCategory.NETWORK;
        }
        if (message.includes('auth')) {
            return ErrorCategory.AUTHENTICATION;
        }
        if (message.includes('validation')) {
            return ErrorCategory.VALIDATION;
        }

        return ErrorCategory.SYSTEM;
    }

    public static createErrorResponse(error: unknown, correlationId?: string): ErrorResponse {
        const baseError = ErrorHandler.handleError(error, 'unknown');

        return {
            error: {
                code: baseError.code,
                message: baseError.message,
                category: baseError.category,
                retryable: baseError.retryable,
                timestamp: baseError.timestamp.toISOString(),
                correlationId: correlationId || baseError.correlationId,
                details: baseError.context
            }
        };
    }
}
