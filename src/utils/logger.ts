import { v4 as uuidv4 } from 'uuid';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    correlationId?: string;
    operation?: string;
    table?: string;
    duration?: number;
    errorCode?: string;
    errorCategory?: string;
    stackTrace?: string;
    [key: string]: unknown;
}

export interface StructuredLogEntry {
    timestamp: string;
    level: string;
    message: string;
    correlationId: string;
    service: string;
    context: unknown;
}

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    child(context: LogContext): Logger;
    setCorrelationId(correlationId: string): void;
    getCorrelationId(): string;
}

export interface LoggerOptions {
    level?: string;
    silent?: boolean;
    /** When set, entries are also written as JSON lines to this file. */
    file?: string;
}

const SLOW_OPERATION_MS = 5000;

function optionsFromEnv(): LoggerOptions {
    return {
        level: process.env.LOG_LEVEL || 'info',
        silent: process.env.LOG_SILENT === 'true',
        file: process.env.LOG_FILE || undefined
    };
}

class StructuredLogger implements Logger {
    private winston: winston.Logger;
    private correlationId: string;
    private serviceName: string;
    private options: LoggerOptions;

    constructor(serviceName: string = 'ticket-query-engine', options: LoggerOptions = optionsFromEnv()) {
        this.serviceName = serviceName;
        this.options = options;
        this.correlationId = uuidv4();
        this.winston = this.createWinston(options);
    }

    /**
     * Replaces the level and file output once configuration is loaded.
     * Options left out keep their current value.
     */
    public configure(options: LoggerOptions): void {
        this.options = {
            level: options.level ?? this.options.level,
            silent: options.silent ?? this.options.silent,
            file: options.file ?? this.options.file
        };
        this.winston = this.createWinston(this.options);
    }

    private createWinston(options: LoggerOptions): winston.Logger {
        const consoleTransport = new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.simple(),
                winston.format.printf((info) => {
                    const correlationId = String(info.correlationId || this.correlationId);
                    const contextStr = info.context ? ` ${JSON.stringify(info.context)}` : '';
                    return `[${info.timestamp}] [${correlationId.substring(0, 8)}] ${info.level}: ${info.message}${contextStr}`;
                })
            )
        });
        const fileTransports = options.file ? [new winston.transports.File({ filename: options.file })] : [];

        return winston.createLogger({
            level: options.level || 'info',
            silent: options.silent === true,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json(),
                winston.format.printf((info) => {
                    const logEntry: StructuredLogEntry = {
                        timestamp: String(info.timestamp),
                        level: String(info.level),
                        message: String(info.message),
                        correlationId: String(info.correlationId || this.correlationId),
                        service: this.serviceName,
                        context: info.context || {}
                    };
                    return JSON.stringify(logEntry);
                })
            ),
            transports: [consoleTransport, ...fileTransports]
        });
    }

    private enrichContext(context: LogContext = {}): LogContext {
        return {
            ...context,
            correlationId: context.correlationId || this.correlationId,
            service: this.serviceName
        };
    }

    debug(message: string, context?: LogContext): void {
        this.winston.debug(message, {
            correlationId: this.correlationId,
            context: this.enrichContext(context)
        });
    }

    info(message: string, context?: LogContext): void {
        this.winston.info(message, {
            correlationId: this.correlationId,
            context: this.enrichContext(context)
        });
    }

    warn(message: string, context?: LogContext): void {
        this.winston.warn(message, {
            correlationId: this.correlationId,
            context: this.enrichContext(context)
        });
    }

    error(message: string, context?: LogContext): void {
        this.winston.error(message, {
            correlationId: this.correlationId,
            context: this.enrichContext(context)
        });
    }

    child(context: LogContext): Logger {
        const childLogger = new StructuredLogger(this.serviceName, this.options);
        childLogger.correlationId = context.correlationId || this.correlationId;
        return childLogger;
    }

    setCorrelationId(correlationId: string): void {
        this.correlationId = correlationId;
    }

    getCorrelationId(): string {
        return this.correlationId;
    }

    /**
     * Reports the outcome of an operation; failed or slow ones are logged at
     * warn level, the rest at debug.
     */
    public collectDiagnosticInfo(
        operation: string,
        duration: number,
        success: boolean,
        context: LogContext = {},
        errorCode?: string
    ): void {
        const details: LogContext = { operation, duration, success, errorCode, ...context };
        if (!success || duration > SLOW_OPERATION_MS) {
            this.warn(`Operation ${operation} completed`, details);
        } else {
            this.debug(`Operation ${operation} completed`, details);
        }
    }
}

export const logger: StructuredLogger = new StructuredLogger();

export { StructuredLogger };
