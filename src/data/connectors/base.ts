import { LogContext, logger } from '../../utils/logger';

export interface ConnectorMetrics {
    totalRequests: number;
    successfulRequests: number;
    failedRequests: number;
    averageResponseTime: number;
    lastRequestTime?: Date;
}

export interface ConnectorHealth {
    name: string;
    isHealthy: boolean;
    lastCheck: Date;
    responseTime?: number;
    lastError?: string;
}

/**
 * Common bookkeeping for connectors that talk to a remote instance:
 * request metrics, health checks and contextual logging.
 */
export abstract class RemoteConnector {
    protected metrics: ConnectorMetrics;
    protected lastHealthCheck?: Date;

    constructor(
        protected readonly name: string,
        protected readonly instanceUrl: string
    ) {
        this.metrics = RemoteConnector.emptyMetrics();
    }

    /**
     * Makes the cheapest possible authenticated request. Resolves false
     * instead of throwing.
     */
    public abstract testConnection(): Promise<boolean>;

    public async healthCheck(): Promise<ConnectorHealth> {
        const startTime = Date.now();
        const health: ConnectorHealth = {
            name: this.name,
            isHealthy: false,
            lastCheck: new Date()
        };

        try {
            health.isHealthy = await this.testConnection();
        } catch (error) {
            health.lastError = error instanceof Error ? error.message : String(error);
        }
        health.responseTime = Date.now() - startTime;
        this.lastHealthCheck = health.lastCheck;

        this.logOperation(health.isHealthy ? 'debug' : 'warn', 'Health check completed', {
            isHealthy: health.isHealthy,
            responseTime: health.responseTime,
            error: health.lastError
        });
        return health;
    }

    public getMetrics(): ConnectorMetrics {
        return { ...this.metrics };
    }

    public resetMetrics(): void {
        this.metrics = RemoteConnector.emptyMetrics();
    }

    public getLastHealthCheck(): Date | undefined {
        return this.lastHealthCheck;
    }

    protected updateMetrics(success: boolean, responseTime: number): void {
        this.metrics.totalRequests++;
        this.metrics.lastRequestTime = new Date();

        if (success) {
            this.metrics.successfulRequests++;
            // Exponential moving average
            const alpha = 0.1;
            this.metrics.averageResponseTime =
                this.metrics.averageResponseTime * (1 - alpha) + responseTime * alpha;
        } else {
            this.metrics.failedRequests++;
        }
    }

    protected logOperation(level: 'debug' | 'info' | 'warn' | 'error', message: string, context: LogContext = {}): void {
        logger[level](message, {
            connector: this.name,
            instance: this.instanceUrl,
            ...context
        });
    }

    private static emptyMetrics(): ConnectorMetrics {
        return {
            totalRequests: 0,
            successfulRequests: 0,
            failedRequests: 0,
            averageResponseTime: 0
        };
    }
}
