import { ConfigManager } from './config';
import { createAuthProvider } from './data/auth';
import { createHttpClient } from './data/http';
import { TableApiConnector } from './data/connectors/tableApi';
import { SystemConfig } from './models/config';
import { QueryIntelligenceEngine } from './services/intelligence/queryIntelligence';
import { ChainedEntityResolver, StaticEntityResolver, UserTableResolver } from './services/intelligence/entityResolver';
import { InputGuard } from './services/inputGuard';
import { TableQueryService } from './services/tableQueryService';
import { ErrorHandler } from './utils/errors';
import { logger } from './utils/logger';

export interface QueryEngine {
    service: TableQueryService;
    connector: TableApiConnector;
    engine: QueryIntelligenceEngine;
}

/**
 * Wires the HTTP client, credentials, connector, intelligence engine and
 * service for one instance.
 */
export function createQueryEngine(config: SystemConfig): QueryEngine {
    const http = createHttpClient(config.http);
    const auth = createAuthProvider(config.instance, config.token, http);
    const connector = new TableApiConnector(config.instance.url, config.pagination, http, auth);
    const guard = new InputGuard(config.safety);
    const engine = new QueryIntelligenceEngine(config, {
        guard,
        resolver: new ChainedEntityResolver([
            new StaticEntityResolver(config.intelligence.knownEntities),
            new UserTableResolver(connector)
        ])
    });
    const service = new TableQueryService(config, { source: connector, engine, guard });
    return { service, connector, engine };
}

async function main(): Promise<void> {
    const config = await ConfigManager.getInstance().loadConfig(process.env.CONFIG_FILE);
    logger.configure({ level: config.logging.level, file: config.logging.file });
    logger.info('Ticket query engine starting', {
        operation: 'main',
        instance: config.instance.url,
        authType: config.instance.authType
    });

    const { connector } = createQueryEngine(config);
    const health = await connector.healthCheck();
    if (!health.isHealthy) {
        logger.error('Instance is not reachable', { operation: 'main', error: health.lastError });
        process.exitCode = 1;
        return;
    }
    logger.info('Connected to instance', { operation: 'main', responseTime: health.responseTime });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        const handled = ErrorHandler.handleError(error, 'main');
        logger.error('Failed to start ticket query engine', { operation: 'main', errorCode: handled.code });
        process.exit(1);
    });
}

export * from './config';
export * from './data/auth';
export * from './data/connectors/base';
export * from './data/connectors/tableApi';
export * from './data/http';
export * from './models/config';
export * from './models/filter';
export * from './models/intelligence';
export * from './models/record';
export * from './services/filterCompiler';
export * from './services/filterExplainer';
export * from './services/filterValidator';
export * from './services/inputGuard';
export * from './services/intelligence/components';
export * from './services/intelligence/dateParser';
export * from './services/intelligence/entityResolver';
export * from './services/intelligence/exclusion';
export * from './services/intelligence/queryIntelligence';
export * from './services/intelligence/templates';
export * from './services/keywordExtractor';
export * from './services/tableCatalog';
export * from './services/tableQueryService';
export * from './utils/errors';
export { logger, StructuredLogger } from './utils/logger';
export type { Logger, LogContext, LoggerOptions } from './utils/logger';
