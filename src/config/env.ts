import * as dotenv from 'dotenv';
import { AuthType, FetchMode, LoggingConfig, SystemConfig } from '../models/config';
import { defaultConfig } from './defaults';

function parseAuthType(value: string | undefined): AuthType {
    return value === 'basic' ? 'basic' : defaultConfig.instance.authType;
}

function parseFetchMode(value: string | undefined): FetchMode {
    if (value === 'strict' || value === 'best-effort') {
        return value;
    }
    return defaultConfig.pagination.fetchMode;
}

function parseLogLevel(value: string | undefined): LoggingConfig['level'] {
    if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
        return value;
    }
    return defaultConfig.logging.level;
}

/**
 * Builds a configuration from `SERVICENOW_*` and tuning variables. A `.env`
 * file in the working directory is read first when present.
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): SystemConfig {
    if (env === process.env) {
        dotenv.config();
    }

    return {
        instance: {
            url: (env.SERVICENOW_INSTANCE || defaultConfig.instance.url).replace(/\/+$/, ''),
            authType: parseAuthType(env.SERVICENOW_AUTH_TYPE),
            clientId: env.SERVICENOW_CLIENT_ID,
            clientSecret: env.SERVICENOW_CLIENT_SECRET,
            username: env.SERVICENOW_USERNAME,
            password: env.SERVICENOW_PASSWORD
        },
        http: {
            timeout: parseInt(env.HTTP_TIMEOUT || String(defaultConfig.http.timeout)),
            userAgent: env.HTTP_USER_AGENT || defaultConfig.http.userAgent
        },
        pagination: {
            defaultPageSize: parseInt(env.PAGE_SIZE || String(defaultConfig.pagination.defaultPageSize)),
            maxRecords: parseInt(env.MAX_RECORDS || String(defaultConfig.pagination.maxRecords)),
            maxPages: parseInt(env.MAX_PAGES || String(defaultConfig.pagination.maxPages)),
            fetchMode: parseFetchMode(env.FETCH_MODE)
        },
        safety: {
            ...defaultConfig.safety,
            maxInputLength: parseInt(env.MAX_INPUT_LENGTH || String(defaultConfig.safety.maxInputLength)),
            regexTimeoutMs: parseInt(env.REGEX_TIMEOUT_MS || String(defaultConfig.safety.regexTimeoutMs))
        },
        token: {
            refreshBufferSeconds: parseInt(env.TOKEN_REFRESH_BUFFER_SECONDS || String(defaultConfig.token.refreshBufferSeconds)),
            defaultExpiresIn: defaultConfig.token.defaultExpiresIn
        },
        intelligence: {
            templateThreshold: parseFloat(env.TEMPLATE_THRESHOLD || String(defaultConfig.intelligence.templateThreshold)),
            fallbackConfidence: parseFloat(env.FALLBACK_CONFIDENCE || String(defaultConfig.intelligence.fallbackConfidence)),
            knownEntities: { ...defaultConfig.intelligence.knownEntities }
        },
        logging: {
            level: parseLogLevel(env.LOG_LEVEL),
            file: env.LOG_FILE
        }
    };
}
