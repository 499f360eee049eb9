import { SystemConfig } from '../models/config';

export const defaultConfig: SystemConfig = {
    instance: {
        url: '',
        authType: 'oauth'
    },
    http: {
        timeout: 30000, // 30 seconds
        userAgent: 'ticket-query-engine/1.0'
    },
    pagination: {
        defaultPageSize: 250,
        maxRecords: 1000,
        maxPages: 100,
        fetchMode: 'strict'
    },
    safety: {
        maxInputLength: 200,
        maxMetacharacters: 10,
        maxNestingDepth: 3,
        maxWhitespace: 50,
        maxDashes: 20,
        regexTimeoutMs: 100
    },
    token: {
        refreshBufferSeconds: 300, // 5 minutes
        defaultExpiresIn: 1800 // 30 minutes
    },
    intelligence: {
        templateThreshold: 0.75,
        fallbackConfidence: 0.3,
        knownEntities: {}
    },
    logging: {
        level: 'info'
    }
};
