import Joi from 'joi';
import { SystemConfig } from '../models/config';
import { ConfigurationError } from '../utils/errors';

const configSchema = Joi.object({
    instance: Joi.object({
        url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
        authType: Joi.string().valid('oauth', 'basic').required(),
        clientId: Joi.string().optional(),
        clientSecret: Joi.string().optional(),
        username: Joi.string().optional(),
        password: Joi.string().optional()
    }).required(),

    http: Joi.object({
        timeout: Joi.number().integer().positive().required(),
        userAgent: Joi.string().required()
    }).required(),

    pagination: Joi.object({
        defaultPageSize: Joi.number().integer().min(1).max(10000).required(),
        maxRecords: Joi.number().integer().positive().required(),
        maxPages: Joi.number().integer().positive().required(),
        fetchMode: Joi.string().valid('strict', 'best-effort').required()
    }).required(),

    safety: Joi.object({
        maxInputLength: Joi.number().integer().positive().required(),
        maxMetacharacters: Joi.number().integer().min(0).required(),
        maxNestingDepth: Joi.number().integer().min(0).required(),
        maxWhitespace: Joi.number().integer().min(0).required(),
        maxDashes: Joi.number().integer().min(0).required(),
        regexTimeoutMs: Joi.number().integer().positive().required()
    }).required(),

    token: Joi.object({
        refreshBufferSeconds: Joi.number().integer().min(0).required(),
        defaultExpiresIn: Joi.number().integer().positive().required()
    }).required(),

    intelligence: Joi.object({
        templateThreshold: Joi.number().min(0).max(1).required(),
        fallbackConfidence: Joi.number().min(0).max(1).required(),
        knownEntities: Joi.object().pattern(Joi.string(), Joi.string()).required()
    }).required(),

    logging: Joi.object({
        level: Joi.string().valid('debug', 'info', 'warn', 'error').required(),
        file: Joi.string().optional()
    }).required()
});

export function validateConfig(config: unknown): SystemConfig {
    const { error, value } = configSchema.validate(config, {
        abortEarly: false,
        allowUnknown: false,
        stripUnknown: true
    });

    if (error) {
        const details = error.details.map(d => d.message);
        throw new ConfigurationError(`Configuration validation failed: ${details.join(', ')}`, details);
    }

    const validated = value as SystemConfig;
    validateCrossFieldConstraints(validated);

    return validated;
}

function validateCrossFieldConstraints(config: SystemConfig): void {
    const { instance, pagination } = config;

    if (instance.authType === 'oauth' && (!instance.clientId || !instance.clientSecret)) {
        throw new ConfigurationError('OAuth authentication requires a client id and client secret');
    }

    if (instance.authType === 'basic' && (!instance.username || !instance.password)) {
        throw new ConfigurationError('Basic authentication requires a username and password');
    }

    if (pagination.defaultPageSize > pagination.maxRecords) {
        throw new ConfigurationError('Default page size cannot exceed the maximum record count');
    }
}
