export type AuthType = 'oauth' | 'basic';

export type FetchMode = 'strict' | 'best-effort';

export interface SystemConfig {
    instance: InstanceConfig;
    http: HttpConfig;
    pagination: PaginationConfig;
    safety: SafetyConfig;
    token: TokenConfig;
    intelligence: IntelligenceConfig;
    logging: LoggingConfig;
}

export interface InstanceConfig {
    /** Base URL of the ticketing instance, e.g. https://example.service-now.com */
    url: string;
    authType: AuthType;
    clientId?: string;
    clientSecret?: string;
    username?: string;
    password?: string;
}

export interface HttpConfig {
    timeout: number;
    userAgent: string;
}

export interface PaginationConfig {
    defaultPageSize: number;
    maxRecords: number;
    maxPages: number;
    fetchMode: FetchMode;
}

export interface SafetyConfig {
    maxInputLength: number;
    maxMetacharacters: number;
    maxNestingDepth: number;
    maxWhitespace: number;
    maxDashes: number;
    regexTimeoutMs: number;
}

export interface TokenConfig {
    refreshBufferSeconds: number;
    defaultExpiresIn: number;
}

export interface IntelligenceConfig {
    templateThreshold: number;
    /** Below this, intelligent search falls back to plain text search. */
    fallbackConfidence: number;
    /** Display name (lower-case) to record identifier, for exclusion phrases. */
    knownEntities: Record<string, string>;
}

export interface LoggingConfig {
    level: 'debug' | 'info' | 'warn' | 'error';
    file?: string;
}
