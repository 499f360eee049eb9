import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager, defaultConfig, loadFromEnv, loadFromFile, mergeWithBase, validateConfig } from '../../config';
import { SystemConfig } from '../../models/config';
import { ConfigurationError } from '../../utils/errors';

jest.mock('../../utils/logger');

function validConfig(overrides: Partial<SystemConfig> = {}): SystemConfig {
    return {
        ...defaultConfig,
        instance: {
            url: 'https://example.service-now.com',
            authType: 'oauth',
            clientId: 'test-client',
            clientSecret: 'test-secret'
        },
        ...overrides
    };
}

describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
        const config = validateConfig(validConfig());

        expect(config.instance.url).toBe('https://example.service-now.com');
        expect(config.pagination.defaultPageSize).toBe(250);
        expect(config.safety.maxInputLength).toBe(200);
    });

    it('should reject a missing instance URL', () => {
        expect(() => validateConfig(defaultConfig)).toThrow(ConfigurationError);
    });

    it('should report every validation problem', () => {
        const config = validConfig({
            pagination: { defaultPageSize: 0, maxRecords: 1000, maxPages: 100, fetchMode: 'strict' },
            logging: { level: 'error' }
        });
        const broken = { ...config, safety: { ...config.safety, regexTimeoutMs: -1 } };

        let caught: unknown;
        try {
            validateConfig(broken);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        const details = caught instanceof ConfigurationError ? caught.details : [];
        expect(details).toHaveLength(2);
        expect(details.some(detail => detail.includes('defaultPageSize'))).toBe(true);
        expect(details.some(detail => detail.includes('regexTimeoutMs'))).toBe(true);
    });

    it('should require OAuth client credentials', () => {
        const config = validConfig({ instance: { url: 'https://example.service-now.com', authType: 'oauth' } });

        expect(() => validateConfig(config)).toThrow('OAuth authentication requires a client id and client secret');
    });

    it('should require basic credentials', () => {
        const config = validConfig({
            instance: { url: 'https://example.service-now.com', authType: 'basic', username: 'test-user' }
        });

        expect(() => validateConfig(config)).toThrow('Basic authentication requires a username and password');
    });

    it('should reject a page size above the record cap', () => {
        const config = validConfig({
            pagination: { defaultPageSize: 500, maxRecords: 100, maxPages: 10, fetchMode: 'strict' }
        });

        expect(() => validateConfig(config)).toThrow('Default page size cannot exceed the maximum record count');
    });

    it('should strip unknown keys', () => {
        const config = validateConfig({ ...validConfig(), server: { port: 3000 } });

        expect(Object.keys(config)).not.toContain('server');
    });
});

describe('loadFromEnv', () => {
    it('should read instance settings from the environment', () => {
        const config = loadFromEnv({
            SERVICENOW_INSTANCE: 'https://example.service-now.com/',
            SERVICENOW_AUTH_TYPE: 'basic',
            SERVICENOW_USERNAME: 'test-user',
            SERVICENOW_PASSWORD: 'test-secret',
            PAGE_SIZE: '100',
            FETCH_MODE: 'best-effort',
            LOG_LEVEL: 'debug'
        });

        expect(config.instance).toEqual({
            url: 'https://example.service-now.com',
            authType: 'basic',
            clientId: undefined,
            clientSecret: undefined,
            username: 'test-user',
            password: 'test-secret'
        });
        expect(config.pagination.defaultPageSize).toBe(100);
        expect(config.pagination.fetchMode).toBe('best-effort');
        expect(config.logging.level).toBe('debug');
    });

    it('should fall back to defaults for unknown values', () => {
        const config = loadFromEnv({ SERVICENOW_AUTH_TYPE: 'kerberos', FETCH_MODE: 'eager', LOG_LEVEL: 'loud' });

        expect(config.instance.authType).toBe('oauth');
        expect(config.pagination.fetchMode).toBe('strict');
        expect(config.logging.level).toBe('info');
        expect(config.intelligence.templateThreshold).toBe(0.75);
    });
});

describe('mergeWithBase', () => {
    it('should merge nested objects and replace other values', () => {
        const merged = mergeWithBase(
            { pagination: { maxRecords: 50 }, tables: ['incident'] },
            { pagination: { maxRecords: 1000, maxPages: 100 }, tables: ['change_request'] }
        );

        expect(merged).toEqual({
            pagination: { maxRecords: 50, maxPages: 100 },
            tables: ['incident']
        });
    });
});

describe('loadFromFile', () => {
    const tempConfigPath = path.join(__dirname, 'temp-config.json');

    afterEach(() => {
        if (fs.existsSync(tempConfigPath)) {
            fs.unlinkSync(tempConfigPath);
        }
    });

    it('should layer the file over the environment', async () => {
        fs.writeFileSync(tempConfigPath, JSON.stringify({
            instance: { url: 'https://example.service-now.com' },
            pagination: { maxRecords: 500 }
        }));

        const raw = await loadFromFile(tempConfigPath, { SERVICENOW_CLIENT_ID: 'test-client', SERVICENOW_CLIENT_SECRET: 'test-secret' });
        const config = validateConfig(raw);

        expect(config.instance.url).toBe('https://example.service-now.com');
        expect(config.instance.clientId).toBe('test-client');
        expect(config.pagination.maxRecords).toBe(500);
        expect(config.pagination.defaultPageSize).toBe(250);
    });

    it('should report a missing file', async () => {
        const missing = path.join(__dirname, 'missing-config.json');

        await expect(loadFromFile(missing, {})).rejects.toThrow(`Configuration file not found: ${missing}`);
    });

    it('should recognize a missing file by its error code', async () => {
        const readFile = jest.spyOn(fs.promises, 'readFile').mockRejectedValueOnce({ code: 'ENOENT', message: 'no such file' });

        await expect(loadFromFile(tempConfigPath, {})).rejects.toThrow(`Configuration file not found: ${tempConfigPath}`);
        readFile.mockRestore();
    });

    it('should report other read failures with their message', async () => {
        const readFile = jest.spyOn(fs.promises, 'readFile').mockRejectedValueOnce({ code: 'EACCES', message: 'permission denied' });

        await expect(loadFromFile(tempConfigPath, {})).rejects.toThrow('Failed to load configuration file: permission denied');
        readFile.mockRestore();
    });

    it('should reject invalid JSON', async () => {
        fs.writeFileSync(tempConfigPath, '{ not json');

        await expect(loadFromFile(tempConfigPath, {})).rejects.toThrow('Configuration file is not valid JSON');
    });

    it('should reject a file that is not an object', async () => {
        fs.writeFileSync(tempConfigPath, '[1, 2]');

        await expect(loadFromFile(tempConfigPath, {})).rejects.toThrow('Configuration file must contain a JSON object');
    });
});

describe('ConfigManager', () => {
    const tempConfigPath = path.join(__dirname, 'manager-config.json');

    afterEach(() => {
        if (fs.existsSync(tempConfigPath)) {
            fs.unlinkSync(tempConfigPath);
        }
    });

    it('should be a singleton', () => {
        expect(ConfigManager.getInstance()).toBe(ConfigManager.getInstance());
    });

    it('should load and return configuration', async () => {
        fs.writeFileSync(tempConfigPath, JSON.stringify(validConfig({ logging: { level: 'warn' } })));
        const manager = ConfigManager.getInstance();

        const loaded = await manager.loadConfig(tempConfigPath);

        expect(manager.getConfig()).toBe(loaded);
        expect(loaded.logging.level).toBe('warn');
    });

    it('should keep ConfigurationErrors from an invalid file', async () => {
        fs.writeFileSync(tempConfigPath, JSON.stringify({ instance: { url: 'not a url' } }));

        await expect(ConfigManager.getInstance().loadConfig(tempConfigPath)).rejects.toThrow(ConfigurationError);
    });
});
