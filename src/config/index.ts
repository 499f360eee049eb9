import { SystemConfig } from '../models/config';
import { BaseError, ConfigurationError } from '../utils/errors';
import { loadFromEnv } from './env';
import { loadFromFile } from './file';
import { validateConfig } from './validation';

export class ConfigManager {
    private static instance: ConfigManager | undefined;
    private config: SystemConfig | null = null;

    private constructor() { }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    /**
     * Loads from a JSON file layered over the environment when a path is
     * given, otherwise from the environment alone.
     */
    public async loadConfig(configPath?: string): Promise<SystemConfig> {
        try {
            const rawConfig = configPath
                ? await loadFromFile(configPath)
                : loadFromEnv();

            this.config = validateConfig(rawConfig);
            return this.config;
        } catch (error) {
            if (error instanceof BaseError) {
                throw error;
            }
            throw new ConfigurationError(`Failed to load configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
    }

    public getConfig(): SystemConfig {
        if (!this.config) {
            throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
        }
        return this.config;
    }
}

export * from './defaults';
export * from './env';
export * from './file';
export * from './validation';
