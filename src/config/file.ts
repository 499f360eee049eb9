import { promises as fs } from 'fs';
import { ConfigurationError } from '../utils/errors';
import { loadFromEnv } from './env';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// fs errors may come from another realm, so their shape is checked rather than their class.
function errorCode(error: unknown): string | undefined {
    return isPlainObject(error) && typeof error.code === 'string' ? error.code : undefined;
}

function errorMessage(error: unknown): string {
    if (isPlainObject(error) && typeof error.message === 'string') {
        return error.message;
    }
    return 'Unknown error';
}

/**
 * Reads a JSON configuration file and layers it over the environment-derived
 * configuration, so credentials may stay in the environment. The result is
 * unvalidated; pass it through `validateConfig`.
 */
export async function loadFromFile(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<Record<string, unknown>> {
    let configData: string;
    try {
        configData = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') {
            throw new ConfigurationError(`Configuration file not found: ${configPath}`);
        }
        throw new ConfigurationError(`Failed to load configuration file: ${errorMessage(error)}`);
    }

    let parsedConfig: unknown;
    try {
        parsedConfig = JSON.parse(configData);
    } catch (error) {
        throw new ConfigurationError(`Configuration file is not valid JSON: ${errorMessage(error)}`);
    }
    if (!isPlainObject(parsedConfig)) {
        throw new ConfigurationError('Configuration file must contain a JSON object');
    }

    return mergeWithBase(parsedConfig, { ...loadFromEnv(env) });
}

export function mergeWithBase(config: Record<string, unknown>, base: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(config)) {
        const current = merged[key];
        if (isPlainObject(value) && isPlainObject(current)) {
            merged[key] = mergeWithBase(value, current);
        } else {
            merged[key] = value;
        }
    }

    return merged;
}
