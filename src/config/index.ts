import { fileURLToPath } from 'url';

export interface AppConfig {
    /** HTTP port for `serve` and the API entry point */
    port: number;
    host: string;
    logLevel: string;
    /** Maximum accepted JSON body, in body-parser notation */
    requestBodyLimit: string;
    /** Path of the mapping group data file */
    mappingsFile: string;
}

const DEFAULT_MAPPINGS_FILE = fileURLToPath(new URL('../../data/mm-im-mappings.json', import.meta.url));

function parsePort(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const port = Number.parseInt(value, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`Invalid PORT value: ${value}`);
    }
    return port;
}

/**
 * Builds the configuration from an environment map. Exposed for tests; the
 * rest of the code uses the default export.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
    return Object.freeze({
        port: parsePort(env.PORT, 8001),
        host: env.HOST || '0.0.0.0',
        logLevel: env.LOG_LEVEL || 'info',
        requestBodyLimit: env.REQUEST_BODY_LIMIT || '5mb',
        mappingsFile: env.MAPPINGS_FILE || DEFAULT_MAPPINGS_FILE,
    });
}

const config = loadConfig();

export default config;
