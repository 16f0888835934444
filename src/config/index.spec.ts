// src/config/index.spec.ts
import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig({});

        expect(config).toMatchObject({
            port: 8001,
            host: '0.0.0.0',
            logLevel: 'info',
            requestBodyLimit: '5mb',
        });
        expect(config.mappingsFile.endsWith(path.join('data', 'mm-im-mappings.json'))).toBe(true);
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('should read the environment', () => {
        const config = loadConfig({
            PORT: '9090',
            HOST: '127.0.0.1',
            LOG_LEVEL: 'debug',
            REQUEST_BODY_LIMIT: '1mb',
            MAPPINGS_FILE: '/etc/mm-im/mappings.json',
        });

        expect(config).toEqual({
            port: 9090,
            host: '127.0.0.1',
            logLevel: 'debug',
            requestBodyLimit: '1mb',
            mappingsFile: '/etc/mm-im/mappings.json',
        });
    });

    it('should reject an invalid port', () => {
        expect(() => loadConfig({ PORT: 'http' })).toThrow('Invalid PORT value: http');
        expect(() => loadConfig({ PORT: '70000' })).toThrow('Invalid PORT value: 70000');
    });
});
