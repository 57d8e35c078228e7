/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, parseConnectionUrl } from '../index';
import { ErrorCode, SchemaError } from '../../errors';

describe('parseConnectionUrl', () => {
    it('reads host, database and data directory', () => {
        expect(parseConnectionUrl('keeldb://localhost/shop?data_dir=/tmp/keel')).toEqual({
            host: 'localhost',
            database: 'shop',
            dataDir: '/tmp/keel',
        });
    });

    it('defaults the host and data directory', () => {
        expect(parseConnectionUrl('keeldb:///shop')).toEqual({
            host: 'localhost',
            database: 'shop',
            dataDir: 'data',
        });
    });

    it('rejects other schemes and missing database names', () => {
        expect(() => parseConnectionUrl('postgres://localhost/shop')).toThrow(
            "Connection URL must start with keeldb://, got 'postgres://localhost/shop'"
        );
        expect(() => parseConnectionUrl('keeldb://localhost/')).toThrow(
            "Connection URL 'keeldb://localhost/' does not name a database"
        );
        expect(() => parseConnectionUrl('not a url')).toThrow("Invalid connection URL 'not a url'");
    });

    it('validates the database name', () => {
        expect(() => parseConnectionUrl('keeldb://localhost/bad.name')).toThrow(SchemaError);
    });
});

describe('loadConfig', () => {
    it('uses defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({ dataDir: './data' });
    });

    it('reads every variable', () => {
        expect(loadConfig({
            KEELDB_DATA_DIR: '/var/keel',
            KEELDB_DATABASE: 'shop',
            LOG_LEVEL: 'DEBUG',
        })).toEqual({ dataDir: '/var/keel', database: 'shop', logLevel: 'debug' });
    });

    it('takes database and data directory from KEELDB_URL', () => {
        expect(loadConfig({ KEELDB_URL: 'keeldb://localhost/crm?data_dir=/srv/keel' })).toEqual({
            dataDir: '/srv/keel',
            database: 'crm',
        });
        expect(loadConfig({ KEELDB_URL: 'keeldb:///crm', KEELDB_DATA_DIR: '/opt/keel' })).toEqual({
            dataDir: '/opt/keel',
            database: 'crm',
        });
    });

    it('rejects unknown log levels', () => {
        try {
            loadConfig({ LOG_LEVEL: 'loud' });
            expect.unreachable('loadConfig should throw');
        } catch (error) {
            expect(error).toBeInstanceOf(SchemaError);
            if (error instanceof SchemaError) {
                expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
                expect(error.message).toMatch(/^Invalid configuration: LOG_LEVEL: /);
            }
        }
    });
});
