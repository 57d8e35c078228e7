/**
 * KeelDB - Configuration
 *
 * Environment configuration and connection URLs, validated with zod.
 *
 *   KEELDB_DATA_DIR   directory for catalog.json and database files (./data)
 *   KEELDB_DATABASE   database to USE at start
 *   KEELDB_URL        keeldb://localhost/<database>?data_dir=<path>
 *   LOG_LEVEL         trace | debug | info | warn | error | fatal | silent
 */

import { z } from 'zod';
import { ErrorCode, SchemaError } from '../errors';
import { validateIdentifier } from '../parser/validators';
import type { LogLevel } from '../utils/logger';

export const URL_SCHEME = 'keeldb:';
export const DEFAULT_DATA_DIR = './data';
export const DEFAULT_URL_DATA_DIR = 'data';

const logLevelSchema = z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']));

export const envSchema = z.object({
    KEELDB_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
    KEELDB_DATABASE: z.string().min(1).optional(),
    KEELDB_URL: z.string().min(1).optional(),
    LOG_LEVEL: logLevelSchema.optional(),
});

export interface KeelConfig {
    dataDir: string;
    database?: string;
    logLevel?: LogLevel;
}

/**
 * Parsed `keeldb://host/database?data_dir=path` URL.
 */
export interface ConnectionUrl {
    host: string;
    database: string;
    dataDir: string;
}

function configError(message: string): SchemaError {
    return new SchemaError(ErrorCode.INVALID_CONFIG, message);
}

/**
 * Parse a connection URL. An empty host means localhost; the data directory
 * defaults to `data`.
 */
export function parseConnectionUrl(url: string, defaultDataDir: string = DEFAULT_URL_DATA_DIR): ConnectionUrl {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        throw new SchemaError(ErrorCode.INVALID_CONFIG, `Invalid connection URL '${url}'`, {
            metadata: { cause: error instanceof Error ? error.message : String(error) },
        });
    }

    if (parsed.protocol !== URL_SCHEME) {
        throw configError(`Connection URL must start with ${URL_SCHEME}//, got '${url}'`);
    }

    const database = decodeURIComponent(parsed.pathname.replace(/^\/+/, '').replace(/\/+$/, ''));
    if (database.length === 0) {
        throw configError(`Connection URL '${url}' does not name a database`);
    }
    validateIdentifier(database, 'database');

    return {
        host: parsed.hostname || 'localhost',
        database,
        dataDir: parsed.searchParams.get('data_dir') || defaultDataDir,
    };
}

/**
 * Read configuration from the environment. KEELDB_URL, when set, supplies
 * the database and (through data_dir) the data directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KeelConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw configError(`Invalid configuration: ${issues}`);
    }

    const values = result.data;
    const config: KeelConfig = { dataDir: values.KEELDB_DATA_DIR };

    if (values.KEELDB_URL !== undefined) {
        const connection = parseConnectionUrl(values.KEELDB_URL, values.KEELDB_DATA_DIR);
        config.dataDir = connection.dataDir;
        config.database = connection.database;
    }
    if (values.KEELDB_DATABASE !== undefined) {
        config.database = values.KEELDB_DATABASE;
    }
    if (values.LOG_LEVEL !== undefined) {
        config.logLevel = values.LOG_LEVEL;
    }

    return config;
}
