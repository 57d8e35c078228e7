/**
 * KeelDB - Persistence
 *
 * JSON files under a data directory:
 *
 *   <dataDir>/catalog.json              { "databases": ["shop", ...] }
 *   <dataDir>/databases/<name>.json     one document per database
 *
 * Writes go to `<file>.tmp` first and are renamed over the target, so a
 * reader never sees a half-written file. Documents are validated with zod
 * on load; indexes are rebuilt by re-inserting every row.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Database, DATABASE_VERSION } from './Database';
import { ErrorCode, KeelError, StorageError } from '../errors';
import { createLogger, type Logger } from '../utils/logger';
import type { SerializedDatabase } from '../types';

export const CATALOG_FILE = 'catalog.json';
export const DATABASES_DIR = 'databases';

// =============================================================================
// Document Schemas
// =============================================================================

const valueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

const columnSchema = z.object({
    name: z.string().min(1),
    type: z.enum(['INT', 'FLOAT', 'STRING', 'BOOL']),
    primaryKey: z.boolean(),
    unique: z.boolean(),
    references: z
        .object({
            table: z.string().min(1),
            column: z.string().min(1),
        })
        .optional(),
});

const tableSchema = z.object({
    name: z.string().min(1),
    columns: z.array(columnSchema),
    rows: z.array(z.array(valueSchema)),
});

export const databaseDocumentSchema = z.object({
    version: z.string(),
    name: z.string().min(1),
    savedAt: z.string(),
    tables: z.array(tableSchema),
});

export const catalogDocumentSchema = z.object({
    databases: z.array(z.string().min(1)),
});

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

// =============================================================================
// Persistence
// =============================================================================

export class Persistence {
    private readonly dataDir: string;
    private readonly logger: Logger;

    constructor(dataDir: string, logger: Logger = createLogger('storage')) {
        this.dataDir = path.resolve(dataDir);
        this.logger = logger;
    }

    getDataDir(): string {
        return this.dataDir;
    }

    /**
     * Path of a database document.
     */
    databasePath(name: string): string {
        return path.join(this.dataDir, DATABASES_DIR, `${name}.json`);
    }

    catalogPath(): string {
        return path.join(this.dataDir, CATALOG_FILE);
    }

    databaseExists(name: string): boolean {
        return fs.existsSync(this.databasePath(name));
    }

    /**
     * Write a database document atomically.
     */
    saveDatabase(database: Database): void {
        const document = database.serialize();
        this.writeJson(this.databasePath(database.getName()), document);
        this.logger.debug(
            { database: database.getName(), tables: document.tables.length },
            'Flushed database'
        );
    }

    /**
     * Read, validate and rebuild a database.
     */
    loadDatabase(name: string): Database {
        const filePath = this.databasePath(name);
        const parsed = databaseDocumentSchema.safeParse(this.readJson(filePath));

        if (!parsed.success) {
            throw new StorageError(
                ErrorCode.STORAGE_CORRUPT,
                `Database file ${filePath} is invalid: ${describeIssues(parsed.error)}`,
                { context: { database: name } }
            );
        }

        const document: SerializedDatabase = parsed.data;
        if (document.version !== DATABASE_VERSION) {
            this.logger.warn(
                { database: name, fileVersion: document.version, currentVersion: DATABASE_VERSION },
                'Database version mismatch'
            );
        }

        try {
            return Database.deserialize(document);
        } catch (error) {
            if (error instanceof KeelError) {
                throw new StorageError(
                    ErrorCode.STORAGE_CORRUPT,
                    `Database file ${filePath} is inconsistent: ${error.message}`,
                    { cause: error, context: { database: name } }
                );
            }
            throw error;
        }
    }

    /**
     * Remove a database document. Missing files are ignored.
     */
    deleteDatabase(name: string): void {
        const filePath = this.databasePath(name);
        try {
            fs.rmSync(filePath, { force: true });
        } catch (error) {
            throw new StorageError(
                ErrorCode.STORAGE_WRITE_FAILED,
                `Failed to delete ${filePath}`,
                { cause: error, context: { database: name } }
            );
        }
        this.logger.debug({ database: name }, 'Deleted database file');
    }

    /**
     * Database names recorded in catalog.json; empty when the file is absent.
     */
    loadCatalog(): string[] {
        const filePath = this.catalogPath();
        if (!fs.existsSync(filePath)) {
            return [];
        }

        const parsed = catalogDocumentSchema.safeParse(this.readJson(filePath));
        if (!parsed.success) {
            throw new StorageError(
                ErrorCode.STORAGE_CORRUPT,
                `Catalog file ${filePath} is invalid: ${describeIssues(parsed.error)}`
            );
        }
        return parsed.data.databases;
    }

    saveCatalog(databases: readonly string[]): void {
        this.writeJson(this.catalogPath(), { databases: [...databases] });
    }

    private readJson(filePath: string): unknown {
        let content: string;
        try {
            content = fs.readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new StorageError(
                ErrorCode.STORAGE_READ_FAILED,
                `Failed to read ${filePath}`,
                { cause: error }
            );
        }

        try {
            const parsed: unknown = JSON.parse(content);
            return parsed;
        } catch (error) {
            throw new StorageError(
                ErrorCode.STORAGE_CORRUPT,
                `File ${filePath} is not valid JSON`,
                { cause: error }
            );
        }
    }

    private writeJson(filePath: string, document: unknown): void {
        const tmpPath = `${filePath}.tmp`;
        try {
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.writeFileSync(tmpPath, JSON.stringify(document, null, 2));
            fs.renameSync(tmpPath, filePath);
        } catch (error) {
            throw new StorageError(
                ErrorCode.STORAGE_WRITE_FAILED,
                `Failed to write ${filePath}`,
                { cause: error }
            );
        }
    }
}
