/**
 * KeelDB - Catalog
 *
 * The set of databases known to one engine instance. With a data directory
 * every database is loaded at start and flushed on request; without one the
 * catalog lives in memory only.
 */

import { Database } from './Database';
import { Persistence } from './Persistence';
import { DatabaseNotFoundError, ErrorCode, SchemaError } from '../errors';
import { validateIdentifier } from '../parser/validators';
import { createLogger, type Logger } from '../utils/logger';

export interface CatalogOptions {
    /** Directory holding catalog.json and the database files. */
    dataDir?: string;
    logger?: Logger;
}

function sortNames(names: string[]): string[] {
    return names.sort((a, b) => (a.toLowerCase() < b.toLowerCase() ? -1 : a.toLowerCase() > b.toLowerCase() ? 1 : 0));
}

export class Catalog {
    private readonly databases: Map<string, Database>;
    private readonly persistence: Persistence | null;
    private readonly logger: Logger;

    constructor(options: CatalogOptions = {}) {
        this.databases = new Map();
        this.logger = options.logger ?? createLogger('catalog');
        this.persistence = options.dataDir !== undefined
            ? new Persistence(options.dataDir, this.logger)
            : null;

        this.load();
    }

    /**
     * Load every database listed in catalog.json. A database that fails to
     * load is skipped and logged.
     */
    private load(): void {
        if (!this.persistence) {
            return;
        }

        for (const name of this.persistence.loadCatalog()) {
            if (!this.persistence.databaseExists(name)) {
                this.logger.warn({ database: name }, 'Database listed in catalog has no data file, skipping');
                continue;
            }
            try {
                const database = this.persistence.loadDatabase(name);
                this.databases.set(database.getName().toLowerCase(), database);
            } catch (error) {
                this.logger.warn({ database: name, err: error }, 'Failed to load database, skipping');
            }
        }

        this.logger.debug(
            { dataDir: this.persistence.getDataDir(), databases: this.databases.size },
            'Catalog loaded'
        );
    }

    /**
     * Create a database and record it in the catalog. Files are written
     * before the database becomes visible.
     */
    createDatabase(name: string): Database {
        validateIdentifier(name, 'database');

        if (this.hasDatabase(name)) {
            throw new SchemaError(
                ErrorCode.DUPLICATE_OBJECT,
                `Database '${name}' already exists`,
                { database: name }
            );
        }

        const database = new Database(name);

        if (this.persistence) {
            this.persistence.saveDatabase(database);
            this.persistence.saveCatalog(sortNames([...this.listDatabases(), name]));
        }

        this.databases.set(name.toLowerCase(), database);
        return database;
    }

    /**
     * Drop a database and delete its file.
     */
    dropDatabase(name: string): void {
        const database = this.requireDatabase(name);

        if (this.persistence) {
            this.persistence.saveCatalog(this.listDatabases().filter((other) => other !== database.getName()));
            this.persistence.deleteDatabase(database.getName());
        }

        this.databases.delete(name.toLowerCase());
    }

    getDatabase(name: string): Database | undefined {
        return this.databases.get(name.toLowerCase());
    }

    /**
     * Get a database or throw DatabaseNotFoundError.
     */
    requireDatabase(name: string): Database {
        const database = this.getDatabase(name);
        if (!database) {
            throw new DatabaseNotFoundError(name);
        }
        return database;
    }

    hasDatabase(name: string): boolean {
        return this.databases.has(name.toLowerCase());
    }

    /**
     * Database names as declared, sorted.
     */
    listDatabases(): string[] {
        return sortNames(Array.from(this.databases.values(), (database) => database.getName()));
    }

    /**
     * Write one database to disk. A no-op for in-memory catalogs.
     */
    flush(name: string): void {
        const database = this.requireDatabase(name);
        this.persistence?.saveDatabase(database);
    }
}
