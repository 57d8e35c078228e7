/**
 * KeelDB - Connections
 *
 * Opens a catalog from a connection URL and returns a session already using
 * the named database.
 */

import { parseConnectionUrl } from '../config';
import { QueryExecutor } from '../engine/QueryExecutor';
import { Session } from '../engine/Session';
import { Catalog } from '../storage/Catalog';
import type { ExecutionResult } from '../types';
import type { Logger } from '../utils/logger';

export interface ConnectOptions {
    logger?: Logger;
}

export class Connection {
    readonly catalog: Catalog;
    readonly executor: QueryExecutor;
    readonly session: Session;

    constructor(catalog: Catalog, session: Session, logger?: Logger) {
        this.catalog = catalog;
        this.session = session;
        this.executor = new QueryExecutor(catalog, logger);
    }

    /**
     * Execute one statement in this connection's session.
     */
    execute(sql: string): ExecutionResult {
        return this.executor.execute(sql, this.session);
    }

    executeScript(sql: string): ExecutionResult[] {
        return this.executor.executeScript(sql, this.session);
    }
}

/**
 * Connect to `keeldb://host/database?data_dir=path`, creating the database
 * when it does not exist yet.
 */
export function connect(url: string, options: ConnectOptions = {}): Connection {
    const { database, dataDir } = parseConnectionUrl(url);
    const catalog = new Catalog({ dataDir, ...(options.logger ? { logger: options.logger } : {}) });

    const existing = catalog.getDatabase(database) ?? catalog.createDatabase(database);
    return new Connection(catalog, new Session(existing.getName()), options.logger);
}
