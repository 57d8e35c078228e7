#!/usr/bin/env node

/**
 * KeelDB CLI
 * Runs SQL from an argument, a file or an interactive REPL
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseConnectionUrl, type KeelConfig } from '../config';
import { QueryExecutor } from '../engine/QueryExecutor';
import { Session } from '../engine/Session';
import { REPL, formatResult } from '../repl';
import { Catalog } from '../storage/Catalog';
import { createLogger } from '../utils/logger';

const logger = createLogger('cli');

export type CliOptions = {
    dataDir?: string;
    database?: string;
    url?: string;
    memory?: boolean;
    execute?: string;
    file?: string;
};

/**
 * Where the catalog lives and which database to start in. Flags win over
 * the environment; --url wins over --data-dir and --database.
 */
export function resolveSettings(options: CliOptions, config: KeelConfig): { dataDir?: string; database?: string } {
    if (options.url) {
        const connection = parseConnectionUrl(options.url);
        return { dataDir: connection.dataDir, database: connection.database };
    }

    const database = options.database ?? config.database;
    const dataDir = options.memory ? undefined : options.dataDir ?? config.dataDir;
    return {
        ...(dataDir !== undefined ? { dataDir } : {}),
        ...(database !== undefined ? { database } : {}),
    };
}

/**
 * Execute a script and write every result. Returns false when a statement failed.
 */
export function runScript(
    executor: QueryExecutor,
    session: Session,
    sql: string,
    write: (line: string) => void
): boolean {
    const results = executor.executeScript(sql, session);
    for (const result of results) {
        const text = formatResult(result).join('\n');
        write(result.success ? text : chalk.red(text));
    }
    return results.every((result) => result.success);
}

async function main(options: CliOptions): Promise<void> {
    const settings = resolveSettings(options, loadConfig());
    const catalog = new Catalog(settings.dataDir !== undefined ? { dataDir: settings.dataDir } : {});
    const session = new Session();

    if (settings.database !== undefined) {
        if (!catalog.hasDatabase(settings.database)) {
            catalog.createDatabase(settings.database);
        }
        session.use(catalog.requireDatabase(settings.database).getName());
    }

    const sql = options.execute ?? (options.file ? readFileSync(options.file, 'utf-8') : undefined);
    if (sql !== undefined) {
        const executor = new QueryExecutor(catalog);
        const ok = runScript(executor, session, sql, (line) => console.log(line));
        if (!ok) {
            process.exitCode = 1;
        }
        return;
    }

    await new REPL({ catalog, session }).start();
}

// =============================================================================
// Program
// =============================================================================

const program = new Command();

program
    .name('keeldb')
    .description('A small relational database engine with a SQL REPL')
    .version('0.1.0')
    .option('-d, --data-dir <path>', 'Directory holding catalog.json and database files')
    .option('--database <name>', 'Database to use at start (created if missing)')
    .option('--url <url>', 'Connection URL: keeldb://localhost/<database>?data_dir=<path>')
    .option('-m, --memory', 'Keep everything in memory; nothing is written to disk')
    .option('-e, --execute <sql>', 'Execute SQL and exit')
    .option('-f, --file <path>', 'Execute a SQL script file and exit')
    .configureOutput({
        writeErr: (str) => process.stderr.write(chalk.red(str)),
    });

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
    if (error instanceof Error) {
        logger.error({ err: error }, 'CLI error occurred');
        console.error(chalk.red(`\nError: ${error.message}`));
    } else {
        console.error(chalk.red(`\nError: ${String(error)}`));
    }
    process.exit(1);
}

if (require.main === module) {
    program.parse(process.argv);
    main(program.opts<CliOptions>()).catch(handleError);
}
