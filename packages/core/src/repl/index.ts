/**
 * KeelDB - Interactive REPL
 *
 * Provides a command-line interface for interacting with the catalog.
 *
 * Features:
 * - Multi-line SQL input (use semicolon to execute)
 * - Colored success/error output
 * - Pretty-printed table results
 * - Special commands: .help, .databases, .tables, .describe, .use, .clear, .quit
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { QueryExecutor } from '../engine/QueryExecutor';
import { Session } from '../engine/Session';
import { Catalog } from '../storage/Catalog';
import { formatValue } from '../utils/values';
import { createLogger, type Logger } from '../utils/logger';
import type { ExecutionResult, Row } from '../types';

const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║   ██╗  ██╗███████╗███████╗██╗         ██████╗ ██████╗         ║
║   ██║ ██╔╝██╔════╝██╔════╝██║         ██╔══██╗██╔══██╗        ║
║   █████╔╝ █████╗  █████╗  ██║         ██║  ██║██████╔╝        ║
║   ██╔═██╗ ██╔══╝  ██╔══╝  ██║         ██║  ██║██╔══██╗        ║
║   ██║  ██╗███████╗███████╗███████╗    ██████╔╝██████╔╝        ║
║   ╚═╝  ╚═╝╚══════╝╚══════╝╚══════╝    ╚═════╝ ╚═════╝         ║
║                                                               ║
║   A small relational database engine                          ║
║   Type .help for commands, or enter SQL to execute            ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`;

const HELP_TEXT = `
KeelDB REPL Commands:
  .help          Show this help message
  .databases     List all databases
  .tables        List tables in the current database
  .describe <t>  Describe table structure
  .use <db>      Switch database
  .clear         Clear the screen
  .quit          Exit the REPL

SQL Commands (end with semicolon):
  CREATE DATABASE name;  DROP DATABASE name;  USE name;
  SHOW DATABASES;  SHOW TABLES;  DESCRIBE name;
  CREATE TABLE name (col TYPE [PRIMARY KEY] [UNIQUE] [REFERENCES t(c)], ...);
  DROP TABLE name;
  INSERT INTO name [(col1, ...)] VALUES (val1, ...);
  SELECT [DISTINCT] cols FROM t [INNER JOIN t2 ON ...] [WHERE ...]
         [GROUP BY ...] [HAVING ...] [ORDER BY ...] [LIMIT n] [OFFSET n];
  UPDATE name SET col = val [, ...] [WHERE ...];
  DELETE FROM name [WHERE ...];

Data Types: INT, FLOAT, STRING (TEXT), BOOL (BOOLEAN)
Aggregates: COUNT(*), COUNT(col), SUM, AVG, MIN, MAX

Examples:
  CREATE DATABASE shop;
  USE shop;
  CREATE TABLE users (id INT PRIMARY KEY, name STRING, active BOOL);
  INSERT INTO users VALUES (1, 'Alice', TRUE);
  SELECT name FROM users WHERE active = TRUE ORDER BY name;
`;

export interface REPLOptions {
    catalog?: Catalog;
    session?: Session;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    logger?: Logger;
}

/**
 * Render rows as a box-drawn table, one string per line.
 */
export function formatTable(columns: string[], rows: Row[]): string[] {
    if (columns.length === 0) {
        return ['(no columns)'];
    }

    const widths = columns.map((column) => column.length);
    const cells = rows.map((row) => columns.map((column) => formatValue(row[column])));

    for (const line of cells) {
        line.forEach((cell, i) => {
            widths[i] = Math.max(widths[i], cell.length);
        });
    }

    const border = (left: string, join: string, right: string): string =>
        left + widths.map((width) => '─'.repeat(width)).join(join) + right;
    const render = (values: string[]): string =>
        '│ ' + values.map((value, i) => value.padEnd(widths[i])).join(' │ ') + ' │';

    return [
        border('┌─', '─┬─', '─┐'),
        render(columns),
        border('├─', '─┼─', '─┤'),
        ...cells.map(render),
        border('└─', '─┴─', '─┘'),
    ];
}

/**
 * Render a command result as REPL output lines (uncolored).
 */
export function formatResult(result: ExecutionResult): string[] {
    if (!result.success) {
        return [`${result.kind}: ${result.error}`];
    }

    switch (result.type) {
        case 'rows':
        case 'schema': {
            const noun = result.rowCount === 1 ? 'row' : 'rows';
            if (result.rows.length === 0) {
                return ['(empty result set)', `0 rows`];
            }
            return [...formatTable(result.columns, result.rows), `${result.rowCount} ${noun}`];
        }
        case 'mutation':
            return [result.message];
    }
}

export class REPL {
    private readonly catalog: Catalog;
    private readonly session: Session;
    private readonly executor: QueryExecutor;
    private readonly rl: readline.Interface;
    private readonly output: NodeJS.WritableStream;
    private readonly logger: Logger;
    private buffer: string;
    private isRunning: boolean;

    constructor(options: REPLOptions = {}) {
        this.catalog = options.catalog ?? new Catalog();
        this.session = options.session ?? new Session();
        this.logger = options.logger ?? createLogger('repl');
        this.executor = new QueryExecutor(this.catalog, this.logger);
        this.output = options.output ?? process.stdout;
        this.buffer = '';
        this.isRunning = false;

        this.rl = readline.createInterface({
            input: options.input ?? process.stdin,
            output: this.output,
        });
    }

    /**
     * Start the REPL. Resolves once input ends or .quit is entered.
     */
    start(): Promise<void> {
        this.isRunning = true;
        this.print(chalk.cyan(BANNER));
        this.prompt();

        return new Promise((resolve) => {
            // readline may still emit lines buffered before .quit
            this.rl.on('line', (line) => {
                if (this.isRunning) {
                    this.handleLine(line);
                }
            });

            this.rl.on('close', () => {
                this.isRunning = false;
                this.print(chalk.dim('\nGoodbye!\n'));
                resolve();
            });
        });
    }

    private print(text: string): void {
        this.output.write(text + '\n');
    }

    /**
     * Display the prompt, naming the current database.
     */
    private prompt(): void {
        const database = this.session.getDatabase() ?? 'keeldb';
        this.rl.setPrompt(this.buffer ? '...> ' : `${database}> `);
        this.rl.prompt();
    }

    /**
     * Handle a line of input.
     */
    private handleLine(line: string): void {
        const trimmed = line.trim();

        if (!this.buffer && trimmed.startsWith('.')) {
            this.handleCommand(trimmed);
            if (this.isRunning) {
                this.prompt();
            }
            return;
        }

        this.buffer += (this.buffer ? '\n' : '') + line;

        // Statement is complete once it ends with a semicolon
        if (this.buffer.trim().endsWith(';')) {
            const sql = this.buffer.trim();
            this.buffer = '';
            this.run(sql);
        }

        if (this.isRunning) {
            this.prompt();
        }
    }

    /**
     * Execute one or more statements and print each result.
     */
    private run(sql: string): void {
        if (/^;*$/.test(sql)) {
            return;
        }

        const startTime = Date.now();
        const results = this.executor.executeScript(sql, this.session);
        const elapsed = Date.now() - startTime;

        for (const result of results) {
            this.printResult(result);
        }
        this.print(chalk.dim(`(${elapsed}ms)\n`));
    }

    private printResult(result: ExecutionResult): void {
        const lines = formatResult(result);
        if (!result.success) {
            this.print(chalk.red(lines.join('\n')));
            return;
        }
        if (result.type === 'mutation') {
            this.print(chalk.green(lines.join('\n')));
            return;
        }
        this.print(lines.join('\n'));
    }

    /**
     * Handle special commands.
     */
    private handleCommand(command: string): void {
        const [name = '', ...rest] = command.split(/\s+/);
        const cmd = name.toLowerCase();
        const arg = rest.join(' ');

        switch (cmd) {
            case '.help':
                this.print(HELP_TEXT);
                break;

            case '.databases':
                this.run('SHOW DATABASES;');
                break;

            case '.tables':
                this.run('SHOW TABLES;');
                break;

            case '.describe':
                if (!arg) {
                    this.print('Usage: .describe <table_name>');
                } else {
                    this.run(`DESCRIBE ${arg};`);
                }
                break;

            case '.use':
                if (!arg) {
                    this.print('Usage: .use <database>');
                } else {
                    this.run(`USE ${arg};`);
                }
                break;

            case '.clear':
                this.output.write('\x1Bc');
                break;

            case '.quit':
            case '.exit':
                this.quit();
                break;

            default:
                this.print(chalk.yellow(`Unknown command: ${cmd}. Type .help for available commands.`));
        }
    }

    /**
     * Quit the REPL.
     */
    quit(): void {
        if (!this.isRunning) {
            return;
        }
        this.logger.debug({ database: this.session.getDatabase() }, 'REPL closed');
        this.rl.close();
    }
}
