/**
 * REPL Output Tests
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { REPL, formatResult, formatTable } from '../index';
import { Catalog } from '../../storage/Catalog';
import { createLogger } from '../../utils/logger';

const logger = createLogger('test', { level: 'silent' });

/**
 * Feed `lines` to a REPL and collect its output, without colors or prompts.
 */
async function runSession(catalog: Catalog, lines: string[]): Promise<string[]> {
    const input = new PassThrough();
    const output = new PassThrough();
    let text = '';
    output.on('data', (chunk: Buffer) => {
        text += chunk.toString('utf-8');
    });

    const done = new REPL({ catalog, input, output, logger }).start();
    input.end(lines.map((line) => `${line}\n`).join(''));
    await done;
    await new Promise((resolve) => setImmediate(resolve));

    return text
        .replace(/\x1B\[[0-9;]*m/g, '')
        .split('\n')
        .map((line) => line.replace(/^(?:(?:\w+|\.\.\.)> )+/, ''));
}

describe('formatTable', () => {
    it('draws a box sized to the widest cell', () => {
        expect(formatTable(['id', 'name'], [{ id: 1, name: 'Ann' }, { id: 22, name: null }])).toEqual([
            '┌────┬──────┐',
            '│ id │ name │',
            '├────┼──────┤',
            '│ 1  │ Ann  │',
            '│ 22 │ NULL │',
            '└────┴──────┘',
        ]);
    });

    it('renders booleans as TRUE and FALSE', () => {
        const lines = formatTable(['ok'], [{ ok: true }, { ok: false }]);
        expect(lines[3]).toBe('│ TRUE  │');
        expect(lines[4]).toBe('│ FALSE │');
    });
});

describe('formatResult', () => {
    it('prints the message of a mutation', () => {
        expect(formatResult({ success: true, type: 'mutation', rowCount: 1, message: '1 row inserted' })).toEqual([
            '1 row inserted',
        ]);
    });

    it('prints the kind and message of an error', () => {
        expect(formatResult({
            success: false,
            kind: 'TableNotFoundError',
            error: "Table 'x' does not exist",
            code: 'BIND_TABLE_NOT_FOUND',
        })).toEqual(["TableNotFoundError: Table 'x' does not exist"]);
    });

    it('prints rows with a count', () => {
        const lines = formatResult({
            success: true,
            type: 'rows',
            columns: ['n'],
            rows: [{ n: 1 }],
            rowCount: 1,
        });
        expect(lines).toEqual(['┌───┐', '│ n │', '├───┤', '│ 1 │', '└───┘', '1 row']);
    });

    it('marks empty result sets', () => {
        expect(formatResult({ success: true, type: 'schema', columns: ['table'], rows: [], rowCount: 0 })).toEqual([
            '(empty result set)',
            '0 rows',
        ]);
    });
});

describe('REPL', () => {
    it('buffers input until a semicolon and runs each statement', async () => {
        const catalog = new Catalog({ logger });
        const output = await runSession(catalog, [
            'CREATE DATABASE shop; USE shop;',
            'CREATE TABLE items (id INT PRIMARY KEY,',
            '  name STRING);',
            "INSERT INTO items VALUES (1, 'mug');",
            'SELECT name',
            'FROM items;',
        ]);

        expect(output).toContain("Database 'shop' created");
        expect(output).toContain("Using database 'shop'");
        expect(output).toContain("Table 'items' created");
        expect(output).toContain('1 row inserted');

        const header = output.indexOf('│ name │');
        expect(header).toBeGreaterThan(0);
        expect(output.slice(header - 1, header + 5)).toEqual([
            '┌──────┐',
            '│ name │',
            '├──────┤',
            '│ mug  │',
            '└──────┘',
            '1 row',
        ]);
        expect(catalog.requireDatabase('shop').requireTable('items').count()).toBe(1);
    });

    it('runs dot commands and stops at .quit', async () => {
        const catalog = new Catalog({ logger });
        catalog.createDatabase('shop').createTable({
            tableName: 'items',
            columns: [{ name: 'id', type: 'INT', primaryKey: true, unique: false }],
        });

        const output = await runSession(catalog, [
            '.use shop',
            '.tables',
            '.describe',
            '.bogus',
            '.quit',
            'CREATE DATABASE never;',
        ]);

        expect(output).toContain("Using database 'shop'");
        const header = output.indexOf('│ table │');
        expect(output.slice(header - 1, header + 5)).toEqual([
            '┌───────┐',
            '│ table │',
            '├───────┤',
            '│ items │',
            '└───────┘',
            '1 row',
        ]);
        expect(output).toContain('Usage: .describe <table_name>');
        expect(output).toContain('Unknown command: .bogus. Type .help for available commands.');
        expect(catalog.hasDatabase('never')).toBe(false);
    });
});
