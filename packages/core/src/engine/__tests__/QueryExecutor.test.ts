/**
 * Query Executor Tests
 *
 * End-to-end: SQL text in, results and typed errors out.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { QueryExecutor, classifyStatement } from '../QueryExecutor';
import { Session } from '../Session';
import { Catalog } from '../../storage/Catalog';
import { parse } from '../../parser';
import { ErrorCode } from '../../errors';
import { createLogger } from '../../utils/logger';
import type { ExecutionResult, QueryError, Row } from '../../types';

const logger = createLogger('test', { level: 'silent' });

describe('QueryExecutor', () => {
    let catalog: Catalog;
    let executor: QueryExecutor;
    let session: Session;

    function run(sql: string): ExecutionResult {
        return executor.execute(sql, session);
    }

    function query(sql: string): Row[] {
        const result = run(sql);
        if (!result.success) {
            throw new Error(`${sql} failed: ${result.error}`);
        }
        if (result.type === 'mutation') {
            throw new Error(`${sql} returned no rows`);
        }
        return result.rows;
    }

    function fail(sql: string): QueryError {
        const result = run(sql);
        if (result.success) {
            throw new Error(`${sql} was expected to fail`);
        }
        return result;
    }

    function script(sql: string): void {
        for (const result of executor.executeScript(sql, session)) {
            if (!result.success) {
                throw new Error(`setup failed: ${result.error}`);
            }
        }
    }

    beforeEach(() => {
        catalog = new Catalog({ logger });
        executor = new QueryExecutor(catalog, logger);
        session = new Session();
        script(`
            CREATE DATABASE test;
            USE test;
            CREATE TABLE users (id INT PRIMARY KEY, age INT, active BOOL);
            INSERT INTO users VALUES (1, 25, TRUE);
            INSERT INTO users VALUES (2, 17, FALSE);
            INSERT INTO users VALUES (3, 40, TRUE);
            CREATE TABLE employees (id INT PRIMARY KEY, name STRING, department STRING, salary FLOAT);
            INSERT INTO employees VALUES (1, 'Ann', 'eng', 100);
            INSERT INTO employees VALUES (2, 'Bob', 'eng', 120);
            INSERT INTO employees VALUES (3, 'Cid', 'ops', 90);
            INSERT INTO employees VALUES (4, 'Dee', 'sales', 80);
            INSERT INTO employees VALUES (5, 'Eve', 'sales', 85);
            INSERT INTO employees VALUES (6, 'Fay', 'eng', 110);
        `);
    });

    describe('databases and schema', () => {
        it('lists databases and tables', () => {
            run('CREATE DATABASE archive');
            const databases = run('SHOW DATABASES');
            expect(databases).toEqual({
                success: true,
                type: 'schema',
                columns: ['database'],
                rows: [{ database: 'archive' }, { database: 'test' }],
                rowCount: 2,
            });
            expect(query('SHOW TABLES')).toEqual([{ table: 'users' }, { table: 'employees' }]);
        });

        it('describes a table', () => {
            run('CREATE TABLE orders (id INT PRIMARY KEY, user_id INT REFERENCES users(id), code STRING UNIQUE)');
            const result = run('DESCRIBE orders');
            expect(result).toMatchObject({
                success: true,
                type: 'schema',
                columns: ['column', 'type', 'primary_key', 'unique', 'references'],
            });
            expect(query('DESCRIBE orders')).toEqual([
                { column: 'id', type: 'INT', primary_key: true, unique: false, references: null },
                { column: 'user_id', type: 'INT', primary_key: false, unique: false, references: 'users(id)' },
                { column: 'code', type: 'STRING', primary_key: false, unique: true, references: null },
            ]);
        });

        it('reports DDL results as zero-row mutations', () => {
            expect(run('CREATE TABLE t (id INT PRIMARY KEY)')).toEqual({
                success: true,
                type: 'mutation',
                rowCount: 0,
                message: "Table 't' created",
            });
            expect(run('DROP TABLE t')).toMatchObject({ message: "Table 't' dropped" });
            expect(run('USE test')).toMatchObject({ message: "Using database 'test'" });
        });

        it('requires a selected database', () => {
            const error = executor.execute('SHOW TABLES', new Session());
            expect(error).toMatchObject({
                success: false,
                kind: 'DatabaseNotFoundError',
                code: ErrorCode.NO_DATABASE_SELECTED,
            });
        });

        it('rejects USE of an unknown database', () => {
            expect(fail('USE nowhere')).toMatchObject({
                kind: 'DatabaseNotFoundError',
                error: "Database 'nowhere' does not exist",
            });
            expect(session.getDatabase()).toBe('test');
        });

        it('clears the session when its database is dropped', () => {
            expect(run('DROP DATABASE test')).toMatchObject({ success: true, message: "Database 'test' dropped" });
            expect(session.getDatabase()).toBeNull();
            expect(query('SHOW DATABASES')).toEqual([]);
        });

        it('rejects duplicate tables and unknown tables', () => {
            expect(fail('CREATE TABLE users (id INT PRIMARY KEY)')).toMatchObject({
                kind: 'SchemaError',
                code: ErrorCode.DUPLICATE_OBJECT,
            });
            expect(fail('SELECT * FROM nope')).toMatchObject({
                kind: 'TableNotFoundError',
                error: "Table 'nope' does not exist",
            });
        });
    });

    describe('INSERT, UPDATE and DELETE', () => {
        it('counts rows matching a condition', () => {
            const result = run('SELECT COUNT(*) FROM users WHERE active = TRUE');
            expect(result).toEqual({
                success: true,
                type: 'rows',
                columns: ['COUNT(*)'],
                rows: [{ 'COUNT(*)': 2 }],
                rowCount: 1,
            });
        });

        it('leaves the table unchanged after a duplicate primary key', () => {
            expect(fail('INSERT INTO users VALUES (1, 99, TRUE)')).toMatchObject({
                kind: 'ConstraintViolation',
                code: ErrorCode.PRIMARY_KEY_VIOLATION,
                error: "Duplicate value 1 for PRIMARY KEY column 'id' in table 'users'",
            });
            expect(query('SELECT age FROM users WHERE id = 1')).toEqual([{ age: 25 }]);
            expect(query('SELECT COUNT(*) AS n FROM users')).toEqual([{ n: 3 }]);
        });

        it('inserts with a column list', () => {
            expect(run('INSERT INTO users (id, active) VALUES (4, FALSE)')).toMatchObject({
                rowCount: 1,
                message: '1 row inserted',
            });
            expect(query('SELECT * FROM users WHERE id = 4')).toEqual([{ id: 4, age: null, active: false }]);
        });

        it('rejects values of the wrong type', () => {
            expect(fail("INSERT INTO users VALUES (4, 'old', TRUE)")).toMatchObject({
                kind: 'TypeMismatchError',
                error: "Column 'age' expects INT, got STRING value 'old'",
            });
            expect(fail("UPDATE users SET age = 'old'")).toMatchObject({ kind: 'TypeMismatchError' });
        });

        it('updates matching rows', () => {
            expect(run("UPDATE employees SET salary = 95 WHERE department = 'ops'")).toMatchObject({
                rowCount: 1,
                message: '1 row updated',
            });
            expect(query("SELECT salary FROM employees WHERE name = 'Cid'")).toEqual([{ salary: 95 }]);
            expect(run('UPDATE employees SET salary = 1 WHERE id = 99')).toMatchObject({ message: '0 rows updated' });
        });

        it('rejects assigning one unique value to several rows', () => {
            expect(fail('UPDATE users SET id = 7 WHERE active = TRUE')).toMatchObject({
                kind: 'ConstraintViolation',
                code: ErrorCode.PRIMARY_KEY_VIOLATION,
            });
            expect(query('SELECT id FROM users')).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
        });

        it('rejects assigning a column twice', () => {
            expect(fail('UPDATE users SET age = 1, AGE = 2')).toMatchObject({
                kind: 'SchemaError',
                error: "Column 'age' is assigned more than once",
            });
        });

        it('deletes matching rows', () => {
            expect(run('DELETE FROM employees WHERE salary < 90')).toMatchObject({
                rowCount: 2,
                message: '2 rows deleted',
            });
            expect(query('SELECT name FROM employees')).toEqual([
                { name: 'Ann' }, { name: 'Bob' }, { name: 'Cid' }, { name: 'Fay' },
            ]);
        });

        it('keeps index keys equal to column values', () => {
            script(`
                INSERT INTO users VALUES (4, 30, FALSE);
                UPDATE users SET id = 10 WHERE id = 2;
                DELETE FROM users WHERE id = 3;
            `);
            const table = catalog.requireDatabase('test').requireTable('users');
            const values = table.scan().map((row) => row.data.id);
            expect(values).toEqual([1, 10, 4]);
            expect(table.getIndex('id')?.values().slice().sort()).toEqual([...values].sort());
            expect(query('SELECT age FROM users WHERE id = 10')).toEqual([{ age: 17 }]);
        });

        it('enforces REFERENCES on writes and DROP TABLE', () => {
            script(`
                CREATE TABLE orders (id INT PRIMARY KEY, user_id INT REFERENCES users(id));
                INSERT INTO orders VALUES (100, 1);
            `);

            expect(fail('INSERT INTO orders VALUES (101, 9)')).toMatchObject({
                kind: 'ConstraintViolation',
                code: ErrorCode.REFERENTIAL_INTEGRITY,
            });
            expect(fail('DELETE FROM users WHERE id = 1')).toMatchObject({
                kind: 'ConstraintViolation',
                error: "Cannot delete from 'users': id = 1 is still referenced by orders.user_id",
            });
            expect(fail('DROP TABLE users')).toMatchObject({ kind: 'ConstraintViolation' });
            expect(run('DELETE FROM users WHERE id = 2')).toMatchObject({ rowCount: 1 });
        });
    });

    describe('SELECT', () => {
        it('filters with index lookups and scans alike', () => {
            expect(query('SELECT name FROM employees WHERE id = 3')).toEqual([{ name: 'Cid' }]);
            expect(query('SELECT name FROM employees WHERE 3 = id')).toEqual([{ name: 'Cid' }]);
            expect(query('SELECT name FROM employees WHERE id = NULL')).toEqual([]);
            expect(query("SELECT name FROM employees WHERE id = '3'")).toEqual([]);
        });

        it('evaluates BETWEEN, IN and LIKE', () => {
            expect(query('SELECT name FROM employees WHERE salary BETWEEN 85 AND 100')).toEqual([
                { name: 'Ann' }, { name: 'Cid' }, { name: 'Eve' },
            ]);
            expect(query("SELECT name FROM employees WHERE department IN ('ops', 'sales', NULL)")).toEqual([
                { name: 'Cid' }, { name: 'Dee' }, { name: 'Eve' },
            ]);
            expect(query("SELECT name FROM employees WHERE name LIKE '%E%'")).toEqual([
                { name: 'Dee' }, { name: 'Eve' },
            ]);
        });

        it('renames output columns with aliases', () => {
            const result = run('SELECT name AS who FROM employees WHERE id = 1');
            expect(result).toMatchObject({ columns: ['who'], rows: [{ who: 'Ann' }] });
        });

        it('keys table-qualified projections as written', () => {
            expect(query('SELECT employees.name FROM employees WHERE id = 1')).toEqual([{ 'employees.name': 'Ann' }]);
        });

        it('orders by a column that is not projected', () => {
            expect(query('SELECT name FROM employees ORDER BY salary DESC LIMIT 2')).toEqual([
                { name: 'Bob' }, { name: 'Fay' },
            ]);
        });

        it('applies OFFSET before LIMIT', () => {
            script(`
                CREATE TABLE nums (id INT PRIMARY KEY, x INT);
                INSERT INTO nums VALUES (1, 30);
                INSERT INTO nums VALUES (2, 10);
                INSERT INTO nums VALUES (3, 40);
                INSERT INTO nums VALUES (4, 20);
            `);
            expect(query('SELECT x FROM nums ORDER BY x LIMIT 2 OFFSET 1')).toEqual([{ x: 20 }, { x: 30 }]);
        });

        it('sorts NULL last in both directions', () => {
            script(`
                CREATE TABLE nums (id INT PRIMARY KEY, x INT);
                INSERT INTO nums VALUES (1, NULL);
                INSERT INTO nums VALUES (2, 10);
                INSERT INTO nums VALUES (3, 20);
            `);
            expect(query('SELECT x FROM nums ORDER BY x DESC')).toEqual([{ x: 20 }, { x: 10 }, { x: null }]);
            expect(query('SELECT x FROM nums ORDER BY x')).toEqual([{ x: 10 }, { x: 20 }, { x: null }]);
        });

        it('removes duplicate rows with DISTINCT', () => {
            expect(query('SELECT DISTINCT department FROM employees ORDER BY department')).toEqual([
                { department: 'eng' }, { department: 'ops' }, { department: 'sales' },
            ]);
        });

        it('reports unknown columns', () => {
            expect(fail('SELECT nope FROM employees')).toMatchObject({
                kind: 'ColumnNotFoundError',
                error: "Column 'nope' does not exist in table 'employees'",
            });
            run('CREATE TABLE empty (id INT PRIMARY KEY)');
            expect(fail('SELECT * FROM empty WHERE nope = 1')).toMatchObject({ kind: 'ColumnNotFoundError' });
        });

        it('rejects ordering comparisons across types', () => {
            expect(fail("SELECT * FROM employees WHERE salary > 'abc'")).toMatchObject({
                kind: 'TypeMismatchError',
                error: 'Cannot compare INT with STRING',
            });
        });
    });

    describe('aggregation', () => {
        it('groups, filters with HAVING and orders by an alias', () => {
            const result = run(
                'SELECT department, COUNT(*) AS cnt FROM employees GROUP BY department HAVING COUNT(*) > 1 ORDER BY cnt DESC'
            );
            expect(result).toMatchObject({
                columns: ['department', 'cnt'],
                rows: [
                    { department: 'eng', cnt: 3 },
                    { department: 'sales', cnt: 2 },
                ],
            });
        });

        it('lets HAVING refer to aliases', () => {
            expect(query('SELECT department, COUNT(*) AS cnt FROM employees GROUP BY department HAVING cnt >= 2')).toEqual([
                { department: 'eng', cnt: 3 },
                { department: 'sales', cnt: 2 },
            ]);
        });

        it('computes SUM, AVG, MIN and MAX per group', () => {
            expect(query(
                'SELECT department, SUM(salary) AS total, AVG(salary), MIN(name), MAX(salary) ' +
                'FROM employees GROUP BY department ORDER BY department'
            )).toEqual([
                { department: 'eng', total: 330, 'AVG(salary)': 110, 'MIN(name)': 'Ann', 'MAX(salary)': 120 },
                { department: 'ops', total: 90, 'AVG(salary)': 90, 'MIN(name)': 'Cid', 'MAX(salary)': 90 },
                { department: 'sales', total: 165, 'AVG(salary)': 82.5, 'MIN(name)': 'Dee', 'MAX(salary)': 85 },
            ]);
        });

        it('orders groups by an aggregate that is not projected', () => {
            expect(query('SELECT department FROM employees GROUP BY department ORDER BY SUM(salary) DESC')).toEqual([
                { department: 'eng' }, { department: 'sales' }, { department: 'ops' },
            ]);
        });

        it('maps ORDER BY on an aggregate to its aliased projection', () => {
            expect(query(
                'SELECT department, COUNT(*) AS n FROM employees GROUP BY department ORDER BY COUNT(*) DESC'
            )).toEqual([
                { department: 'eng', n: 3 },
                { department: 'sales', n: 2 },
                { department: 'ops', n: 1 },
            ]);
        });

        it('treats NULL as a group key of its own', () => {
            run("INSERT INTO employees VALUES (7, 'Gus', NULL, 70)");
            expect(query('SELECT department, COUNT(*) AS n FROM employees GROUP BY department ORDER BY department')).toEqual([
                { department: 'eng', n: 3 },
                { department: 'ops', n: 1 },
                { department: 'sales', n: 2 },
                { department: null, n: 1 },
            ]);
        });

        it('partitions every surviving row into exactly one group', () => {
            const groups = query('SELECT department, COUNT(*) AS n FROM employees WHERE salary > 85 GROUP BY department');
            const total = groups.reduce((sum, group) => sum + (typeof group.n === 'number' ? group.n : 0), 0);
            expect(total).toBe(4);
        });

        it('returns one row for aggregates over an empty table', () => {
            run('CREATE TABLE empty (id INT PRIMARY KEY, x INT)');
            expect(query('SELECT COUNT(*), SUM(x), COUNT(x), AVG(x), MIN(x) FROM empty')).toEqual([
                { 'COUNT(*)': 0, 'SUM(x)': null, 'COUNT(x)': 0, 'AVG(x)': null, 'MIN(x)': null },
            ]);
            expect(query('SELECT x, COUNT(*) FROM empty GROUP BY x')).toEqual([]);
        });

        it('rejects columns that are neither grouped nor aggregated', () => {
            expect(fail('SELECT name, COUNT(*) FROM employees')).toMatchObject({
                kind: 'AmbiguousAggregationError',
                error: "Column 'name' must appear in GROUP BY or be used inside an aggregate function",
            });
            expect(fail('SELECT * FROM employees GROUP BY department')).toMatchObject({
                kind: 'AmbiguousAggregationError',
            });
        });

        it('rejects SUM over a non-numeric column', () => {
            expect(fail('SELECT SUM(name) FROM employees')).toMatchObject({
                kind: 'TypeMismatchError',
                error: "SUM requires a numeric column, but 'name' is STRING",
            });
        });

        it('reports COUNT(DISTINCT ...) as unsupported', () => {
            expect(fail('SELECT COUNT(DISTINCT department) FROM employees')).toMatchObject({
                kind: 'UnsupportedFeatureError',
                error: 'Unsupported feature: COUNT(DISTINCT ...)',
            });
        });
    });

    describe('JOIN', () => {
        beforeEach(() => {
            script(`
                CREATE TABLE a (id INT PRIMARY KEY, label STRING);
                CREATE TABLE b (id INT PRIMARY KEY, a_id INT REFERENCES a(id), note STRING);
                INSERT INTO a VALUES (1, 'one');
                INSERT INTO a VALUES (2, 'two');
                INSERT INTO a VALUES (3, 'three');
                INSERT INTO b VALUES (10, 1, 'x');
                INSERT INTO b VALUES (11, 1, 'y');
                INSERT INTO b VALUES (12, 3, 'z');
            `);
        });

        it('drops rows without a partner', () => {
            const result = run('SELECT * FROM a INNER JOIN b ON a.id = b.a_id');
            expect(result).toMatchObject({
                columns: ['a.id', 'a.label', 'b.id', 'b.a_id', 'b.note'],
                rows: [
                    { 'a.id': 1, 'a.label': 'one', 'b.id': 10, 'b.a_id': 1, 'b.note': 'x' },
                    { 'a.id': 1, 'a.label': 'one', 'b.id': 11, 'b.a_id': 1, 'b.note': 'y' },
                    { 'a.id': 3, 'a.label': 'three', 'b.id': 12, 'b.a_id': 3, 'b.note': 'z' },
                ],
                rowCount: 3,
            });
        });

        it('filters and orders joined rows', () => {
            expect(query("SELECT a.label, b.note FROM a JOIN b ON b.a_id = a.id WHERE b.note <> 'y' ORDER BY b.note DESC")).toEqual([
                { 'a.label': 'three', 'b.note': 'z' },
                { 'a.label': 'one', 'b.note': 'x' },
            ]);
        });

        it('joins on non-equality conditions', () => {
            expect(query('SELECT a.id, b.id FROM a JOIN b ON a.id > b.a_id')).toEqual([
                { 'a.id': 2, 'b.id': 10 },
                { 'a.id': 2, 'b.id': 11 },
                { 'a.id': 3, 'b.id': 10 },
                { 'a.id': 3, 'b.id': 11 },
            ]);
        });

        it('rejects ambiguous bare column names', () => {
            expect(fail('SELECT id FROM a JOIN b ON a.id = b.a_id')).toMatchObject({
                kind: 'ColumnNotFoundError',
                code: ErrorCode.AMBIGUOUS_COLUMN,
            });
        });

        it('rejects aggregates and self-joins', () => {
            expect(fail('SELECT COUNT(*) FROM a JOIN b ON a.id = b.a_id')).toMatchObject({
                kind: 'UnsupportedFeatureError',
                error: 'Unsupported feature: aggregate queries with JOIN',
            });
            expect(fail('SELECT * FROM a JOIN a ON a.id = a.id')).toMatchObject({
                kind: 'UnsupportedFeatureError',
            });
        });
    });

    describe('scripts', () => {
        it('stops at the first failing statement', () => {
            const results = executor.executeScript(
                'CREATE TABLE t (id INT PRIMARY KEY); INSERT INTO t VALUES (1); INSERT INTO t VALUES (1); INSERT INTO t VALUES (2);',
                session
            );
            expect(results.map((result) => result.success)).toEqual([true, true, false]);
            expect(query('SELECT COUNT(*) AS n FROM t')).toEqual([{ n: 1 }]);
        });

        it('runs nothing when any statement fails to parse', () => {
            const results = executor.executeScript('CREATE TABLE t (id INT PRIMARY KEY); SELEC', session);
            expect(results).toHaveLength(1);
            expect(results[0]).toMatchObject({ success: false, kind: 'SyntaxError' });
            expect(query('SHOW TABLES')).toEqual([{ table: 'users' }, { table: 'employees' }]);
        });

        it('attaches the SQL text to syntax errors', () => {
            expect(fail('SELEC * FROM users')).toMatchObject({
                kind: 'SyntaxError',
                code: ErrorCode.UNEXPECTED_TOKEN,
                context: { sql: 'SELEC * FROM users' },
            });
        });
    });

    describe('persistence', () => {
        let dataDir: string;

        beforeEach(() => {
            dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keeldb-test-'));
        });

        afterEach(() => {
            fs.rmSync(dataDir, { recursive: true, force: true });
        });

        it('flushes every successful write', () => {
            const persistent = new Catalog({ dataDir, logger });
            const writer = new QueryExecutor(persistent, logger);
            const own = new Session();
            writer.executeScript(`
                CREATE DATABASE shop;
                USE shop;
                CREATE TABLE items (id INT PRIMARY KEY, name STRING UNIQUE);
                INSERT INTO items VALUES (1, 'pen');
                INSERT INTO items VALUES (2, 'cup');
                UPDATE items SET name = 'mug' WHERE id = 2;
                DELETE FROM items WHERE id = 1;
            `, own);

            const reopened = new Catalog({ dataDir, logger });
            const reader = new QueryExecutor(reopened, logger);
            const result = reader.execute('SELECT * FROM items', new Session('shop'));
            expect(result).toMatchObject({ rows: [{ id: 2, name: 'mug' }] });
            expect(reopened.requireDatabase('shop').requireTable('items').getIndex('name')?.values()).toEqual(['mug']);
        });
    });
});

describe('classifyStatement', () => {
    it('sorts statements into DDL, DML and DQL', () => {
        expect(classifyStatement(parse('CREATE DATABASE x'))).toBe('DDL');
        expect(classifyStatement(parse('SHOW TABLES'))).toBe('DDL');
        expect(classifyStatement(parse('DESCRIBE t'))).toBe('DDL');
        expect(classifyStatement(parse('INSERT INTO t VALUES (1)'))).toBe('DML');
        expect(classifyStatement(parse('DELETE FROM t'))).toBe('DML');
        expect(classifyStatement(parse('SELECT * FROM t'))).toBe('DQL');
    });
});
