/**
 * KeelDB - Query Executor
 *
 * Executes parsed SQL statements against the catalog.
 *
 * Design decisions:
 * - Separates parsing from execution
 * - Every statement is classified DDL, DML or DQL and ends in exactly one
 *   result: success or a typed error. Nothing thrown escapes `execute`
 * - Uses an index automatically when WHERE is `indexed_column = literal`
 * - Successful writes flush the owning database before returning
 */

import { Parser } from '../parser/Parser';
import { innerJoin } from '../join/JoinEngine';
import { Aggregator, canonicalName, isAggregateQuery } from './Aggregator';
import { isSatisfied } from './ExpressionEvaluator';
import { distinctEntries, paginate, sortEntries, type ResultEntry, type SortKey } from './ResultShaper';
import { RowScope } from './RowScope';
import type { Session } from './Session';
import type { Catalog } from '../storage/Catalog';
import type { Database } from '../storage/Database';
import { DESCRIBE_COLUMNS, type Table } from '../storage/Table';
import {
    DatabaseNotFoundError,
    ErrorCode,
    InternalError,
    SchemaError,
    UnsupportedFeatureError,
    toKeelError,
} from '../errors';
import { createLogger, type Logger } from '../utils/logger';
import type {
    AggregateCall,
    CreateDatabaseStatement,
    CreateTableStatement,
    DeleteStatement,
    DescribeStatement,
    DropDatabaseStatement,
    DropTableStatement,
    ExecutionResult,
    Expression,
    InsertStatement,
    InternalRow,
    MutationResult,
    OrderByItem,
    ParsedStatement,
    QueryError,
    Row,
    RowsResult,
    SchemaResult,
    SelectStatement,
    StatementCategory,
    UpdateStatement,
    UseStatement,
    Value,
} from '../types';

/**
 * Dispatch category of a statement.
 */
export function classifyStatement(statement: ParsedStatement): StatementCategory {
    switch (statement.type) {
        case 'CREATE_DATABASE':
        case 'DROP_DATABASE':
        case 'USE':
        case 'SHOW_DATABASES':
        case 'SHOW_TABLES':
        case 'DESCRIBE':
        case 'CREATE_TABLE':
        case 'DROP_TABLE':
            return 'DDL';
        case 'INSERT':
        case 'UPDATE':
        case 'DELETE':
            return 'DML';
        case 'SELECT':
            return 'DQL';
    }
}

function rowsAffected(count: number, verb: string): string {
    return `${count} ${count === 1 ? 'row' : 'rows'} ${verb}`;
}

function mutation(rowCount: number, message: string): MutationResult {
    return { success: true, type: 'mutation', rowCount, message };
}

function schemaRows(columns: string[], rows: Row[]): SchemaResult {
    return { success: true, type: 'schema', columns, rows, rowCount: rows.length };
}

export class QueryExecutor {
    private readonly catalog: Catalog;
    private readonly logger: Logger;

    constructor(catalog: Catalog, logger: Logger = createLogger('executor')) {
        this.catalog = catalog;
        this.logger = logger;
    }

    /**
     * Execute a single SQL statement.
     */
    execute(sql: string, session: Session): ExecutionResult {
        let statement: ParsedStatement;
        try {
            statement = new Parser(sql).parse();
        } catch (error) {
            return this.failure(error, sql);
        }
        return this.executeStatement(statement, session, sql);
    }

    /**
     * Execute a semicolon-separated script. The whole script is parsed first;
     * statements then run in order and execution stops at the first error,
     * whose result is the last element.
     */
    executeScript(sql: string, session: Session): ExecutionResult[] {
        let statements: ParsedStatement[];
        try {
            statements = new Parser(sql).parseScript();
        } catch (error) {
            return [this.failure(error, sql)];
        }

        const results: ExecutionResult[] = [];
        for (const statement of statements) {
            const result = this.executeStatement(statement, session);
            results.push(result);
            if (!result.success) {
                break;
            }
        }
        return results;
    }

    /**
     * Execute a parsed statement.
     */
    executeStatement(statement: ParsedStatement, session: Session, sql?: string): ExecutionResult {
        const category = classifyStatement(statement);
        this.logger.debug({ statement: statement.type, category, database: session.getDatabase() }, 'Executing statement');

        try {
            const result = this.dispatch(statement, session);
            if (result.type === 'mutation') {
                this.logger.info(
                    { statement: statement.type, category, rowCount: result.rowCount },
                    result.message
                );
            }
            return result;
        } catch (error) {
            return this.failure(error, sql);
        }
    }

    private dispatch(statement: ParsedStatement, session: Session): RowsResult | MutationResult | SchemaResult {
        switch (statement.type) {
            case 'CREATE_DATABASE':
                return this.executeCreateDatabase(statement);
            case 'DROP_DATABASE':
                return this.executeDropDatabase(statement, session);
            case 'USE':
                return this.executeUse(statement, session);
            case 'SHOW_DATABASES':
                return schemaRows(['database'], this.catalog.listDatabases().map((name) => ({ database: name })));
            case 'SHOW_TABLES':
                return schemaRows(['table'], this.requireDatabase(session).getTableNames().map((name) => ({ table: name })));
            case 'DESCRIBE':
                return this.executeDescribe(statement, session);
            case 'CREATE_TABLE':
                return this.executeCreateTable(statement, session);
            case 'DROP_TABLE':
                return this.executeDropTable(statement, session);
            case 'INSERT':
                return this.executeInsert(statement, session);
            case 'UPDATE':
                return this.executeUpdate(statement, session);
            case 'DELETE':
                return this.executeDelete(statement, session);
            case 'SELECT':
                return this.executeSelect(statement, session);
            default: {
                const exhaustive: never = statement;
                throw new InternalError(`Unknown statement: ${JSON.stringify(exhaustive)}`);
            }
        }
    }

    /**
     * Convert anything thrown into a QueryError.
     */
    private failure(error: unknown, sql?: string): QueryError {
        const keelError = toKeelError(error);
        if (sql !== undefined) {
            keelError.withContext({ sql });
        }

        if (keelError.kind === 'InternalError') {
            this.logger.error({ err: keelError }, 'Statement failed');
        } else {
            this.logger.warn({ kind: keelError.kind, code: keelError.code }, keelError.message);
        }

        const result: QueryError = {
            success: false,
            kind: keelError.kind,
            error: keelError.message,
            code: keelError.code,
        };
        if (keelError.context) {
            result.context = { ...keelError.context };
        }
        return result;
    }

    // ==========================================================================
    // DDL
    // ==========================================================================

    private executeCreateDatabase(statement: CreateDatabaseStatement): MutationResult {
        this.catalog.createDatabase(statement.name);
        return mutation(0, `Database '${statement.name}' created`);
    }

    private executeDropDatabase(statement: DropDatabaseStatement, session: Session): MutationResult {
        const name = this.catalog.requireDatabase(statement.name).getName();
        this.catalog.dropDatabase(name);

        const current = session.getDatabase();
        if (current !== null && current.toLowerCase() === name.toLowerCase()) {
            session.clear();
        }

        return mutation(0, `Database '${name}' dropped`);
    }

    private executeUse(statement: UseStatement, session: Session): MutationResult {
        const database = this.catalog.requireDatabase(statement.name);
        session.use(database.getName());
        return mutation(0, `Using database '${database.getName()}'`);
    }

    private executeDescribe(statement: DescribeStatement, session: Session): SchemaResult {
        const table = this.requireDatabase(session).requireTable(statement.tableName);
        return schemaRows([...DESCRIBE_COLUMNS], table.describe());
    }

    private executeCreateTable(statement: CreateTableStatement, session: Session): MutationResult {
        const database = this.requireDatabase(session);
        database.createTable({
            tableName: statement.tableName,
            columns: [...statement.columns],
        });
        this.catalog.flush(database.getName());
        return mutation(0, `Table '${statement.tableName}' created`);
    }

    private executeDropTable(statement: DropTableStatement, session: Session): MutationResult {
        const database = this.requireDatabase(session);
        const name = database.requireTable(statement.tableName).getName();
        database.dropTable(name);
        this.catalog.flush(database.getName());
        return mutation(0, `Table '${name}' dropped`);
    }

    // ==========================================================================
    // DML
    // ==========================================================================

    private executeInsert(statement: InsertStatement, session: Session): MutationResult {
        const database = this.requireDatabase(session);
        database.insertRow(statement.tableName, statement.values, statement.columns);
        this.catalog.flush(database.getName());
        return mutation(1, rowsAffected(1, 'inserted'));
    }

    private executeUpdate(statement: UpdateStatement, session: Session): MutationResult {
        const database = this.requireDatabase(session);
        const table = database.requireTable(statement.tableName);

        const assignments: Record<string, Value> = {};
        for (const assignment of statement.assignments) {
            const column = table.requireColumn(assignment.column);
            if (column.name in assignments) {
                throw new SchemaError(
                    ErrorCode.DUPLICATE_OBJECT,
                    `Column '${column.name}' is assigned more than once`,
                    { table: table.getName(), column: column.name }
                );
            }
            assignments[column.name] = assignment.value;
        }

        const targets = this.scanWhere(table, statement.where);
        const count = database.updateRows(table.getName(), targets.map((row) => row.rowId), assignments);
        this.catalog.flush(database.getName());
        return mutation(count, rowsAffected(count, 'updated'));
    }

    private executeDelete(statement: DeleteStatement, session: Session): MutationResult {
        const database = this.requireDatabase(session);
        const table = database.requireTable(statement.tableName);

        const targets = this.scanWhere(table, statement.where);
        const count = database.deleteRows(table.getName(), targets.map((row) => row.rowId));
        this.catalog.flush(database.getName());
        return mutation(count, rowsAffected(count, 'deleted'));
    }

    // ==========================================================================
    // DQL
    // ==========================================================================

    /**
     * SELECT pipeline: source rows, WHERE, aggregation and HAVING, DISTINCT,
     * ORDER BY, then OFFSET and LIMIT.
     */
    private executeSelect(statement: SelectStatement, session: Session): RowsResult {
        const database = this.requireDatabase(session);
        const table = database.requireTable(statement.tableName);
        const aggregated = isAggregateQuery(statement);

        let scope: RowScope;
        let sourceRows: Row[];

        if (statement.join) {
            const joined = database.requireTable(statement.join.table);
            if (joined === table) {
                throw new UnsupportedFeatureError(`joining table '${table.getName()}' to itself`);
            }
            if (aggregated) {
                throw new UnsupportedFeatureError('aggregate queries with JOIN');
            }

            scope = new RowScope([table, joined]);
            const where = statement.where;
            if (where) {
                scope.check(where);
            }
            sourceRows = innerJoin(table, joined, statement.join.on, scope)
                .filter((row) => isSatisfied(where, scope.accessor(row)));
        } else {
            scope = new RowScope([table]);
            sourceRows = this.scanWhere(table, statement.where, scope).map((row) => row.data);
        }

        let columns: string[];
        let entries: ResultEntry[];

        if (aggregated) {
            const aggregator = new Aggregator(statement, scope);
            ({ columns, entries } = aggregator.run(sourceRows));
            const keys = statement.orderBy.map((item) => this.sortKey(item, columns, statement, scope, aggregator));
            entries = this.shape(statement, columns, entries, keys);
        } else {
            ({ columns, entries } = this.project(statement, scope, sourceRows));
            const keys = statement.orderBy.map((item) => this.sortKey(item, columns, statement, scope));
            entries = this.shape(statement, columns, entries, keys);
        }

        const rows = entries.map((entry) => entry.row);
        return { success: true, type: 'rows', columns, rows, rowCount: rows.length };
    }

    /**
     * Plain projection of source rows. `*` expands to every column of every
     * table in the scope.
     */
    private project(statement: SelectStatement, scope: RowScope, sourceRows: readonly Row[]): { columns: string[]; entries: ResultEntry[] } {
        const plan: Array<{ name: string; key: string }> = [];

        for (const projection of statement.projections) {
            switch (projection.kind) {
                case 'star':
                    for (const column of scope.columns()) {
                        plan.push({ name: column.key, key: column.key });
                    }
                    break;
                case 'column':
                    plan.push({
                        name: scope.outputName(projection),
                        key: scope.resolve(projection.expression).key,
                    });
                    break;
                case 'aggregate':
                    throw new InternalError(`Aggregate ${canonicalName(projection.expression)} in a plain projection`);
            }
        }

        const entries = sourceRows.map((source) => {
            const row: Row = {};
            for (const column of plan) {
                row[column.name] = source[column.key];
            }
            return { row, accessor: scope.accessor(source) };
        });

        return { columns: plan.map((column) => column.name), entries };
    }

    /**
     * Build an ORDER BY key. Output columns (aliases, output names, aggregate
     * canonical names) win over source columns.
     */
    private sortKey(
        item: OrderByItem,
        columns: readonly string[],
        statement: SelectStatement,
        scope: RowScope,
        aggregator?: Aggregator
    ): SortKey {
        const direction = item.direction;
        const expression = item.expression;

        const output = this.findOutputColumn(expression.kind === 'aggregate'
            ? this.aggregateOutputName(expression, statement, scope)
            : expression.table !== undefined ? `${expression.table}.${expression.column}` : expression.column, columns);
        if (output !== undefined) {
            return { direction, valueOf: (entry) => entry.row[output] };
        }

        if (expression.kind === 'aggregate') {
            if (!aggregator) {
                throw new InternalError(`ORDER BY ${canonicalName(expression)} outside an aggregated query`);
            }
            aggregator.checkAggregate(expression);
            return { direction, valueOf: (entry) => entry.accessor.aggregate(expression) };
        }

        if (aggregator) {
            aggregator.checkGroupColumn(expression);
        } else {
            scope.resolve(expression);
        }
        return { direction, valueOf: (entry) => entry.accessor.column(expression) };
    }

    /**
     * Output name an aggregate ORDER BY key maps to: an aliased projection of
     * the same call, else the canonical text.
     */
    private aggregateOutputName(call: AggregateCall, statement: SelectStatement, scope: RowScope): string {
        const name = canonicalName(call).toLowerCase();
        for (const projection of statement.projections) {
            if (projection.kind === 'aggregate' && canonicalName(projection.expression).toLowerCase() === name) {
                return scope.outputName(projection);
            }
        }
        return canonicalName(call);
    }

    private findOutputColumn(name: string, columns: readonly string[]): string | undefined {
        const lower = name.toLowerCase();
        return columns.find((column) => column.toLowerCase() === lower);
    }

    private shape(statement: SelectStatement, columns: string[], entries: ResultEntry[], keys: SortKey[]): ResultEntry[] {
        let shaped = entries;
        if (statement.distinct) {
            shaped = distinctEntries(shaped, columns);
        }
        if (keys.length > 0) {
            shaped = sortEntries(shaped, keys);
        }
        return paginate(shaped, statement.offset, statement.limit);
    }

    // ==========================================================================
    // HELPERS
    // ==========================================================================

    private requireDatabase(session: Session): Database {
        const name = session.getDatabase();
        if (name === null) {
            throw new DatabaseNotFoundError(null);
        }
        return this.catalog.requireDatabase(name);
    }

    /**
     * Rows of `table` satisfying `where`, in table order. A WHERE of the form
     * `indexed_column = literal` is answered from the index.
     */
    private scanWhere(table: Table, where: Expression | undefined, scope: RowScope = new RowScope([table])): InternalRow[] {
        if (!where) {
            return table.scan();
        }

        scope.check(where);
        const candidates = this.indexLookup(table, where, scope) ?? table.scan();
        return candidates.filter((row) => isSatisfied(where, scope.accessor(row.data)));
    }

    private indexLookup(table: Table, where: Expression, scope: RowScope): InternalRow[] | undefined {
        if (where.kind !== 'comparison' || where.operator !== '=') {
            return undefined;
        }

        const { left, right } = where;
        const pair = left.kind === 'column' && right.kind === 'literal'
            ? { column: left, value: right.value }
            : right.kind === 'column' && left.kind === 'literal'
                ? { column: right, value: left.value }
                : undefined;
        if (!pair) {
            return undefined;
        }

        const index = table.getIndex(scope.resolve(pair.column).definition.name);
        if (!index) {
            return undefined;
        }

        this.logger.trace({ table: table.getName(), column: index.getColumnName() }, 'Using index');
        // `col = NULL` is never true
        return pair.value === null ? [] : table.getRows(index.lookup(pair.value));
    }
}
