/**
 * KeelDB - Database Storage
 *
 * A named collection of tables. Owns everything that spans more than one
 * table: REFERENCES validation at CREATE TABLE, referential checks on
 * writes, and DROP TABLE restrictions.
 *
 * Design decisions:
 * - Tables are stored in a Map keyed by lower-cased name (case-insensitive
 *   lookup, creation order preserved)
 * - Writes go through prepare, cross-table checks, then apply, so a failed
 *   command leaves no partial change behind
 */

import { Table } from './Table';
import type { PendingUpdate } from './Table';
import type {
    ColumnDefinition,
    Row,
    SerializedDatabase,
    TableSchema,
    Value,
} from '../types';
import {
    ConstraintViolationError,
    ErrorCode,
    SchemaError,
    TableNotFoundError,
} from '../errors';
import { formatValue, hashKey } from '../utils/values';

export const DATABASE_VERSION = '1.0.0';

/**
 * A REFERENCES column and the table that declares it.
 */
export interface ReferencingColumn {
    table: Table;
    column: ColumnDefinition;
}

function typeFamily(column: ColumnDefinition): string {
    return column.type === 'INT' || column.type === 'FLOAT' ? 'number' : column.type;
}

function quote(value: Value): string {
    return typeof value === 'string' ? `'${value}'` : formatValue(value);
}

export class Database {
    private readonly tables: Map<string, Table>;
    private readonly name: string;

    constructor(name: string) {
        this.name = name;
        this.tables = new Map();
    }

    /**
     * Get the database name.
     */
    getName(): string {
        return this.name;
    }

    // ==========================================================================
    // SCHEMA
    // ==========================================================================

    /**
     * Create a new table. Validates the column list and every REFERENCES
     * clause before the table becomes visible.
     */
    createTable(schema: TableSchema): Table {
        const key = schema.tableName.toLowerCase();

        if (this.tables.has(key)) {
            throw new SchemaError(
                ErrorCode.DUPLICATE_OBJECT,
                `Table '${schema.tableName}' already exists`,
                { table: schema.tableName }
            );
        }

        const table = new Table(schema);

        for (const column of table.getColumns()) {
            if (column.references) {
                this.validateReference(table, column);
            }
        }

        this.tables.set(key, table);
        return table;
    }

    /**
     * A REFERENCES target must be an existing table (or the table itself) and
     * a PRIMARY KEY or UNIQUE column of the same type family.
     */
    private validateReference(table: Table, column: ColumnDefinition): void {
        const reference = column.references;
        if (!reference) {
            return;
        }

        const context = { table: table.getName(), column: column.name };
        const target = reference.table.toLowerCase() === table.getName().toLowerCase()
            ? table
            : this.getTable(reference.table);

        if (!target) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Column '${column.name}' references unknown table '${reference.table}'`,
                context
            );
        }

        const targetColumn = target.getColumn(reference.column);
        if (!targetColumn) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Column '${column.name}' references unknown column '${reference.table}.${reference.column}'`,
                context
            );
        }

        if (!targetColumn.primaryKey && !targetColumn.unique) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Column '${column.name}' must reference a PRIMARY KEY or UNIQUE column, ` +
                `but '${target.getName()}.${targetColumn.name}' is neither`,
                context
            );
        }

        if (typeFamily(targetColumn) !== typeFamily(column)) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Column '${column.name}' (${column.type}) cannot reference ` +
                `'${target.getName()}.${targetColumn.name}' (${targetColumn.type})`,
                context
            );
        }
    }

    /**
     * Get a table by name.
     */
    getTable(name: string): Table | undefined {
        return this.tables.get(name.toLowerCase());
    }

    /**
     * Get a table or throw TableNotFoundError.
     */
    requireTable(name: string): Table {
        const table = this.getTable(name);
        if (!table) {
            throw new TableNotFoundError(name).withContext({ database: this.name });
        }
        return table;
    }

    /**
     * Table names as declared, in creation order.
     */
    getTableNames(): string[] {
        return Array.from(this.tables.values(), (table) => table.getName());
    }

    /**
     * Columns in other tables (or this one) whose REFERENCES clause points at
     * `tableName`.
     */
    getReferencingColumns(tableName: string): ReferencingColumn[] {
        const lower = tableName.toLowerCase();
        const result: ReferencingColumn[] = [];

        for (const table of this.tables.values()) {
            for (const column of table.getColumns()) {
                if (column.references && column.references.table.toLowerCase() === lower) {
                    result.push({ table, column });
                }
            }
        }

        return result;
    }

    /**
     * Drop a table. Rejected while another table references it.
     */
    dropTable(name: string): void {
        const table = this.requireTable(name);

        const blocker = this.getReferencingColumns(table.getName())
            .find((ref) => ref.table !== table);
        if (blocker) {
            throw new ConstraintViolationError(
                ErrorCode.REFERENTIAL_INTEGRITY,
                `Cannot drop table '${table.getName()}': it is referenced by ` +
                `${blocker.table.getName()}.${blocker.column.name}`,
                { table: table.getName() }
            );
        }

        this.tables.delete(name.toLowerCase());
    }

    // ==========================================================================
    // WRITES
    // ==========================================================================

    /**
     * Insert one row. Returns the new row id.
     */
    insertRow(tableName: string, values: readonly Value[], columns?: readonly string[]): number {
        const table = this.requireTable(tableName);
        const row = table.prepareInsert(values, columns);
        this.checkReferencesExist(table, row);
        return table.applyInsert(row);
    }

    /**
     * Set `assignments` on the given rows. Every row is validated, including
     * referential checks in both directions, before any row changes.
     */
    updateRows(tableName: string, rowIds: readonly number[], assignments: Readonly<Record<string, Value>>): number {
        const table = this.requireTable(tableName);
        const pending = table.prepareUpdate(rowIds, assignments);

        const changed = Object.keys(assignments).map((name) => table.requireColumn(name));
        const changesReferences = changed.some((column) => column.references !== undefined);

        if (changesReferences) {
            for (const change of pending) {
                this.checkReferencesExist(table, change.after, changed);
            }
        }

        this.checkUpdateRestrict(table, pending, changed);

        return table.applyUpdate(pending);
    }

    /**
     * Delete the given rows. Rejected while any referencing row points at one
     * of them.
     */
    deleteRows(tableName: string, rowIds: readonly number[]): number {
        const table = this.requireTable(tableName);
        const targets = table.getRows(rowIds);
        const batch = new Set(targets.map((row) => row.rowId));

        for (const ref of this.getReferencingColumns(table.getName())) {
            const referencedColumn = table.requireColumn(this.referencedColumnName(ref));
            const index = ref.table.getIndex(ref.column.name);
            if (!index) {
                continue;
            }

            for (const target of targets) {
                const value = target.data[referencedColumn.name];
                if (value === null) {
                    continue;
                }
                const holders = index.lookup(value)
                    .filter((rowId) => ref.table !== table || !batch.has(rowId));
                if (holders.length > 0) {
                    throw new ConstraintViolationError(
                        ErrorCode.REFERENTIAL_INTEGRITY,
                        `Cannot delete from '${table.getName()}': ${referencedColumn.name} = ${quote(value)} ` +
                        `is still referenced by ${ref.table.getName()}.${ref.column.name}`,
                        { table: table.getName(), column: referencedColumn.name }
                    );
                }
            }
        }

        return table.delete(targets.map((row) => row.rowId));
    }

    private referencedColumnName(ref: ReferencingColumn): string {
        return ref.column.references ? ref.column.references.column : ref.column.name;
    }

    /**
     * Every non-NULL REFERENCES value in `row` must exist in its target.
     */
    private checkReferencesExist(table: Table, row: Row, only?: readonly ColumnDefinition[]): void {
        const columns = only ?? table.getColumns();

        for (const column of columns) {
            const reference = column.references;
            const value = row[column.name];
            if (!reference || value === null) {
                continue;
            }

            const target = this.requireTable(reference.table);
            const index = target.getIndex(reference.column);
            const exists = index
                ? index.has(value)
                : target.scan().some((candidate) => hashKey(candidate.data[reference.column]) === hashKey(value));

            if (!exists) {
                throw new ConstraintViolationError(
                    ErrorCode.REFERENTIAL_INTEGRITY,
                    `Value ${quote(value)} for ${table.getName()}.${column.name} does not exist in ` +
                    `${target.getName()}(${reference.column})`,
                    { table: table.getName(), column: column.name }
                );
            }
        }
    }

    /**
     * Changing a referenced key value is rejected while rows still hold the
     * old value. A row of the same batch counts by its value after the update.
     */
    private checkUpdateRestrict(table: Table, pending: readonly PendingUpdate[], changed: readonly ColumnDefinition[]): void {
        const afterById = new Map(pending.map((change): [number, Row] => [change.rowId, change.after]));

        for (const ref of this.getReferencingColumns(table.getName())) {
            const referencedName = this.referencedColumnName(ref).toLowerCase();
            const column = changed.find((candidate) => candidate.name.toLowerCase() === referencedName);
            const index = ref.table.getIndex(ref.column.name);
            if (!column || !index) {
                continue;
            }

            for (const change of pending) {
                const before = change.before[column.name];
                if (before === null || hashKey(before) === hashKey(change.after[column.name])) {
                    continue;
                }
                const holders = index.lookup(before).filter((rowId) => {
                    const after = ref.table === table ? afterById.get(rowId) : undefined;
                    return after === undefined || hashKey(after[ref.column.name]) === hashKey(before);
                });
                if (holders.length > 0) {
                    throw new ConstraintViolationError(
                        ErrorCode.REFERENTIAL_INTEGRITY,
                        `Cannot update ${table.getName()}.${column.name} = ${quote(before)}: ` +
                        `it is still referenced by ${ref.table.getName()}.${ref.column.name}`,
                        { table: table.getName(), column: column.name }
                    );
                }
            }
        }
    }

    // ==========================================================================
    // PERSISTENCE
    // ==========================================================================

    /**
     * Serialize the database. Tables are written in creation order, so every
     * REFERENCES target precedes the tables that point at it.
     */
    serialize(): SerializedDatabase {
        return {
            version: DATABASE_VERSION,
            name: this.name,
            savedAt: new Date().toISOString(),
            tables: Array.from(this.tables.values(), (table) => table.serialize()),
        };
    }

    /**
     * Rebuild a database from a serialized document.
     */
    static deserialize(data: SerializedDatabase): Database {
        const database = new Database(data.name);

        for (const tableData of data.tables) {
            const key = tableData.name.toLowerCase();
            if (database.tables.has(key)) {
                throw new SchemaError(
                    ErrorCode.DUPLICATE_OBJECT,
                    `Table '${tableData.name}' appears more than once`,
                    { database: data.name, table: tableData.name }
                );
            }
            database.tables.set(key, Table.deserialize(tableData));
        }

        return database;
    }
}
