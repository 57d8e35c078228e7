/**
 * KeelDB - Table Storage
 *
 * Implements in-memory row-based storage for a single table.
 * Each table maintains its schema, rows, and indexes.
 *
 * Design decisions:
 * - Rows live in a Map keyed by a monotonically increasing row id, so
 *   iteration order is insertion order
 * - Indexes exist for PRIMARY KEY, UNIQUE and REFERENCES columns and are
 *   maintained on every write
 * - Writes are split into prepare (validate, no side effects) and apply, so
 *   the database can add cross-table checks in between
 */

import type {
    ColumnDefinition,
    InternalRow,
    Row,
    SerializedTable,
    TableSchema,
    Value,
} from '../types';
import { HashIndex } from '../index/HashIndex';
import {
    ColumnNotFoundError,
    ConstraintViolationError,
    ErrorCode,
    SchemaError,
    TypeMismatchError,
} from '../errors';
import { conformsTo, describeValueType, formatValue } from '../utils/values';

/**
 * A validated change to one row, ready to apply.
 */
export interface PendingUpdate {
    rowId: number;
    before: Row;
    after: Row;
}

export const DESCRIBE_COLUMNS = ['column', 'type', 'primary_key', 'unique', 'references'];

function quote(value: Value): string {
    return typeof value === 'string' ? `'${value}'` : formatValue(value);
}

export class Table {
    private readonly schema: TableSchema;
    private readonly rows: Map<number, InternalRow>;
    private nextRowId: number;
    private readonly indexes: Map<string, HashIndex>;
    private readonly primaryKey: ColumnDefinition;

    constructor(schema: TableSchema) {
        this.schema = {
            tableName: schema.tableName,
            columns: schema.columns.map((column) => ({
                ...column,
                ...(column.references ? { references: { ...column.references } } : {}),
            })),
        };
        this.primaryKey = Table.validateSchema(this.schema);
        this.rows = new Map();
        this.nextRowId = 1;
        this.indexes = new Map();

        this.initializeIndexes();
    }

    /**
     * Structural schema checks: at least one column, unique column names and
     * exactly one PRIMARY KEY. Returns the primary key column.
     */
    static validateSchema(schema: TableSchema): ColumnDefinition {
        if (schema.columns.length === 0) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Table '${schema.tableName}' must have at least one column`,
                { table: schema.tableName }
            );
        }

        const seen = new Set<string>();
        for (const column of schema.columns) {
            const key = column.name.toLowerCase();
            if (seen.has(key)) {
                throw new SchemaError(
                    ErrorCode.DUPLICATE_OBJECT,
                    `Duplicate column '${column.name}' in table '${schema.tableName}'`,
                    { table: schema.tableName, column: column.name }
                );
            }
            seen.add(key);
        }

        const primaryKeys = schema.columns.filter((column) => column.primaryKey);
        if (primaryKeys.length !== 1) {
            throw new SchemaError(
                ErrorCode.INVALID_SCHEMA,
                `Table '${schema.tableName}' must have exactly one PRIMARY KEY column, found ${primaryKeys.length}`,
                { table: schema.tableName }
            );
        }

        return primaryKeys[0];
    }

    /**
     * One index per PRIMARY KEY, UNIQUE and REFERENCES column.
     */
    private initializeIndexes(): void {
        for (const column of this.schema.columns) {
            if (column.primaryKey || column.unique || column.references) {
                this.indexes.set(column.name.toLowerCase(), new HashIndex(column.name));
            }
        }
    }

    getName(): string {
        return this.schema.tableName;
    }

    getColumns(): ColumnDefinition[] {
        return this.schema.columns;
    }

    getColumnNames(): string[] {
        return this.schema.columns.map((column) => column.name);
    }

    /**
     * Get a column definition by name (case-insensitive).
     */
    getColumn(name: string): ColumnDefinition | undefined {
        const lower = name.toLowerCase();
        return this.schema.columns.find((column) => column.name.toLowerCase() === lower);
    }

    /**
     * Get a column definition or throw ColumnNotFoundError.
     */
    requireColumn(name: string): ColumnDefinition {
        const column = this.getColumn(name);
        if (!column) {
            throw new ColumnNotFoundError(
                name,
                `Column '${name}' does not exist in table '${this.schema.tableName}'`
            ).withContext({ table: this.schema.tableName });
        }
        return column;
    }

    /**
     * Get index for a column if it exists.
     */
    getIndex(columnName: string): HashIndex | undefined {
        return this.indexes.get(columnName.toLowerCase());
    }

    // ==========================================================================
    // READS
    // ==========================================================================

    /**
     * All live rows in insertion order.
     */
    scan(): InternalRow[] {
        return Array.from(this.rows.values());
    }

    /**
     * Rows for the given ids, in ascending row id order. Unknown ids are skipped.
     */
    getRows(rowIds: Iterable<number>): InternalRow[] {
        const result: InternalRow[] = [];
        for (const rowId of Array.from(rowIds).sort((a, b) => a - b)) {
            const row = this.rows.get(rowId);
            if (row) {
                result.push(row);
            }
        }
        return result;
    }

    /**
     * Get the total number of rows.
     */
    count(): number {
        return this.rows.size;
    }

    /**
     * Schema rows for DESCRIBE.
     */
    describe(): Row[] {
        return this.schema.columns.map((column) => ({
            column: column.name,
            type: column.type,
            primary_key: column.primaryKey,
            unique: column.unique,
            references: column.references
                ? `${column.references.table}(${column.references.column})`
                : null,
        }));
    }

    // ==========================================================================
    // WRITES
    // ==========================================================================

    /**
     * Check a value against the column's declared type.
     */
    private checkType(column: ColumnDefinition, value: Value): void {
        if (!conformsTo(value, column.type)) {
            throw new TypeMismatchError(
                `Column '${column.name}' expects ${column.type}, got ${describeValueType(value)} value ${quote(value)}`,
                { table: this.schema.tableName, column: column.name }
            );
        }
    }

    /**
     * Check PRIMARY KEY non-NULL and PK/UNIQUE uniqueness against the index,
     * ignoring the rows in `exclude`.
     */
    private checkUniqueness(row: Row, exclude: ReadonlySet<number>): void {
        const pkValue = row[this.primaryKey.name];
        if (pkValue === null) {
            throw new ConstraintViolationError(
                ErrorCode.NOT_NULL_VIOLATION,
                `PRIMARY KEY column '${this.primaryKey.name}' cannot be NULL`,
                { table: this.schema.tableName, column: this.primaryKey.name }
            );
        }

        for (const column of this.schema.columns) {
            if (!column.primaryKey && !column.unique) {
                continue;
            }
            const index = this.getIndex(column.name);
            const value = row[column.name];
            if (!index || value === null) {
                continue;
            }
            for (const rowId of index.lookup(value)) {
                if (!exclude.has(rowId)) {
                    throw this.duplicateError(column, value);
                }
            }
        }
    }

    private duplicateError(column: ColumnDefinition, value: Value): ConstraintViolationError {
        return new ConstraintViolationError(
            column.primaryKey ? ErrorCode.PRIMARY_KEY_VIOLATION : ErrorCode.UNIQUE_VIOLATION,
            `Duplicate value ${quote(value)} for ${column.primaryKey ? 'PRIMARY KEY' : 'UNIQUE'} column '${column.name}' in table '${this.schema.tableName}'`,
            { table: this.schema.tableName, column: column.name }
        );
    }

    /**
     * Build and validate a new row without touching the table. Columns not in
     * the list become NULL.
     */
    prepareInsert(values: readonly Value[], columns?: readonly string[]): Row {
        const targets = columns
            ? columns.map((name) => this.requireColumn(name))
            : this.schema.columns;

        if (values.length !== targets.length) {
            throw new SchemaError(
                ErrorCode.ARITY_MISMATCH,
                columns
                    ? `INSERT lists ${targets.length} column(s) but ${values.length} value(s)`
                    : `Table '${this.schema.tableName}' has ${targets.length} column(s) but ${values.length} value(s) were supplied`,
                { table: this.schema.tableName }
            );
        }

        const row: Row = {};
        for (const column of this.schema.columns) {
            row[column.name] = null;
        }

        const assigned = new Set<string>();
        targets.forEach((column, i) => {
            if (assigned.has(column.name)) {
                throw new SchemaError(
                    ErrorCode.DUPLICATE_OBJECT,
                    `Column '${column.name}' is listed more than once`,
                    { table: this.schema.tableName, column: column.name }
                );
            }
            assigned.add(column.name);
            this.checkType(column, values[i]);
            row[column.name] = values[i];
        });

        this.checkUniqueness(row, new Set());
        return row;
    }

    /**
     * Store a row produced by prepareInsert. Returns the new row id.
     */
    applyInsert(row: Row): number {
        const rowId = this.nextRowId++;
        this.rows.set(rowId, { rowId, data: row });

        for (const index of this.indexes.values()) {
            index.add(row[index.getColumnName()], rowId);
        }

        return rowId;
    }

    /**
     * Insert a row, validating it first.
     */
    insert(values: readonly Value[], columns?: readonly string[]): number {
        return this.applyInsert(this.prepareInsert(values, columns));
    }

    /**
     * Validate setting `assignments` on every target row. Nothing changes.
     * Checks types, PRIMARY KEY non-NULL, and uniqueness both against rows
     * outside the batch and between the updated rows themselves.
     */
    prepareUpdate(rowIds: readonly number[], assignments: Readonly<Record<string, Value>>): PendingUpdate[] {
        const changes: Array<[ColumnDefinition, Value]> = [];
        for (const [name, value] of Object.entries(assignments)) {
            const column = this.requireColumn(name);
            this.checkType(column, value);
            changes.push([column, value]);
        }

        const targets = this.getRows(rowIds);
        const batch = new Set(targets.map((row) => row.rowId));
        const pending: PendingUpdate[] = [];

        for (const target of targets) {
            const after: Row = { ...target.data };
            for (const [column, value] of changes) {
                after[column.name] = value;
            }
            this.checkUniqueness(after, batch);
            pending.push({ rowId: target.rowId, before: target.data, after });
        }

        // Every target receives the same literal, so two or more targets
        // collide on any unique column being assigned a non-NULL value
        if (pending.length > 1) {
            for (const [column, value] of changes) {
                if ((column.primaryKey || column.unique) && value !== null) {
                    throw this.duplicateError(column, value);
                }
            }
        }

        return pending;
    }

    /**
     * Apply updates produced by prepareUpdate. Returns the number of rows.
     */
    applyUpdate(pending: readonly PendingUpdate[]): number {
        for (const change of pending) {
            const row = this.rows.get(change.rowId);
            if (!row) {
                continue;
            }
            for (const index of this.indexes.values()) {
                const column = index.getColumnName();
                index.remove(change.before[column], change.rowId);
                index.add(change.after[column], change.rowId);
            }
            row.data = change.after;
        }
        return pending.length;
    }

    /**
     * Delete rows by id. Returns the number of rows removed.
     */
    delete(rowIds: readonly number[]): number {
        let deletedCount = 0;

        for (const rowId of rowIds) {
            const row = this.rows.get(rowId);
            if (!row) {
                continue;
            }
            for (const index of this.indexes.values()) {
                index.remove(row.data[index.getColumnName()], rowId);
            }
            this.rows.delete(rowId);
            deletedCount++;
        }

        return deletedCount;
    }

    // ==========================================================================
    // PERSISTENCE
    // ==========================================================================

    /**
     * Serialize the table for persistence. Rows are value lists in column order.
     */
    serialize(): SerializedTable {
        const names = this.getColumnNames();
        return {
            name: this.schema.tableName,
            columns: this.schema.columns.map((column) => ({ ...column })),
            rows: this.scan().map((row) => names.map((name) => row.data[name])),
        };
    }

    /**
     * Restore a table from serialized data. Rows are re-inserted, which
     * validates them and rebuilds every index.
     */
    static deserialize(data: SerializedTable): Table {
        const table = new Table({ tableName: data.name, columns: data.columns });

        for (const values of data.rows) {
            table.insert(values);
        }

        return table;
    }
}
