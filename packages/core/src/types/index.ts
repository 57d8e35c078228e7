/**
 * KeelDB - Core Type Definitions
 *
 * Fundamental types shared by the storage engine, the SQL pipeline and the
 * result surface. Statement and expression trees live in `./ast`.
 */

export * from './ast';

// =============================================================================
// DATA TYPES
// =============================================================================

/**
 * Supported column data types:
 * - INT: whole numbers
 * - FLOAT: any finite number
 * - STRING: text
 * - BOOL: true/false
 */
export type DataType = 'INT' | 'FLOAT' | 'STRING' | 'BOOL';

export const DATA_TYPES: readonly DataType[] = ['INT', 'FLOAT', 'STRING', 'BOOL'];

/**
 * JavaScript representation of KeelDB values. INT and FLOAT share `number`.
 */
export type Value = number | string | boolean | null;

/**
 * A single row of data, mapping column names to their values.
 */
export type Row = Record<string, Value>;

/**
 * Internal row representation. The rowId is stable for the life of the row
 * and is what indexes point at.
 */
export interface InternalRow {
    rowId: number;
    data: Row;
}

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Target of a REFERENCES (foreign key) clause.
 */
export interface ForeignKeyReference {
    table: string;
    column: string;
}

/**
 * Defines a single column in a table schema.
 */
export interface ColumnDefinition {
    name: string;
    type: DataType;
    primaryKey: boolean;
    unique: boolean;
    references?: ForeignKeyReference;
}

/**
 * Complete table schema definition.
 */
export interface TableSchema {
    tableName: string;
    columns: ColumnDefinition[];
}

// =============================================================================
// QUERY RESULTS
// =============================================================================

/**
 * Result of a SELECT.
 */
export interface RowsResult {
    success: true;
    type: 'rows';
    columns: string[];
    rows: Row[];
    rowCount: number;
}

/**
 * Result of INSERT/UPDATE/DELETE, DDL and USE. DDL reports zero rows.
 */
export interface MutationResult {
    success: true;
    type: 'mutation';
    rowCount: number;
    message: string;
}

/**
 * Result of SHOW and DESCRIBE.
 */
export interface SchemaResult {
    success: true;
    type: 'schema';
    columns: string[];
    rows: Row[];
    rowCount: number;
}

export type QueryResult = RowsResult | MutationResult | SchemaResult;

/**
 * Stable error kinds surfaced at the command boundary.
 */
export type ErrorKind =
    | 'SyntaxError'
    | 'DatabaseNotFoundError'
    | 'TableNotFoundError'
    | 'ColumnNotFoundError'
    | 'TypeMismatchError'
    | 'ConstraintViolation'
    | 'AmbiguousAggregationError'
    | 'UnsupportedFeatureError'
    | 'SchemaError'
    | 'StorageError'
    | 'InternalError';

/**
 * Result of a failed command.
 */
export interface QueryError {
    success: false;
    kind: ErrorKind;
    error: string;
    code: string;
    context?: Record<string, unknown>;
}

/**
 * Union type for any command result.
 */
export type ExecutionResult = QueryResult | QueryError;

// =============================================================================
// STORAGE TYPES
// =============================================================================

/**
 * Serializable table: schema plus rows as flat value lists in column order.
 * Row ids are not persisted; indexes are rebuilt on load.
 */
export interface SerializedTable {
    name: string;
    columns: ColumnDefinition[];
    rows: Value[][];
}

/**
 * Serializable database document.
 */
export interface SerializedDatabase {
    version: string;
    name: string;
    savedAt: string;
    tables: SerializedTable[];
}

/**
 * Catalog metadata document listing known databases.
 */
export interface CatalogMetadata {
    databases: string[];
}
