/**
 * KeelDB Error Hierarchy
 *
 * Every failure inside the core is one of these classes. The executor catches
 * them at the command boundary and turns them into a `QueryError` carrying
 * the stable `kind`, so nothing leaves the core unconverted.
 *
 * @packageDocumentation
 */

import type { ErrorKind } from '../types';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Machine-readable codes, finer grained than `ErrorKind`.
 */
export enum ErrorCode {
    UNEXPECTED_CHARACTER = 'SYNTAX_UNEXPECTED_CHARACTER',
    UNTERMINATED_STRING = 'SYNTAX_UNTERMINATED_STRING',
    UNEXPECTED_TOKEN = 'SYNTAX_UNEXPECTED_TOKEN',
    UNEXPECTED_EOF = 'SYNTAX_UNEXPECTED_EOF',

    DATABASE_NOT_FOUND = 'BIND_DATABASE_NOT_FOUND',
    NO_DATABASE_SELECTED = 'BIND_NO_DATABASE_SELECTED',
    TABLE_NOT_FOUND = 'BIND_TABLE_NOT_FOUND',
    COLUMN_NOT_FOUND = 'BIND_COLUMN_NOT_FOUND',
    AMBIGUOUS_COLUMN = 'BIND_AMBIGUOUS_COLUMN',

    TYPE_MISMATCH = 'TYPE_MISMATCH',

    PRIMARY_KEY_VIOLATION = 'CONSTRAINT_PRIMARY_KEY',
    UNIQUE_VIOLATION = 'CONSTRAINT_UNIQUE',
    NOT_NULL_VIOLATION = 'CONSTRAINT_NOT_NULL',
    REFERENTIAL_INTEGRITY = 'CONSTRAINT_REFERENTIAL',

    AMBIGUOUS_AGGREGATION = 'AGGREGATE_AMBIGUOUS',
    UNSUPPORTED_FEATURE = 'UNSUPPORTED_FEATURE',

    INVALID_IDENTIFIER = 'SCHEMA_INVALID_IDENTIFIER',
    DUPLICATE_OBJECT = 'SCHEMA_DUPLICATE_OBJECT',
    INVALID_SCHEMA = 'SCHEMA_INVALID',
    ARITY_MISMATCH = 'SCHEMA_ARITY_MISMATCH',
    INVALID_VALUE = 'SCHEMA_INVALID_VALUE',
    INVALID_CONFIG = 'SCHEMA_INVALID_CONFIG',

    STORAGE_WRITE_FAILED = 'STORAGE_WRITE_FAILED',
    STORAGE_READ_FAILED = 'STORAGE_READ_FAILED',
    STORAGE_CORRUPT = 'STORAGE_CORRUPT',

    INTERNAL = 'INTERNAL',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Context attached to an error for logs and API responses.
 */
export interface ErrorContext {
    sql?: string;
    database?: string;
    table?: string;
    column?: string;
    position?: SourcePosition;
    metadata?: Record<string, unknown>;
}

/**
 * Location in the SQL text. Offset is 0-indexed, line and column 1-indexed.
 */
export interface SourcePosition {
    offset: number;
    line: number;
    column: number;
}

export interface SerializedError {
    name: string;
    kind: ErrorKind;
    code: string;
    message: string;
    context?: ErrorContext;
}

/**
 * Base class for all KeelDB errors.
 *
 * @example
 * ```typescript
 * try {
 *   table.insertRow(values);
 * } catch (error) {
 *   if (error instanceof KeelError) {
 *     console.log(error.kind);  // 'ConstraintViolation'
 *     console.log(error.code);  // 'CONSTRAINT_PRIMARY_KEY'
 *   }
 * }
 * ```
 */
export abstract class KeelError extends Error {
    abstract readonly kind: ErrorKind;
    readonly code: ErrorCode;
    context?: ErrorContext;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
        super(message, { cause: options?.cause });
        this.code = code;
        this.context = options?.context;
        this.name = new.target.name;

        // Keep instanceof working for subclasses under ES5-style transpilation
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Merge extra context (e.g. the SQL text) into the error.
     */
    withContext(context: ErrorContext): this {
        this.context = { ...this.context, ...context };
        return this;
    }

    toJSON(): SerializedError {
        const result: SerializedError = {
            name: this.name,
            kind: this.kind,
            code: this.code,
            message: this.message,
        };
        if (this.context) {
            result.context = this.context;
        }
        return result;
    }
}

// =============================================================================
// Concrete Errors
// =============================================================================

/**
 * Lexical or grammar failure. Named to avoid shadowing the global SyntaxError.
 */
export class SQLSyntaxError extends KeelError {
    readonly kind = 'SyntaxError' as const;
    readonly position: SourcePosition;
    readonly token: string;

    constructor(code: ErrorCode, message: string, token: string, position: SourcePosition) {
        super(code, message, { context: { position } });
        this.token = token;
        this.position = position;
    }
}

export class DatabaseNotFoundError extends KeelError {
    readonly kind = 'DatabaseNotFoundError' as const;

    constructor(name: string | null) {
        super(
            name === null ? ErrorCode.NO_DATABASE_SELECTED : ErrorCode.DATABASE_NOT_FOUND,
            name === null
                ? 'No database selected. Run USE <database> first'
                : `Database '${name}' does not exist`,
            name === null ? undefined : { context: { database: name } }
        );
    }
}

export class TableNotFoundError extends KeelError {
    readonly kind = 'TableNotFoundError' as const;

    constructor(table: string) {
        super(ErrorCode.TABLE_NOT_FOUND, `Table '${table}' does not exist`, { context: { table } });
    }
}

export class ColumnNotFoundError extends KeelError {
    readonly kind = 'ColumnNotFoundError' as const;

    constructor(column: string, message?: string, code: ErrorCode = ErrorCode.COLUMN_NOT_FOUND) {
        super(code, message ?? `Column '${column}' does not exist`, { context: { column } });
    }
}

export class TypeMismatchError extends KeelError {
    readonly kind = 'TypeMismatchError' as const;

    constructor(message: string, context?: ErrorContext) {
        super(ErrorCode.TYPE_MISMATCH, message, { context });
    }
}

export class ConstraintViolationError extends KeelError {
    readonly kind = 'ConstraintViolation' as const;

    constructor(code: ErrorCode, message: string, context?: ErrorContext) {
        super(code, message, { context });
    }
}

export class AmbiguousAggregationError extends KeelError {
    readonly kind = 'AmbiguousAggregationError' as const;

    constructor(column: string) {
        super(
            ErrorCode.AMBIGUOUS_AGGREGATION,
            `Column '${column}' must appear in GROUP BY or be used inside an aggregate function`,
            { context: { column } }
        );
    }
}

export class UnsupportedFeatureError extends KeelError {
    readonly kind = 'UnsupportedFeatureError' as const;

    constructor(feature: string) {
        super(ErrorCode.UNSUPPORTED_FEATURE, `Unsupported feature: ${feature}`);
    }
}

export class SchemaError extends KeelError {
    readonly kind = 'SchemaError' as const;

    constructor(code: ErrorCode, message: string, context?: ErrorContext) {
        super(code, message, { context });
    }
}

export class StorageError extends KeelError {
    readonly kind = 'StorageError' as const;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
        super(code, message, options);
    }
}

export class InternalError extends KeelError {
    readonly kind = 'InternalError' as const;

    constructor(message: string, cause?: unknown) {
        super(ErrorCode.INTERNAL, message, { cause });
    }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalize anything thrown into a KeelError.
 */
export function toKeelError(error: unknown): KeelError {
    if (error instanceof KeelError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalError(error.message, error);
    }
    return new InternalError(String(error));
}
