/**
 * KeelDB - Name and Paging Validation
 *
 * Checks applied to identifiers when objects are created, and to LIMIT/OFFSET
 * values.
 */

import { ErrorCode, SchemaError } from '../errors';
import { KEYWORDS } from './Tokenizer';

export const MAX_IDENTIFIER_LENGTH = 64;
export const MAX_LIMIT = 1_000_000;

/**
 * Words that are not keywords of this dialect but are still refused as names.
 */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
    'ALTER', 'INDEX', 'OUTER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'UNION',
    'FOREIGN', 'CHECK', 'DEFAULT', 'ALL', 'EXISTS', 'CASE', 'WHEN', 'THEN',
    'ELSE', 'END', 'CAST', 'CONVERT',
]);

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DATABASE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export type IdentifierKind = 'database' | 'table' | 'column';

export function isReservedWord(name: string): boolean {
    const upper = name.toUpperCase();
    return KEYWORDS.has(upper) || RESERVED_WORDS.has(upper);
}

/**
 * Validate a table or column name.
 */
export function validateIdentifier(name: string, kind: IdentifierKind): string {
    if (name.length === 0) {
        throw new SchemaError(ErrorCode.INVALID_IDENTIFIER, `The ${kind} name cannot be empty`);
    }

    if (name.length > MAX_IDENTIFIER_LENGTH) {
        throw new SchemaError(
            ErrorCode.INVALID_IDENTIFIER,
            `The ${kind} name '${name}' is too long (max ${MAX_IDENTIFIER_LENGTH} characters)`
        );
    }

    const pattern = kind === 'database' ? DATABASE_NAME_PATTERN : IDENTIFIER_PATTERN;
    if (!pattern.test(name)) {
        throw new SchemaError(
            ErrorCode.INVALID_IDENTIFIER,
            kind === 'database'
                ? `Invalid database name '${name}': only letters, digits, underscores and hyphens are allowed`
                : `Invalid ${kind} name '${name}': must start with a letter or underscore, followed by letters, digits or underscores`
        );
    }

    if (isReservedWord(name)) {
        throw new SchemaError(
            ErrorCode.INVALID_IDENTIFIER,
            `Invalid ${kind} name '${name}': it is a reserved SQL keyword`
        );
    }

    return name;
}

/**
 * Validate a LIMIT or OFFSET value.
 */
export function validatePaging(value: number, clause: 'LIMIT' | 'OFFSET'): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new SchemaError(
            ErrorCode.INVALID_VALUE,
            `${clause} must be a non-negative integer, got ${value}`
        );
    }
    if (value > MAX_LIMIT) {
        throw new SchemaError(
            ErrorCode.INVALID_VALUE,
            `${clause} is too large (max ${MAX_LIMIT.toLocaleString('en-US')}): ${value}`
        );
    }
    return value;
}
