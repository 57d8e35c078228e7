/**
 * KeelDB - Value Helpers
 *
 * Type checks, comparison and formatting shared by storage, the evaluator and
 * the result shaper.
 */

import type { DataType, Value } from '../types';

/**
 * Comparison family of a non-null value. INT and FLOAT share `number`.
 */
export type ValueFamily = 'number' | 'string' | 'boolean';

export function familyOf(value: Exclude<Value, null>): ValueFamily {
    switch (typeof value) {
        case 'number':
            return 'number';
        case 'string':
            return 'string';
        default:
            return 'boolean';
    }
}

/**
 * Check whether a value can be stored in a column of the given type.
 * NULL is accepted for every type.
 */
export function conformsTo(value: Value, type: DataType): boolean {
    if (value === null) {
        return true;
    }

    switch (type) {
        case 'INT':
            return typeof value === 'number' && Number.isSafeInteger(value);
        case 'FLOAT':
            return typeof value === 'number' && Number.isFinite(value);
        case 'STRING':
            return typeof value === 'string';
        case 'BOOL':
            return typeof value === 'boolean';
    }
}

/**
 * Name of the SQL type a literal value would have, for error messages.
 */
export function describeValueType(value: Value): string {
    if (value === null) {
        return 'NULL';
    }
    if (typeof value === 'number') {
        return Number.isInteger(value) ? 'INT' : 'FLOAT';
    }
    return typeof value === 'string' ? 'STRING' : 'BOOL';
}

/**
 * Order two non-null values of the same family. Returns undefined when the
 * families differ. false sorts before true.
 */
export function compareValues(a: Exclude<Value, null>, b: Exclude<Value, null>): number | undefined {
    if (a === b) {
        return 0;
    }
    if (typeof a === 'number' && typeof b === 'number') {
        return a < b ? -1 : 1;
    }
    if (typeof a === 'string' && typeof b === 'string') {
        return a < b ? -1 : 1;
    }
    if (typeof a === 'boolean' && typeof b === 'boolean') {
        return a ? 1 : -1;
    }
    return undefined;
}

/**
 * Stable hash key for a value. Prefixed with the family so 1 and '1' differ.
 */
export function hashKey(value: Value): string {
    if (value === null) {
        return '__NULL__';
    }
    return `${familyOf(value)}:${String(value)}`;
}

/**
 * Render a value the way SQL literals read: NULL, TRUE/FALSE, plain text.
 */
export function formatValue(value: Value | undefined): string {
    if (value === null || value === undefined) {
        return 'NULL';
    }
    if (typeof value === 'boolean') {
        return value ? 'TRUE' : 'FALSE';
    }
    return String(value);
}
