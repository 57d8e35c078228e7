/**
 * KeelDB - Result Shaping
 *
 * The tail of the SELECT pipeline: DISTINCT, ORDER BY, OFFSET and LIMIT over
 * fully projected rows.
 */

import type { RowAccessor } from './ExpressionEvaluator';
import { TypeMismatchError } from '../errors';
import { compareValues, describeValueType, hashKey } from '../utils/values';
import type { Row, SortDirection, Value } from '../types';

/**
 * A projected output row plus the accessor it was produced from, so ORDER BY
 * can still reach source columns and aggregates that were not projected.
 */
export interface ResultEntry {
    row: Row;
    accessor: RowAccessor;
}

export interface SortKey {
    valueOf(entry: ResultEntry): Value;
    direction: SortDirection;
}

/**
 * Keep the first occurrence of each distinct output row.
 */
export function distinctEntries(entries: readonly ResultEntry[], columns: readonly string[]): ResultEntry[] {
    const seen = new Set<string>();
    const result: ResultEntry[] = [];

    for (const entry of entries) {
        const key = columns.map((column) => hashKey(entry.row[column])).join('\u0000');
        if (!seen.has(key)) {
            seen.add(key);
            result.push(entry);
        }
    }

    return result;
}

/**
 * Compare two sort values. NULL sorts after every non-NULL value whichever
 * the direction.
 */
export function compareSortValues(a: Value, b: Value, direction: SortDirection): number {
    if (a === null || b === null) {
        if (a === b) return 0;
        return a === null ? 1 : -1;
    }

    const order = compareValues(a, b);
    if (order === undefined) {
        throw new TypeMismatchError(
            `Cannot order ${describeValueType(a)} and ${describeValueType(b)} values together`
        );
    }
    return direction === 'DESC' ? -order : order;
}

/**
 * Stable multi-key sort.
 */
export function sortEntries(entries: readonly ResultEntry[], keys: readonly SortKey[]): ResultEntry[] {
    const decorated = entries.map((entry, position) => ({
        entry,
        position,
        values: keys.map((key) => key.valueOf(entry)),
    }));

    decorated.sort((a, b) => {
        for (let i = 0; i < keys.length; i++) {
            const order = compareSortValues(a.values[i], b.values[i], keys[i].direction);
            if (order !== 0) {
                return order;
            }
        }
        return a.position - b.position;
    });

    return decorated.map((item) => item.entry);
}

/**
 * Skip `offset` items, then keep at most `limit`.
 */
export function paginate<T>(items: readonly T[], offset?: number, limit?: number): T[] {
    const start = offset ?? 0;
    const end = limit === undefined ? undefined : start + limit;
    return items.slice(start, end);
}
