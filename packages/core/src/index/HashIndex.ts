/**
 * KeelDB - Hash Index
 *
 * Hash-based index over one column, created automatically for PRIMARY KEY,
 * UNIQUE and REFERENCES columns.
 *
 * Design decisions:
 * - Uses JavaScript Map for O(1) average-case lookups
 * - Each key maps to a Set of row IDs, so the same structure serves key
 *   columns and foreign key columns; the table enforces uniqueness
 * - Keys are prefixed with the value family, so 1 and '1' never collide
 * - NULL is indexed like any other value; only the uniqueness check skips it
 *
 * The key set always equals the set of the column's values across live rows.
 */

import type { Value } from '../types';
import { hashKey } from '../utils/values';

interface IndexEntry {
    value: Value;
    rowIds: Set<number>;
}

export class HashIndex {
    private readonly columnName: string;
    private readonly entries: Map<string, IndexEntry>;

    constructor(columnName: string) {
        this.columnName = columnName;
        this.entries = new Map();
    }

    /**
     * Get the column name this index is built on.
     */
    getColumnName(): string {
        return this.columnName;
    }

    /**
     * Add a value-to-rowId mapping to the index.
     */
    add(value: Value, rowId: number): void {
        const key = hashKey(value);

        let entry = this.entries.get(key);
        if (!entry) {
            entry = { value, rowIds: new Set() };
            this.entries.set(key, entry);
        }

        entry.rowIds.add(rowId);
    }

    /**
     * Remove a value-to-rowId mapping. Empty keys are dropped.
     */
    remove(value: Value, rowId: number): void {
        const key = hashKey(value);
        const entry = this.entries.get(key);

        if (entry) {
            entry.rowIds.delete(rowId);
            if (entry.rowIds.size === 0) {
                this.entries.delete(key);
            }
        }
    }

    /**
     * Look up row IDs by value, in ascending row id order.
     */
    lookup(value: Value): number[] {
        const entry = this.entries.get(hashKey(value));
        return entry ? Array.from(entry.rowIds).sort((a, b) => a - b) : [];
    }

    /**
     * Check if a value exists in the index.
     */
    has(value: Value): boolean {
        return this.entries.has(hashKey(value));
    }

    /**
     * Distinct indexed values.
     */
    values(): Value[] {
        return Array.from(this.entries.values(), (entry) => entry.value);
    }
}
