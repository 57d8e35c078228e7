/**
 * Result Shaping Tests
 */

import { describe, it, expect } from 'vitest';
import { compareSortValues, distinctEntries, paginate, sortEntries, type ResultEntry, type SortKey } from '../ResultShaper';
import type { Row } from '../../types';

function entry(row: Row): ResultEntry {
    return {
        row,
        accessor: {
            column: (ref) => row[ref.column] ?? null,
            aggregate: () => null,
        },
    };
}

function key(column: string, direction: 'ASC' | 'DESC' = 'ASC'): SortKey {
    return { direction, valueOf: (e) => e.row[column] ?? null };
}

describe('compareSortValues', () => {
    it('sorts NULL last in both directions', () => {
        expect(compareSortValues(null, 1, 'ASC')).toBe(1);
        expect(compareSortValues(null, 1, 'DESC')).toBe(1);
        expect(compareSortValues(1, null, 'DESC')).toBe(-1);
        expect(compareSortValues(null, null, 'ASC')).toBe(0);
    });

    it('orders false before true', () => {
        expect(compareSortValues(false, true, 'ASC')).toBe(-1);
    });

    it('rejects mixing families', () => {
        expect(() => compareSortValues(1, 'a', 'ASC')).toThrow('Cannot order INT and STRING values together');
    });
});

describe('sortEntries', () => {
    it('sorts by several keys and keeps ties in input order', () => {
        const entries = [
            entry({ id: 1, dept: 'b', pay: 10 }),
            entry({ id: 2, dept: 'a', pay: 20 }),
            entry({ id: 3, dept: 'b', pay: 30 }),
            entry({ id: 4, dept: 'a', pay: 20 }),
            entry({ id: 5, dept: null, pay: 5 }),
        ];

        const sorted = sortEntries(entries, [key('dept'), key('pay', 'DESC')]);
        expect(sorted.map((e) => e.row.id)).toEqual([2, 4, 3, 1, 5]);
    });
});

describe('distinctEntries', () => {
    it('keeps the first occurrence of each output row', () => {
        const entries = [
            entry({ a: 1, b: 'x' }),
            entry({ a: 1, b: 'x' }),
            entry({ a: '1', b: 'x' }),
            entry({ a: null, b: 'x' }),
            entry({ a: null, b: 'x' }),
        ];
        const result = distinctEntries(entries, ['a', 'b']);
        expect(result.map((e) => e.row)).toEqual([
            { a: 1, b: 'x' },
            { a: '1', b: 'x' },
            { a: null, b: 'x' },
        ]);
        expect(result[0]).toBe(entries[0]);
    });
});

describe('paginate', () => {
    const items = [10, 20, 30, 40];

    it('applies OFFSET before LIMIT', () => {
        expect(paginate(items, 1, 2)).toEqual([20, 30]);
    });

    it('handles missing and out-of-range bounds', () => {
        expect(paginate(items)).toEqual([10, 20, 30, 40]);
        expect(paginate(items, 3)).toEqual([40]);
        expect(paginate(items, 10, 2)).toEqual([]);
        expect(paginate(items, undefined, 0)).toEqual([]);
    });
});
