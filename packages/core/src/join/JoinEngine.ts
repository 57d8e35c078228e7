/**
 * KeelDB - Join Engine
 *
 * Implements INNER JOIN using a nested-loop algorithm.
 *
 * Design decisions:
 * - Every left row is paired with every right row and kept when ON is true;
 *   rows without a partner on either side are dropped
 * - Output order is left row order, then right row order
 * - When ON is `left.col = right.col` and the right column is indexed, the
 *   inner loop is an index lookup instead of a scan
 *
 * Time Complexity:
 * - Without index: O(n * m) where n and m are row counts of the two tables
 * - With index on join column: O(n * k) where k is average matches per key
 */

import { isSatisfied } from '../engine/ExpressionEvaluator';
import type { RowScope, ScopedColumn } from '../engine/RowScope';
import type { Table } from '../storage/Table';
import type { Expression, InternalRow, Row } from '../types';

interface IndexedEquiJoin {
    left: ScopedColumn;
    right: ScopedColumn;
}

/**
 * Detect `a.x = b.y` where one side belongs to each table and the right-hand
 * table has an index on its column.
 */
function findIndexedEquiJoin(on: Expression, leftTable: Table, rightTable: Table, scope: RowScope): IndexedEquiJoin | undefined {
    if (leftTable === rightTable) {
        return undefined;
    }
    if (on.kind !== 'comparison' || on.operator !== '=' || on.left.kind !== 'column' || on.right.kind !== 'column') {
        return undefined;
    }

    const a = scope.resolve(on.left);
    const b = scope.resolve(on.right);
    const pair = a.table === leftTable && b.table === rightTable
        ? { left: a, right: b }
        : b.table === leftTable && a.table === rightTable
            ? { left: b, right: a }
            : undefined;

    if (!pair || !rightTable.getIndex(pair.right.definition.name)) {
        return undefined;
    }
    return pair;
}

function combine(scope: RowScope, leftTable: Table, left: InternalRow, rightTable: Table, right: InternalRow): Row {
    const row: Row = {};
    for (const column of leftTable.getColumns()) {
        row[scope.keyFor(leftTable, column)] = left.data[column.name];
    }
    for (const column of rightTable.getColumns()) {
        row[scope.keyFor(rightTable, column)] = right.data[column.name];
    }
    return row;
}

/**
 * Perform an INNER JOIN between two tables.
 *
 * @param leftTable - The left table (FROM clause)
 * @param rightTable - The right table (JOIN clause)
 * @param on - The join condition
 * @param scope - Scope over both tables; joined rows use its `table.column` keys
 */
export function innerJoin(leftTable: Table, rightTable: Table, on: Expression, scope: RowScope): Row[] {
    scope.check(on);

    const indexed = findIndexedEquiJoin(on, leftTable, rightTable, scope);
    const rightIndex = indexed ? rightTable.getIndex(indexed.right.definition.name) : undefined;
    const rightRows = rightTable.scan();
    const result: Row[] = [];

    for (const leftRow of leftTable.scan()) {
        let candidates: InternalRow[];

        if (indexed && rightIndex) {
            const value = leftRow.data[indexed.left.definition.name];
            // NULL never equals anything, even though the index holds NULL keys
            candidates = value === null ? [] : rightTable.getRows(rightIndex.lookup(value));
        } else {
            candidates = rightRows;
        }

        for (const rightRow of candidates) {
            const joined = combine(scope, leftTable, leftRow, rightTable, rightRow);
            if (isSatisfied(on, scope.accessor(joined))) {
                result.push(joined);
            }
        }
    }

    return result;
}
