/**
 * KeelDB - Aggregation Engine
 *
 * Partitions WHERE-surviving rows into groups, computes aggregate calls per
 * group, applies HAVING and projects one output row per group.
 *
 * - Without GROUP BY every row falls into a single group, even when there
 *   are no rows, so `SELECT COUNT(*)` always yields one row
 * - Groups are emitted in order of first occurrence
 * - NULL is a group key of its own; 1 and '1' are different keys
 */

import { isSatisfied, type RowAccessor } from './ExpressionEvaluator';
import type { ResultEntry } from './ResultShaper';
import type { RowScope, ScopedColumn } from './RowScope';
import { AmbiguousAggregationError, TypeMismatchError } from '../errors';
import { compareValues, describeValueType, hashKey } from '../utils/values';
import type {
    AggregateCall,
    ColumnReference,
    Projection,
    Row,
    SelectStatement,
    Value,
} from '../types';

/**
 * Text of a column reference as written (`users.id` or `id`).
 */
export function referenceText(ref: ColumnReference): string {
    return ref.table !== undefined ? `${ref.table}.${ref.column}` : ref.column;
}

/**
 * Output key of an unaliased aggregate: `COUNT(*)`, `SUM(salary)`.
 */
export function canonicalName(call: AggregateCall): string {
    return `${call.fn}(${call.argument === '*' ? '*' : referenceText(call.argument)})`;
}

/**
 * A SELECT is aggregated when it groups, has HAVING, or calls an aggregate
 * in its projection or ORDER BY.
 */
export function isAggregateQuery(statement: SelectStatement): boolean {
    return (
        statement.groupBy.length > 0 ||
        statement.having !== undefined ||
        statement.projections.some((projection) => projection.kind === 'aggregate') ||
        statement.orderBy.some((item) => item.expression.kind === 'aggregate')
    );
}

/**
 * Compute one aggregate over a group's rows. NULLs are ignored except by
 * COUNT(*); SUM/AVG/MIN/MAX of no values is NULL.
 */
export function computeAggregate(call: AggregateCall, rows: readonly Row[], valueOf: (row: Row) => Value): Value {
    if (call.argument === '*') {
        return rows.length;
    }

    const values: Array<Exclude<Value, null>> = [];
    for (const row of rows) {
        const value = valueOf(row);
        if (value !== null) {
            values.push(value);
        }
    }

    switch (call.fn) {
        case 'COUNT':
            return values.length;

        case 'SUM':
        case 'AVG': {
            if (values.length === 0) {
                return null;
            }
            let sum = 0;
            for (const value of values) {
                if (typeof value !== 'number') {
                    throw new TypeMismatchError(
                        `${call.fn} requires a numeric column, got ${describeValueType(value)}`
                    );
                }
                sum += value;
            }
            return call.fn === 'SUM' ? sum : sum / values.length;
        }

        case 'MIN':
        case 'MAX': {
            let best: Exclude<Value, null> | null = null;
            for (const value of values) {
                if (best === null) {
                    best = value;
                    continue;
                }
                const order = compareValues(value, best);
                if (order === undefined) {
                    throw new TypeMismatchError(
                        `Cannot compare ${describeValueType(value)} with ${describeValueType(best)} in ${call.fn}`
                    );
                }
                if ((call.fn === 'MIN' && order < 0) || (call.fn === 'MAX' && order > 0)) {
                    best = value;
                }
            }
            return best;
        }
    }
}

interface Group {
    keys: Value[];
    rows: Row[];
    aggregates: Map<string, Value>;
}

export interface AggregationResult {
    columns: string[];
    entries: ResultEntry[];
}

export class Aggregator {
    private readonly statement: SelectStatement;
    private readonly scope: RowScope;
    private readonly groupColumns: ScopedColumn[];

    constructor(statement: SelectStatement, scope: RowScope) {
        this.statement = statement;
        this.scope = scope;
        this.groupColumns = statement.groupBy.map((ref) => scope.resolve(ref));
        this.validate();
    }

    /**
     * Reject projections that are neither grouped nor aggregated, and
     * SUM/AVG over non-numeric columns, before any row is read.
     */
    private validate(): void {
        for (const projection of this.statement.projections) {
            switch (projection.kind) {
                case 'star':
                    throw new AmbiguousAggregationError('*');
                case 'column':
                    this.checkGroupColumn(projection.expression);
                    break;
                case 'aggregate':
                    this.checkAggregate(projection.expression);
                    break;
            }
        }
    }

    /**
     * A plain column in an aggregated query must be a GROUP BY column.
     */
    checkGroupColumn(ref: ColumnReference): number {
        const resolved = this.scope.resolve(ref);
        const position = this.groupColumns.findIndex((column) => column.key === resolved.key);
        if (position === -1) {
            throw new AmbiguousAggregationError(referenceText(ref));
        }
        return position;
    }

    checkAggregate(call: AggregateCall): void {
        if (call.argument === '*') {
            return;
        }
        const resolved = this.scope.resolve(call.argument);
        const type = resolved.definition.type;
        if ((call.fn === 'SUM' || call.fn === 'AVG') && type !== 'INT' && type !== 'FLOAT') {
            throw new TypeMismatchError(
                `${call.fn} requires a numeric column, but '${referenceText(call.argument)}' is ${type}`,
                { column: resolved.definition.name }
            );
        }
    }

    /**
     * Group rows, filter groups by HAVING and build one output row per group.
     */
    run(rows: readonly Row[]): AggregationResult {
        const projections = this.statement.projections.filter(
            (projection): projection is Exclude<Projection, { kind: 'star' }> => projection.kind !== 'star'
        );
        const columns = projections.map((projection) => this.scope.outputName(projection));

        const entries: ResultEntry[] = [];
        for (const group of this.partition(rows)) {
            const accessor = this.groupAccessor(group);
            if (!isSatisfied(this.statement.having, accessor)) {
                continue;
            }

            const row: Row = {};
            projections.forEach((projection, i) => {
                row[columns[i]] = projection.kind === 'aggregate'
                    ? this.aggregate(group, projection.expression)
                    : group.keys[this.checkGroupColumn(projection.expression)];
            });
            entries.push({ row, accessor });
        }

        return { columns, entries };
    }

    private partition(rows: readonly Row[]): Group[] {
        if (this.groupColumns.length === 0) {
            return [{ keys: [], rows: [...rows], aggregates: new Map() }];
        }

        const groups = new Map<string, Group>();
        for (const row of rows) {
            const keys = this.groupColumns.map((column) => row[column.key]);
            const id = keys.map(hashKey).join('\u0000');

            let group = groups.get(id);
            if (!group) {
                group = { keys, rows: [], aggregates: new Map() };
                groups.set(id, group);
            }
            group.rows.push(row);
        }
        return Array.from(groups.values());
    }

    private aggregate(group: Group, call: AggregateCall): Value {
        const name = canonicalName(call).toLowerCase();
        const cached = group.aggregates.get(name);
        if (cached !== undefined) {
            return cached;
        }

        this.checkAggregate(call);
        const argument = call.argument;
        const value = computeAggregate(
            call,
            group.rows,
            argument === '*' ? () => null : (row) => row[this.scope.resolve(argument).key]
        );
        group.aggregates.set(name, value);
        return value;
    }

    /**
     * Accessor used by HAVING and ORDER BY. Bare names first match aliases
     * of the projection, then GROUP BY columns.
     */
    private groupAccessor(group: Group): RowAccessor {
        const accessor: RowAccessor = {
            column: (ref) => {
                if (ref.table === undefined) {
                    const aliased = this.findAlias(ref.column);
                    if (aliased) {
                        return aliased.kind === 'aggregate'
                            ? this.aggregate(group, aliased.expression)
                            : group.keys[this.checkGroupColumn(aliased.expression)];
                    }
                }
                return group.keys[this.checkGroupColumn(ref)];
            },
            aggregate: (call) => this.aggregate(group, call),
        };
        return accessor;
    }

    private findAlias(name: string): Exclude<Projection, { kind: 'star' }> | undefined {
        const lower = name.toLowerCase();
        for (const projection of this.statement.projections) {
            if (projection.kind !== 'star' && projection.alias !== undefined && projection.alias.toLowerCase() === lower) {
                return projection;
            }
        }
        return undefined;
    }
}
