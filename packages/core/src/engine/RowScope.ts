/**
 * KeelDB - Row Scope
 *
 * Binds column references to the tables of a query. A single-table query
 * keys its source rows by column name; a join keys them by `table.column`.
 */

import type { RowAccessor } from './ExpressionEvaluator';
import { canonicalName, referenceText } from './Aggregator';
import { ColumnNotFoundError, ErrorCode, InternalError } from '../errors';
import type { Table } from '../storage/Table';
import type {
    AggregateProjection,
    ColumnDefinition,
    ColumnProjection,
    ColumnReference,
    Expression,
    Row,
} from '../types';

/**
 * A column reference bound to its table.
 */
export interface ScopedColumn {
    /** Key of the value in source rows. */
    key: string;
    table: Table;
    definition: ColumnDefinition;
}

export class RowScope {
    private readonly tables: readonly Table[];
    private readonly cache: Map<ColumnReference, ScopedColumn>;

    constructor(tables: readonly Table[]) {
        if (tables.length === 0) {
            throw new InternalError('A row scope needs at least one table');
        }
        this.tables = tables;
        this.cache = new Map();
    }

    isJoined(): boolean {
        return this.tables.length > 1;
    }

    keyFor(table: Table, column: ColumnDefinition): string {
        return this.isJoined() ? `${table.getName()}.${column.name}` : column.name;
    }

    /**
     * Every column of every table, in table then column order (`*`).
     */
    columns(): ScopedColumn[] {
        return this.tables.flatMap((table) =>
            table.getColumns().map((definition) => ({
                key: this.keyFor(table, definition),
                table,
                definition,
            }))
        );
    }

    /**
     * Bind a reference, or throw ColumnNotFoundError when it is unknown or
     * matches columns in more than one table.
     */
    resolve(ref: ColumnReference): ScopedColumn {
        const cached = this.cache.get(ref);
        if (cached) {
            return cached;
        }

        const resolved = ref.table !== undefined ? this.resolveQualified(ref, ref.table) : this.resolveBare(ref);
        this.cache.set(ref, resolved);
        return resolved;
    }

    private resolveQualified(ref: ColumnReference, tableName: string): ScopedColumn {
        const lower = tableName.toLowerCase();
        const table = this.tables.find((candidate) => candidate.getName().toLowerCase() === lower);
        const text = referenceText(ref);

        if (!table) {
            throw new ColumnNotFoundError(
                text,
                `Unknown table '${tableName}' in column reference '${text}'`
            );
        }

        const definition = table.getColumn(ref.column);
        if (!definition) {
            throw new ColumnNotFoundError(text, `Column '${text}' does not exist`)
                .withContext({ table: table.getName() });
        }

        return { key: this.keyFor(table, definition), table, definition };
    }

    private resolveBare(ref: ColumnReference): ScopedColumn {
        const matches: ScopedColumn[] = [];
        for (const table of this.tables) {
            const definition = table.getColumn(ref.column);
            if (definition) {
                matches.push({ key: this.keyFor(table, definition), table, definition });
            }
        }

        if (matches.length === 0) {
            throw new ColumnNotFoundError(
                ref.column,
                this.isJoined()
                    ? `Column '${ref.column}' does not exist`
                    : `Column '${ref.column}' does not exist in table '${this.tables[0].getName()}'`
            );
        }

        if (matches.length > 1) {
            throw new ColumnNotFoundError(
                ref.column,
                `Column reference '${ref.column}' is ambiguous; qualify it with a table name`,
                ErrorCode.AMBIGUOUS_COLUMN
            );
        }

        return matches[0];
    }

    /**
     * Resolve every column reference in an expression, so unknown columns
     * fail even when there are no rows to evaluate.
     */
    check(expr: Expression): void {
        switch (expr.kind) {
            case 'literal':
            case 'aggregate':
                return;
            case 'column':
                this.resolve(expr);
                return;
            case 'comparison':
            case 'and':
            case 'or':
                this.check(expr.left);
                this.check(expr.right);
                return;
            case 'not':
            case 'isNull':
            case 'like':
                this.check(expr.operand);
                return;
            case 'between':
                this.check(expr.operand);
                this.check(expr.low);
                this.check(expr.high);
                return;
            case 'in':
                this.check(expr.operand);
                expr.values.forEach((value) => this.check(value));
                return;
            default: {
                const exhaustive: never = expr;
                throw new InternalError(`Unknown expression kind: ${JSON.stringify(exhaustive)}`);
            }
        }
    }

    /**
     * Accessor over one source row. Aggregates never reach row-level
     * evaluation: the parser only admits them where groups are evaluated.
     */
    accessor(row: Row): RowAccessor {
        return {
            column: (ref) => row[this.resolve(ref).key],
            aggregate: (call) => {
                throw new InternalError(`Aggregate ${canonicalName(call)} evaluated outside a group`);
            },
        };
    }

    /**
     * Output key of a projection: its alias, the aggregate's canonical text,
     * or the declared column name (table-qualified when written that way).
     */
    outputName(projection: ColumnProjection | AggregateProjection): string {
        if (projection.alias !== undefined) {
            return projection.alias;
        }
        if (projection.kind === 'aggregate') {
            return canonicalName(projection.expression);
        }

        const resolved = this.resolve(projection.expression);
        return projection.expression.table !== undefined
            ? `${resolved.table.getName()}.${resolved.definition.name}`
            : resolved.definition.name;
    }
}
