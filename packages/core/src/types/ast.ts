/**
 * KeelDB - Statement and Expression Trees
 *
 * Closed tagged unions produced by the parser. Every consumer switches on
 * `kind`/`type` with an exhaustive `never` check, so adding a node kind is a
 * compile error until each consumer handles it. Nodes are never mutated after
 * the parser builds them.
 */

import type { ColumnDefinition, Value } from './index';

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '>' | '<=' | '>=';

export type AggregateFunction = 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';

export interface LiteralExpression {
    readonly kind: 'literal';
    readonly value: Value;
}

/**
 * Column reference, optionally table-qualified (`orders.user_id`).
 */
export interface ColumnReference {
    readonly kind: 'column';
    readonly table?: string;
    readonly column: string;
}

export interface ComparisonExpression {
    readonly kind: 'comparison';
    readonly operator: ComparisonOperator;
    readonly left: Expression;
    readonly right: Expression;
}

export interface AndExpression {
    readonly kind: 'and';
    readonly left: Expression;
    readonly right: Expression;
}

export interface OrExpression {
    readonly kind: 'or';
    readonly left: Expression;
    readonly right: Expression;
}

export interface NotExpression {
    readonly kind: 'not';
    readonly operand: Expression;
}

export interface IsNullExpression {
    readonly kind: 'isNull';
    readonly operand: Expression;
    readonly negated: boolean;
}

export interface BetweenExpression {
    readonly kind: 'between';
    readonly operand: Expression;
    readonly low: Expression;
    readonly high: Expression;
    readonly negated: boolean;
}

export interface InListExpression {
    readonly kind: 'in';
    readonly operand: Expression;
    readonly values: readonly Expression[];
    readonly negated: boolean;
}

export interface LikeExpression {
    readonly kind: 'like';
    readonly operand: Expression;
    readonly pattern: string;
    readonly negated: boolean;
}

/**
 * COUNT(*) has no argument; every other call aggregates a single column.
 */
export interface AggregateCall {
    readonly kind: 'aggregate';
    readonly fn: AggregateFunction;
    readonly argument: ColumnReference | '*';
}

export type Expression =
    | LiteralExpression
    | ColumnReference
    | ComparisonExpression
    | AndExpression
    | OrExpression
    | NotExpression
    | IsNullExpression
    | BetweenExpression
    | InListExpression
    | LikeExpression
    | AggregateCall;

// =============================================================================
// SELECT CLAUSES
// =============================================================================

export interface StarProjection {
    readonly kind: 'star';
}

export interface ColumnProjection {
    readonly kind: 'column';
    readonly expression: ColumnReference;
    readonly alias?: string;
}

export interface AggregateProjection {
    readonly kind: 'aggregate';
    readonly expression: AggregateCall;
    readonly alias?: string;
}

export type Projection = StarProjection | ColumnProjection | AggregateProjection;

/**
 * Single INNER JOIN; unmatched rows on either side are dropped.
 */
export interface JoinClause {
    readonly type: 'INNER';
    readonly table: string;
    readonly on: Expression;
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderByItem {
    readonly expression: ColumnReference | AggregateCall;
    readonly direction: SortDirection;
}

// =============================================================================
// STATEMENTS
// =============================================================================

export interface CreateDatabaseStatement {
    readonly type: 'CREATE_DATABASE';
    readonly name: string;
}

export interface DropDatabaseStatement {
    readonly type: 'DROP_DATABASE';
    readonly name: string;
}

export interface UseStatement {
    readonly type: 'USE';
    readonly name: string;
}

export interface ShowDatabasesStatement {
    readonly type: 'SHOW_DATABASES';
}

export interface ShowTablesStatement {
    readonly type: 'SHOW_TABLES';
}

export interface DescribeStatement {
    readonly type: 'DESCRIBE';
    readonly tableName: string;
}

export interface CreateTableStatement {
    readonly type: 'CREATE_TABLE';
    readonly tableName: string;
    readonly columns: readonly ColumnDefinition[];
}

export interface DropTableStatement {
    readonly type: 'DROP_TABLE';
    readonly tableName: string;
}

export interface InsertStatement {
    readonly type: 'INSERT';
    readonly tableName: string;
    /** Absent when the statement lists values for every column in order. */
    readonly columns?: readonly string[];
    readonly values: readonly Value[];
}

export interface Assignment {
    readonly column: string;
    readonly value: Value;
}

export interface UpdateStatement {
    readonly type: 'UPDATE';
    readonly tableName: string;
    readonly assignments: readonly Assignment[];
    readonly where?: Expression;
}

export interface DeleteStatement {
    readonly type: 'DELETE';
    readonly tableName: string;
    readonly where?: Expression;
}

export interface SelectStatement {
    readonly type: 'SELECT';
    readonly distinct: boolean;
    readonly projections: readonly Projection[];
    readonly tableName: string;
    readonly join?: JoinClause;
    readonly where?: Expression;
    readonly groupBy: readonly ColumnReference[];
    readonly having?: Expression;
    readonly orderBy: readonly OrderByItem[];
    readonly limit?: number;
    readonly offset?: number;
}

export type ParsedStatement =
    | CreateDatabaseStatement
    | DropDatabaseStatement
    | UseStatement
    | ShowDatabasesStatement
    | ShowTablesStatement
    | DescribeStatement
    | CreateTableStatement
    | DropTableStatement
    | InsertStatement
    | UpdateStatement
    | DeleteStatement
    | SelectStatement;

export type StatementType = ParsedStatement['type'];

/**
 * Executor dispatch category.
 */
export type StatementCategory = 'DDL' | 'DML' | 'DQL';
