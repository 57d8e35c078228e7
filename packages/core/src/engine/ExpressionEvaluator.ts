/**
 * KeelDB - Expression Evaluator
 *
 * Evaluates expression trees against a single row (or group) with SQL
 * three-valued logic: every predicate yields true, false or null (unknown).
 * Filters keep a row only when the predicate is exactly true.
 */

import { InternalError, TypeMismatchError } from '../errors';
import { compareValues, describeValueType, familyOf } from '../utils/values';
import type {
    AggregateCall,
    ColumnReference,
    ComparisonOperator,
    Expression,
    Value,
} from '../types';

/**
 * Result of a predicate. null is SQL's unknown.
 */
export type Truth = boolean | null;

/**
 * Resolves the leaves of an expression for the row being evaluated.
 */
export interface RowAccessor {
    column(ref: ColumnReference): Value;
    aggregate(call: AggregateCall): Value;
}

/**
 * Evaluate an expression used as a condition (WHERE, ON, HAVING).
 */
export function evaluatePredicate(expr: Expression, accessor: RowAccessor): Truth {
    switch (expr.kind) {
        case 'literal':
        case 'column':
        case 'aggregate':
            return asTruth(evaluateOperand(expr, accessor));

        case 'comparison':
            return compare(
                expr.operator,
                evaluateOperand(expr.left, accessor),
                evaluateOperand(expr.right, accessor)
            );

        case 'and': {
            const left = evaluatePredicate(expr.left, accessor);
            if (left === false) return false;
            const right = evaluatePredicate(expr.right, accessor);
            if (right === false) return false;
            return left === null || right === null ? null : true;
        }

        case 'or': {
            const left = evaluatePredicate(expr.left, accessor);
            if (left === true) return true;
            const right = evaluatePredicate(expr.right, accessor);
            if (right === true) return true;
            return left === null || right === null ? null : false;
        }

        case 'not': {
            const operand = evaluatePredicate(expr.operand, accessor);
            return operand === null ? null : !operand;
        }

        case 'isNull': {
            const isNull = evaluateOperand(expr.operand, accessor) === null;
            return expr.negated ? !isNull : isNull;
        }

        case 'between': {
            const value = evaluateOperand(expr.operand, accessor);
            const low = evaluateOperand(expr.low, accessor);
            const high = evaluateOperand(expr.high, accessor);
            if (value === null || low === null || high === null) {
                return null;
            }
            const inRange = order(value, low) >= 0 && order(value, high) <= 0;
            return expr.negated ? !inRange : inRange;
        }

        case 'in': {
            const probe = evaluateOperand(expr.operand, accessor);
            if (probe === null) {
                return null;
            }

            let sawNull = false;
            for (const candidate of expr.values) {
                const value = evaluateOperand(candidate, accessor);
                if (value === null) {
                    sawNull = true;
                } else if (equals(probe, value)) {
                    return !expr.negated;
                }
            }

            return sawNull ? null : expr.negated;
        }

        case 'like': {
            const value = evaluateOperand(expr.operand, accessor);
            if (value === null) {
                return null;
            }
            const matched = matchLike(String(value), expr.pattern);
            return expr.negated ? !matched : matched;
        }

        default: {
            const exhaustive: never = expr;
            throw new InternalError(`Unknown expression kind: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * Evaluate an expression to a value. Predicate nodes evaluate to BOOL/NULL.
 */
export function evaluateOperand(expr: Expression, accessor: RowAccessor): Value {
    switch (expr.kind) {
        case 'literal':
            return expr.value;
        case 'column':
            return accessor.column(expr);
        case 'aggregate':
            return accessor.aggregate(expr);
        default:
            return evaluatePredicate(expr, accessor);
    }
}

/**
 * Keep a row only when its predicate is exactly true.
 */
export function isSatisfied(expr: Expression | undefined, accessor: RowAccessor): boolean {
    return expr === undefined || evaluatePredicate(expr, accessor) === true;
}

function asTruth(value: Value): Truth {
    if (value === null || typeof value === 'boolean') {
        return value;
    }
    throw new TypeMismatchError(
        `Expected a BOOL condition, got ${describeValueType(value)} value ${JSON.stringify(value)}`
    );
}

function equals(a: Exclude<Value, null>, b: Exclude<Value, null>): boolean {
    return familyOf(a) === familyOf(b) && a === b;
}

function order(a: Exclude<Value, null>, b: Exclude<Value, null>): number {
    const result = compareValues(a, b);
    if (result === undefined) {
        throw new TypeMismatchError(
            `Cannot compare ${describeValueType(a)} with ${describeValueType(b)}`
        );
    }
    return result;
}

function compare(operator: ComparisonOperator, left: Value, right: Value): Truth {
    if (left === null || right === null) {
        return null;
    }

    switch (operator) {
        case '=':
            return equals(left, right);
        case '!=':
        case '<>':
            return !equals(left, right);
        case '<':
            return order(left, right) < 0;
        case '>':
            return order(left, right) > 0;
        case '<=':
            return order(left, right) <= 0;
        case '>=':
            return order(left, right) >= 0;
    }
}

/**
 * Case-insensitive LIKE match. `%` matches any run of characters, `_`
 * exactly one; the pattern must cover the whole value.
 */
export function matchLike(value: string, pattern: string): boolean {
    const text = value.toLowerCase();
    const pat = pattern.toLowerCase();

    let t = 0;
    let p = 0;
    let starAt = -1;
    let resumeAt = 0;

    while (t < text.length) {
        if (p < pat.length && (pat[p] === '_' || (pat[p] !== '%' && pat[p] === text[t]))) {
            t++;
            p++;
        } else if (p < pat.length && pat[p] === '%') {
            starAt = p;
            resumeAt = t;
            p++;
        } else if (starAt !== -1) {
            // Let the last % swallow one more character and retry
            p = starAt + 1;
            resumeAt++;
            t = resumeAt;
        } else {
            return false;
        }
    }

    while (p < pat.length && pat[p] === '%') {
        p++;
    }
    return p === pat.length;
}
