/**
 * Error Hierarchy Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DatabaseNotFoundError,
    ErrorCode,
    InternalError,
    KeelError,
    TableNotFoundError,
    UnsupportedFeatureError,
    toKeelError,
} from '../index';

describe('KeelError', () => {
    it('keeps instanceof and the class name', () => {
        const error = new TableNotFoundError('orders');
        expect(error).toBeInstanceOf(KeelError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('TableNotFoundError');
        expect(error.kind).toBe('TableNotFoundError');
        expect(error.code).toBe(ErrorCode.TABLE_NOT_FOUND);
    });

    it('merges context', () => {
        const error = new TableNotFoundError('orders').withContext({ sql: 'SELECT * FROM orders' });
        expect(error.context).toEqual({ table: 'orders', sql: 'SELECT * FROM orders' });
    });

    it('serializes to JSON', () => {
        expect(new UnsupportedFeatureError('self-join').toJSON()).toEqual({
            name: 'UnsupportedFeatureError',
            kind: 'UnsupportedFeatureError',
            code: 'UNSUPPORTED_FEATURE',
            message: 'Unsupported feature: self-join',
        });
    });

    it('distinguishes a missing database from none selected', () => {
        expect(new DatabaseNotFoundError('shop').code).toBe(ErrorCode.DATABASE_NOT_FOUND);
        expect(new DatabaseNotFoundError('shop').message).toBe("Database 'shop' does not exist");
        expect(new DatabaseNotFoundError(null).code).toBe(ErrorCode.NO_DATABASE_SELECTED);
    });
});

describe('toKeelError', () => {
    it('passes KeelErrors through', () => {
        const error = new TableNotFoundError('t');
        expect(toKeelError(error)).toBe(error);
    });

    it('wraps other errors as internal', () => {
        const cause = new RangeError('boom');
        const wrapped = toKeelError(cause);
        expect(wrapped).toBeInstanceOf(InternalError);
        expect(wrapped.message).toBe('boom');
        expect(wrapped.cause).toBe(cause);
        expect(toKeelError('plain').message).toBe('plain');
    });
});
