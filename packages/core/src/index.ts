/**
 * KeelDB - A Small Relational Database Engine
 *
 * This is the main entry point for the KeelDB core package.
 * It exports all public APIs for use by other packages or applications.
 *
 * @packageDocumentation
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Storage
export { Catalog, Database, Table, Persistence, DATABASE_VERSION, DESCRIBE_COLUMNS } from './storage';
export type { CatalogOptions } from './storage';

// Indexing
export { HashIndex } from './index/HashIndex';

// Parser
export { Parser, Tokenizer, parse, parseScript, tokenize } from './parser';
export type { Token, TokenKind } from './parser';

// Engine
export { QueryExecutor, classifyStatement } from './engine/QueryExecutor';
export { Session } from './engine/Session';
export { evaluatePredicate, matchLike } from './engine/ExpressionEvaluator';
export type { Truth, RowAccessor } from './engine/ExpressionEvaluator';

// Join
export { innerJoin } from './join/JoinEngine';

// Configuration and connections
export { loadConfig, parseConnectionUrl } from './config';
export type { KeelConfig, ConnectionUrl } from './config';
export { connect, Connection } from './connection';
export type { ConnectOptions } from './connection';

// REPL
export { REPL, formatResult, formatTable } from './repl';

// Logging
export { createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';

import { Catalog } from './storage';
import { QueryExecutor } from './engine/QueryExecutor';
import { Session } from './engine/Session';

/**
 * Create an in-memory engine with a fresh session.
 *
 * @example
 * ```typescript
 * const { executor, session } = createEngine();
 * executor.executeScript('CREATE DATABASE shop; USE shop;', session);
 * ```
 */
export function createEngine(): { catalog: Catalog; executor: QueryExecutor; session: Session } {
    const catalog = new Catalog();
    return { catalog, executor: new QueryExecutor(catalog), session: new Session() };
}
