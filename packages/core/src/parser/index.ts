/**
 * KeelDB - Parser Module
 *
 * Exports the SQL tokenizer, parser and name validation.
 */

export { Tokenizer, tokenize, KEYWORDS } from './Tokenizer';
export type { Token, TokenKind } from './Tokenizer';
export { Parser, parse, parseScript } from './Parser';
export { validateIdentifier, validatePaging, isReservedWord, MAX_IDENTIFIER_LENGTH, MAX_LIMIT } from './validators';
export type { IdentifierKind } from './validators';
