/**
 * KeelDB - SQL Tokenizer
 *
 * Converts raw SQL input into a stream of tokens for parsing.
 *
 * - Hand-written scanner, one pass, tracks line/column for error messages
 * - Strings use single quotes, '' escapes a quote
 * - Keywords are case-insensitive and upper-cased in the lexeme
 * - `--` starts a comment running to the end of the line
 */

import { ErrorCode, SQLSyntaxError } from '../errors';

export type TokenKind =
    | 'NUMBER'
    | 'STRING'
    | 'KEYWORD'
    | 'IDENTIFIER'
    | 'COMPARISON'
    | 'EQUALS'
    | 'COMMA'
    | 'LPAREN'
    | 'RPAREN'
    | 'SEMICOLON'
    | 'STAR'
    | 'DOT'
    | 'EOF';

export interface Token {
    kind: TokenKind;
    lexeme: string;
    /** 0-indexed offset of the first character */
    position: number;
    line: number;
    column: number;
}

// SQL keywords we recognize
export const KEYWORDS: ReadonlySet<string> = new Set([
    'CREATE', 'DROP', 'DATABASE', 'DATABASES', 'TABLE', 'TABLES', 'USE',
    'SHOW', 'DESCRIBE', 'INSERT', 'INTO', 'VALUES', 'SELECT', 'DISTINCT',
    'FROM', 'WHERE', 'UPDATE', 'SET', 'DELETE', 'INNER', 'JOIN', 'ON', 'AS',
    'GROUP', 'BY', 'HAVING', 'ORDER', 'ASC', 'DESC', 'LIMIT', 'OFFSET',
    'AND', 'OR', 'NOT', 'IS', 'NULL', 'BETWEEN', 'IN', 'LIKE', 'TRUE', 'FALSE',
    'PRIMARY', 'KEY', 'UNIQUE', 'REFERENCES',
    'INT', 'INTEGER', 'FLOAT', 'STRING', 'TEXT', 'BOOL', 'BOOLEAN',
]);

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenKind>> = {
    '=': 'EQUALS',
    ',': 'COMMA',
    '(': 'LPAREN',
    ')': 'RPAREN',
    ';': 'SEMICOLON',
    '*': 'STAR',
    '.': 'DOT',
};

export class Tokenizer {
    private readonly input: string;
    private position: number;
    private line: number;
    private column: number;
    private tokens: Token[] | null;

    constructor(input: string) {
        this.input = input;
        this.position = 0;
        this.line = 1;
        this.column = 1;
        this.tokens = null;
    }

    /**
     * Tokenize the entire input. The scan runs once; later calls return the
     * same token list.
     */
    tokenize(): readonly Token[] {
        if (this.tokens) {
            return this.tokens;
        }

        const tokens: Token[] = [];

        while (this.position < this.input.length) {
            this.skipWhitespace();

            if (this.position >= this.input.length) {
                break;
            }

            const char = this.input[this.position];

            // Comments (skip)
            if (char === '-' && this.peek(1) === '-') {
                this.skipLineComment();
                continue;
            }

            if (char === "'") {
                tokens.push(this.readString());
                continue;
            }

            // Numbers, including a leading minus sign
            if (this.isDigit(char) || (char === '-' && this.isDigit(this.peek(1) ?? ''))) {
                tokens.push(this.readNumber());
                continue;
            }

            if (this.isAlpha(char) || char === '_') {
                tokens.push(this.readWord());
                continue;
            }

            if (char === '<' || char === '>' || char === '!') {
                tokens.push(this.readComparison());
                continue;
            }

            const kind = SINGLE_CHAR_TOKENS[char];
            if (kind !== undefined) {
                tokens.push(this.makeToken(kind, char));
                this.advance();
                continue;
            }

            throw this.error(
                ErrorCode.UNEXPECTED_CHARACTER,
                `Unexpected character '${char}' at line ${this.line}, column ${this.column}`,
                char
            );
        }

        tokens.push(this.makeToken('EOF', ''));
        this.tokens = tokens;
        return tokens;
    }

    /**
     * Get a character ahead of the current one without advancing.
     */
    private peek(offset: number = 0): string | undefined {
        return this.input[this.position + offset];
    }

    /**
     * Advance the position and update line/column tracking.
     */
    private advance(): string {
        const char = this.input[this.position];
        this.position++;

        if (char === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }

        return char;
    }

    /**
     * Build a token starting at the current position.
     */
    private makeToken(kind: TokenKind, lexeme: string): Token {
        return {
            kind,
            lexeme,
            position: this.position,
            line: this.line,
            column: this.column,
        };
    }

    private skipWhitespace(): void {
        while (this.position < this.input.length) {
            const char = this.input[this.position];
            if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
                this.advance();
            } else {
                break;
            }
        }
    }

    private skipLineComment(): void {
        while (this.position < this.input.length && this.input[this.position] !== '\n') {
            this.advance();
        }
    }

    private isDigit(char: string): boolean {
        return char >= '0' && char <= '9';
    }

    private isAlpha(char: string): boolean {
        return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
    }

    private isAlphaNumeric(char: string): boolean {
        return this.isAlpha(char) || this.isDigit(char) || char === '_';
    }

    /**
     * Read a string literal. The lexeme is the unquoted text.
     */
    private readString(): Token {
        const start = this.makeToken('STRING', '');

        this.advance(); // consume opening quote

        let value = '';
        while (this.position < this.input.length) {
            const char = this.input[this.position];

            if (char === "'") {
                // Escaped quote ('')
                if (this.peek(1) === "'") {
                    value += "'";
                    this.advance();
                    this.advance();
                } else {
                    this.advance(); // consume closing quote
                    return { ...start, lexeme: value };
                }
            } else {
                value += this.advance();
            }
        }

        throw new SQLSyntaxError(
            ErrorCode.UNTERMINATED_STRING,
            `Unterminated string starting at line ${start.line}, column ${start.column}`,
            "'",
            { offset: start.position, line: start.line, column: start.column }
        );
    }

    /**
     * Read an integer or decimal literal.
     */
    private readNumber(): Token {
        const start = this.makeToken('NUMBER', '');
        let value = '';

        if (this.input[this.position] === '-') {
            value += this.advance();
        }

        while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
            value += this.advance();
        }

        // Fraction only when a digit follows the dot, so `1.` stays NUMBER DOT
        if (this.peek() === '.' && this.isDigit(this.peek(1) ?? '')) {
            value += this.advance();
            while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
                value += this.advance();
            }
        }

        return { ...start, lexeme: value };
    }

    /**
     * Read an identifier or keyword.
     */
    private readWord(): Token {
        const start = this.makeToken('IDENTIFIER', '');
        let value = '';

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.input[this.position])
        ) {
            value += this.advance();
        }

        const upperValue = value.toUpperCase();
        if (KEYWORDS.has(upperValue)) {
            return { ...start, kind: 'KEYWORD', lexeme: upperValue };
        }
        return { ...start, lexeme: value };
    }

    /**
     * Read <, >, <=, >=, <> or !=.
     */
    private readComparison(): Token {
        const start = this.makeToken('COMPARISON', '');
        let value = this.advance();

        const next = this.peek();
        if (next === '=' || (value === '<' && next === '>')) {
            value += this.advance();
        }

        if (value === '!') {
            throw this.error(
                ErrorCode.UNEXPECTED_CHARACTER,
                `Unexpected character '!' at line ${start.line}, column ${start.column}`,
                '!',
                start
            );
        }

        return { ...start, lexeme: value };
    }

    private error(code: ErrorCode, message: string, token: string, at?: Token): SQLSyntaxError {
        return new SQLSyntaxError(code, message, token, {
            offset: at ? at.position : this.position,
            line: at ? at.line : this.line,
            column: at ? at.column : this.column,
        });
    }
}

/**
 * Convenience wrapper: tokenize a SQL string in one call.
 */
export function tokenize(sql: string): readonly Token[] {
    return new Tokenizer(sql).tokenize();
}
