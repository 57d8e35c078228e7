/**
 * KeelDB - SQL Parser
 *
 * Parses tokenized SQL into statement and expression trees.
 *
 * Grammar (simplified):
 *
 * script      := statement (';' statement)* ';'?
 * statement   := create | drop | use | show | describe
 *              | insert | select | update | delete
 *
 * create      := CREATE DATABASE ident
 *              | CREATE TABLE ident '(' column_def (',' column_def)* ')'
 * column_def  := ident type (PRIMARY KEY | UNIQUE | REFERENCES ident '(' ident ')')*
 * type        := INT | INTEGER | FLOAT | STRING | TEXT | BOOL | BOOLEAN
 * drop        := DROP (DATABASE | TABLE) ident
 * use         := USE ident
 * show        := SHOW (DATABASES | TABLES)
 * describe    := DESCRIBE ident
 *
 * insert      := INSERT INTO ident ('(' ident_list ')')? VALUES '(' literal_list ')'
 * update      := UPDATE ident SET ident '=' literal (',' ident '=' literal)* where?
 * delete      := DELETE FROM ident where?
 *
 * select      := SELECT DISTINCT? projection (',' projection)* FROM ident
 *                (INNER? JOIN ident ON expr)? where?
 *                (GROUP BY column_ref (',' column_ref)*)? (HAVING expr)?
 *                (ORDER BY order_key (',' order_key)*)?
 *                (LIMIT n (OFFSET n)? | OFFSET n (LIMIT n)?)?
 * projection  := '*' | (column_ref | aggregate) (AS ident)?
 * order_key   := (column_ref | aggregate) (ASC | DESC)?
 * aggregate   := COUNT '(' '*' ')' | (COUNT | SUM | AVG | MIN | MAX) '(' column_ref ')'
 *
 * expr        := and_expr (OR and_expr)*
 * and_expr    := not_expr (AND not_expr)*
 * not_expr    := NOT not_expr | predicate
 * predicate   := '(' expr ')'
 *              | operand (cmp operand | IS NOT? NULL | NOT? BETWEEN operand AND operand
 *                         | NOT? IN '(' operand (',' operand)* ')' | NOT? LIKE string)?
 * operand     := literal | column_ref | aggregate
 * column_ref  := ident ('.' ident)?
 */

import { Tokenizer, type Token, type TokenKind } from './Tokenizer';
import { validateIdentifier, validatePaging } from './validators';
import { ErrorCode, SQLSyntaxError, TypeMismatchError, UnsupportedFeatureError } from '../errors';
import type {
    AggregateCall,
    AggregateFunction,
    Assignment,
    ColumnDefinition,
    ColumnReference,
    ComparisonOperator,
    CreateDatabaseStatement,
    CreateTableStatement,
    DataType,
    DeleteStatement,
    DescribeStatement,
    DropDatabaseStatement,
    DropTableStatement,
    Expression,
    ForeignKeyReference,
    InsertStatement,
    JoinClause,
    OrderByItem,
    ParsedStatement,
    Projection,
    SelectStatement,
    ShowDatabasesStatement,
    ShowTablesStatement,
    UpdateStatement,
    UseStatement,
    Value,
} from '../types';

const AGGREGATE_FUNCTIONS: ReadonlySet<string> = new Set(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX']);

const TYPE_KEYWORDS: Readonly<Record<string, DataType>> = {
    INT: 'INT',
    INTEGER: 'INT',
    FLOAT: 'FLOAT',
    STRING: 'STRING',
    TEXT: 'STRING',
    BOOL: 'BOOL',
    BOOLEAN: 'BOOL',
};

/**
 * Clause an expression is parsed for. Aggregates are only legal in HAVING.
 */
type ExpressionClause = 'WHERE' | 'ON' | 'HAVING';

function isAggregateFunction(name: string): name is AggregateFunction {
    return AGGREGATE_FUNCTIONS.has(name);
}

function isComparisonOperator(lexeme: string): lexeme is ComparisonOperator {
    return ['=', '!=', '<>', '<', '>', '<=', '>='].includes(lexeme);
}

export class Parser {
    private readonly tokens: readonly Token[];
    private current: number;
    private clause: ExpressionClause;

    constructor(input: string) {
        this.tokens = new Tokenizer(input).tokenize();
        this.current = 0;
        this.clause = 'WHERE';
    }

    /**
     * Parse exactly one statement, with an optional trailing semicolon.
     */
    parse(): ParsedStatement {
        const statement = this.parseStatement();

        if (this.check('SEMICOLON')) {
            this.advance();
        }

        if (!this.isAtEnd()) {
            throw this.error('end of statement');
        }

        return statement;
    }

    /**
     * Parse a semicolon-separated sequence of statements. Empty statements
     * (stray semicolons) are skipped.
     */
    parseScript(): ParsedStatement[] {
        const statements: ParsedStatement[] = [];

        while (!this.isAtEnd()) {
            if (this.check('SEMICOLON')) {
                this.advance();
                continue;
            }

            statements.push(this.parseStatement());

            if (!this.isAtEnd()) {
                this.consume('SEMICOLON', undefined, "';' or end of input");
            }
        }

        return statements;
    }

    private parseStatement(): ParsedStatement {
        const token = this.peek();

        if (token.kind === 'KEYWORD') {
            switch (token.lexeme) {
                case 'CREATE':
                    return this.parseCreate();
                case 'DROP':
                    return this.parseDrop();
                case 'USE':
                    return this.parseUse();
                case 'SHOW':
                    return this.parseShow();
                case 'DESCRIBE':
                    return this.parseDescribe();
                case 'INSERT':
                    return this.parseInsert();
                case 'SELECT':
                    return this.parseSelect();
                case 'UPDATE':
                    return this.parseUpdate();
                case 'DELETE':
                    return this.parseDelete();
            }
        }

        throw this.error(
            'a statement (CREATE, DROP, USE, SHOW, DESCRIBE, INSERT, SELECT, UPDATE, DELETE)'
        );
    }

    // ==========================================================================
    // DDL
    // ==========================================================================

    private parseCreate(): CreateDatabaseStatement | CreateTableStatement {
        this.consume('KEYWORD', 'CREATE');

        if (this.check('KEYWORD', 'DATABASE')) {
            this.advance();
            const name = validateIdentifier(this.consumeIdentifier('database name'), 'database');
            return { type: 'CREATE_DATABASE', name };
        }

        this.consume('KEYWORD', 'TABLE', 'DATABASE or TABLE');
        const tableName = validateIdentifier(this.consumeIdentifier('table name'), 'table');

        this.consume('LPAREN');
        const columns = this.parseColumnDefinitions();
        this.consume('RPAREN', undefined, "',' or ')'");

        return { type: 'CREATE_TABLE', tableName, columns };
    }

    private parseColumnDefinitions(): ColumnDefinition[] {
        const columns: ColumnDefinition[] = [this.parseColumnDefinition()];

        while (this.check('COMMA')) {
            this.advance();
            columns.push(this.parseColumnDefinition());
        }

        return columns;
    }

    private parseColumnDefinition(): ColumnDefinition {
        const name = validateIdentifier(this.consumeIdentifier('column name'), 'column');
        const type = this.parseDataType();

        let primaryKey = false;
        let unique = false;
        let references: ForeignKeyReference | undefined;

        while (true) {
            if (this.check('KEYWORD', 'PRIMARY')) {
                this.advance();
                this.consume('KEYWORD', 'KEY');
                primaryKey = true;
            } else if (this.check('KEYWORD', 'UNIQUE')) {
                this.advance();
                unique = true;
            } else if (this.check('KEYWORD', 'REFERENCES')) {
                this.advance();
                const table = this.consumeIdentifier('referenced table name');
                this.consume('LPAREN');
                const column = this.consumeIdentifier('referenced column name');
                this.consume('RPAREN');
                references = { table, column };
            } else {
                break;
            }
        }

        const column: ColumnDefinition = { name, type, primaryKey, unique };
        if (references) {
            column.references = references;
        }
        return column;
    }

    private parseDataType(): DataType {
        const token = this.peek();
        const type = token.kind === 'KEYWORD' ? TYPE_KEYWORDS[token.lexeme] : undefined;

        if (type === undefined) {
            throw this.error('data type (INT, FLOAT, STRING, BOOL)');
        }

        this.advance();
        return type;
    }

    private parseDrop(): DropDatabaseStatement | DropTableStatement {
        this.consume('KEYWORD', 'DROP');

        if (this.check('KEYWORD', 'DATABASE')) {
            this.advance();
            return { type: 'DROP_DATABASE', name: this.consumeIdentifier('database name') };
        }

        this.consume('KEYWORD', 'TABLE', 'DATABASE or TABLE');
        return { type: 'DROP_TABLE', tableName: this.consumeIdentifier('table name') };
    }

    private parseUse(): UseStatement {
        this.consume('KEYWORD', 'USE');
        return { type: 'USE', name: this.consumeIdentifier('database name') };
    }

    private parseShow(): ShowDatabasesStatement | ShowTablesStatement {
        this.consume('KEYWORD', 'SHOW');

        if (this.check('KEYWORD', 'DATABASES')) {
            this.advance();
            return { type: 'SHOW_DATABASES' };
        }

        this.consume('KEYWORD', 'TABLES', 'DATABASES or TABLES');
        return { type: 'SHOW_TABLES' };
    }

    private parseDescribe(): DescribeStatement {
        this.consume('KEYWORD', 'DESCRIBE');
        return { type: 'DESCRIBE', tableName: this.consumeIdentifier('table name') };
    }

    // ==========================================================================
    // DML
    // ==========================================================================

    private parseInsert(): InsertStatement {
        this.consume('KEYWORD', 'INSERT');
        this.consume('KEYWORD', 'INTO');

        const tableName = this.consumeIdentifier('table name');

        let columns: string[] | undefined;
        if (this.check('LPAREN')) {
            this.advance();
            columns = this.parseIdentifierList('column name');
            this.consume('RPAREN', undefined, "',' or ')'");
        }

        this.consume('KEYWORD', 'VALUES');
        this.consume('LPAREN');
        const values = this.parseLiteralList();
        this.consume('RPAREN', undefined, "',' or ')'");

        const statement: InsertStatement = columns
            ? { type: 'INSERT', tableName, columns, values }
            : { type: 'INSERT', tableName, values };
        return statement;
    }

    private parseIdentifierList(what: string): string[] {
        const identifiers: string[] = [this.consumeIdentifier(what)];

        while (this.check('COMMA')) {
            this.advance();
            identifiers.push(this.consumeIdentifier(what));
        }

        return identifiers;
    }

    private parseLiteralList(): Value[] {
        const values: Value[] = [this.parseLiteral()];

        while (this.check('COMMA')) {
            this.advance();
            values.push(this.parseLiteral());
        }

        return values;
    }

    /**
     * Parse a single literal value.
     */
    private parseLiteral(): Value {
        const value = this.tryParseLiteral();
        if (value === undefined) {
            throw this.error('a literal value (number, string, TRUE, FALSE, NULL)');
        }
        return value;
    }

    /**
     * Parse a literal if the current token is one; undefined otherwise.
     */
    private tryParseLiteral(): Value | undefined {
        const token = this.peek();

        if (token.kind === 'NUMBER') {
            this.advance();
            if (token.lexeme.includes('.')) {
                return parseFloat(token.lexeme);
            }
            const value = parseInt(token.lexeme, 10);
            if (!Number.isSafeInteger(value)) {
                throw new TypeMismatchError(
                    `Integer literal ${token.lexeme} is out of range`,
                    { position: { offset: token.position, line: token.line, column: token.column } }
                );
            }
            return value;
        }

        if (token.kind === 'STRING') {
            this.advance();
            return token.lexeme;
        }

        if (token.kind === 'KEYWORD') {
            switch (token.lexeme) {
                case 'TRUE':
                    this.advance();
                    return true;
                case 'FALSE':
                    this.advance();
                    return false;
                case 'NULL':
                    this.advance();
                    return null;
            }
        }

        return undefined;
    }

    private parseUpdate(): UpdateStatement {
        this.consume('KEYWORD', 'UPDATE');
        const tableName = this.consumeIdentifier('table name');

        this.consume('KEYWORD', 'SET');
        const assignments: Assignment[] = [this.parseAssignment()];
        while (this.check('COMMA')) {
            this.advance();
            assignments.push(this.parseAssignment());
        }

        const where = this.parseOptionalWhere();
        return where
            ? { type: 'UPDATE', tableName, assignments, where }
            : { type: 'UPDATE', tableName, assignments };
    }

    private parseAssignment(): Assignment {
        const column = this.consumeIdentifier('column name');
        this.consume('EQUALS');
        const value = this.parseLiteral();
        return { column, value };
    }

    private parseDelete(): DeleteStatement {
        this.consume('KEYWORD', 'DELETE');
        this.consume('KEYWORD', 'FROM');
        const tableName = this.consumeIdentifier('table name');

        const where = this.parseOptionalWhere();
        return where ? { type: 'DELETE', tableName, where } : { type: 'DELETE', tableName };
    }

    private parseOptionalWhere(): Expression | undefined {
        if (!this.check('KEYWORD', 'WHERE')) {
            return undefined;
        }
        this.advance();
        return this.parseExpression('WHERE');
    }

    // ==========================================================================
    // SELECT
    // ==========================================================================

    private parseSelect(): SelectStatement {
        this.consume('KEYWORD', 'SELECT');

        let distinct = false;
        if (this.check('KEYWORD', 'DISTINCT')) {
            this.advance();
            distinct = true;
        }

        const projections: Projection[] = [this.parseProjection()];
        while (this.check('COMMA')) {
            this.advance();
            projections.push(this.parseProjection());
        }

        this.consume('KEYWORD', 'FROM', "',' or FROM");
        const tableName = this.consumeIdentifier('table name');

        let join: JoinClause | undefined;
        if (this.check('KEYWORD', 'INNER') || this.check('KEYWORD', 'JOIN')) {
            join = this.parseJoinClause();
        }

        const where = this.parseOptionalWhere();

        const groupBy: ColumnReference[] = [];
        if (this.check('KEYWORD', 'GROUP')) {
            this.advance();
            this.consume('KEYWORD', 'BY');
            groupBy.push(this.parseColumnReference());
            while (this.check('COMMA')) {
                this.advance();
                groupBy.push(this.parseColumnReference());
            }
        }

        let having: Expression | undefined;
        if (this.check('KEYWORD', 'HAVING')) {
            this.advance();
            having = this.parseExpression('HAVING');
        }

        const orderBy: OrderByItem[] = [];
        if (this.check('KEYWORD', 'ORDER')) {
            this.advance();
            this.consume('KEYWORD', 'BY');
            orderBy.push(this.parseOrderByItem());
            while (this.check('COMMA')) {
                this.advance();
                orderBy.push(this.parseOrderByItem());
            }
        }

        // LIMIT and OFFSET may come in either order, each at most once
        let limit: number | undefined;
        let offset: number | undefined;
        while (true) {
            if (limit === undefined && this.check('KEYWORD', 'LIMIT')) {
                this.advance();
                limit = validatePaging(this.consumeNumber('LIMIT count'), 'LIMIT');
            } else if (offset === undefined && this.check('KEYWORD', 'OFFSET')) {
                this.advance();
                offset = validatePaging(this.consumeNumber('OFFSET count'), 'OFFSET');
            } else {
                break;
            }
        }

        return {
            type: 'SELECT',
            distinct,
            projections,
            tableName,
            ...(join ? { join } : {}),
            ...(where ? { where } : {}),
            groupBy,
            ...(having ? { having } : {}),
            orderBy,
            ...(limit !== undefined ? { limit } : {}),
            ...(offset !== undefined ? { offset } : {}),
        };
    }

    private parseProjection(): Projection {
        if (this.check('STAR')) {
            this.advance();
            return { kind: 'star' };
        }

        const alias = (): string | undefined => {
            if (!this.check('KEYWORD', 'AS')) {
                return undefined;
            }
            this.advance();
            return this.consumeIdentifier('alias');
        };

        if (this.isAggregateAhead()) {
            const expression = this.parseAggregate();
            const name = alias();
            return name ? { kind: 'aggregate', expression, alias: name } : { kind: 'aggregate', expression };
        }

        if (!this.check('IDENTIFIER')) {
            throw this.error("'*', a column or an aggregate function");
        }

        const expression = this.parseColumnReference();
        const name = alias();
        return name ? { kind: 'column', expression, alias: name } : { kind: 'column', expression };
    }

    private parseJoinClause(): JoinClause {
        if (this.check('KEYWORD', 'INNER')) {
            this.advance();
        }
        this.consume('KEYWORD', 'JOIN');

        const table = this.consumeIdentifier('table name');

        this.consume('KEYWORD', 'ON');
        const on = this.parseExpression('ON');

        return { type: 'INNER', table, on };
    }

    private parseOrderByItem(): OrderByItem {
        const expression = this.isAggregateAhead() ? this.parseAggregate() : this.parseColumnReference();

        if (this.check('KEYWORD', 'DESC')) {
            this.advance();
            return { expression, direction: 'DESC' };
        }
        if (this.check('KEYWORD', 'ASC')) {
            this.advance();
        }
        return { expression, direction: 'ASC' };
    }

    // ==========================================================================
    // EXPRESSIONS
    // ==========================================================================

    private parseExpression(clause: ExpressionClause): Expression {
        const previous = this.clause;
        this.clause = clause;
        try {
            return this.parseOr();
        } finally {
            this.clause = previous;
        }
    }

    private parseOr(): Expression {
        let left = this.parseAnd();

        while (this.check('KEYWORD', 'OR')) {
            this.advance();
            const right = this.parseAnd();
            left = { kind: 'or', left, right };
        }

        return left;
    }

    private parseAnd(): Expression {
        let left = this.parseNot();

        while (this.check('KEYWORD', 'AND')) {
            this.advance();
            const right = this.parseNot();
            left = { kind: 'and', left, right };
        }

        return left;
    }

    private parseNot(): Expression {
        if (this.check('KEYWORD', 'NOT')) {
            this.advance();
            return { kind: 'not', operand: this.parseNot() };
        }
        return this.parsePredicate();
    }

    private parsePredicate(): Expression {
        if (this.check('LPAREN')) {
            this.advance();
            const inner = this.parseOr();
            this.consume('RPAREN', undefined, "')'");
            return inner;
        }

        const operand = this.parseOperand();
        const token = this.peek();

        if ((token.kind === 'EQUALS' || token.kind === 'COMPARISON') && isComparisonOperator(token.lexeme)) {
            this.advance();
            const right = this.parseOperand();
            return { kind: 'comparison', operator: token.lexeme, left: operand, right };
        }

        if (this.check('KEYWORD', 'IS')) {
            this.advance();
            let negated = false;
            if (this.check('KEYWORD', 'NOT')) {
                this.advance();
                negated = true;
            }
            this.consume('KEYWORD', 'NULL', 'NULL or NOT NULL');
            return { kind: 'isNull', operand, negated };
        }

        // Two-token lookahead: NOT only belongs here when BETWEEN/IN/LIKE follows
        let negated = false;
        if (this.check('KEYWORD', 'NOT') && this.isNegatablePredicate(this.peekAt(1))) {
            this.advance();
            negated = true;
        }

        if (this.check('KEYWORD', 'BETWEEN')) {
            this.advance();
            const low = this.parseOperand();
            this.consume('KEYWORD', 'AND', 'AND in BETWEEN');
            const high = this.parseOperand();
            return { kind: 'between', operand, low, high, negated };
        }

        if (this.check('KEYWORD', 'IN')) {
            this.advance();
            this.consume('LPAREN');
            const values: Expression[] = [this.parseOperand()];
            while (this.check('COMMA')) {
                this.advance();
                values.push(this.parseOperand());
            }
            this.consume('RPAREN', undefined, "',' or ')'");
            return { kind: 'in', operand, values, negated };
        }

        if (this.check('KEYWORD', 'LIKE')) {
            this.advance();
            const pattern = this.consume('STRING', undefined, 'a quoted LIKE pattern').lexeme;
            return { kind: 'like', operand, pattern, negated };
        }

        return operand;
    }

    private isNegatablePredicate(token: Token): boolean {
        return token.kind === 'KEYWORD' && (token.lexeme === 'BETWEEN' || token.lexeme === 'IN' || token.lexeme === 'LIKE');
    }

    private parseOperand(): Expression {
        const literal = this.tryParseLiteral();
        if (literal !== undefined) {
            return { kind: 'literal', value: literal };
        }

        if (this.isAggregateAhead()) {
            if (this.clause !== 'HAVING') {
                const token = this.peek();
                throw new SQLSyntaxError(
                    ErrorCode.UNEXPECTED_TOKEN,
                    `Parse error at line ${token.line}, column ${token.column}: ` +
                    `aggregate function ${token.lexeme.toUpperCase()} is not allowed in ${this.clause}; ` +
                    `expected a column or a literal`,
                    token.lexeme,
                    { offset: token.position, line: token.line, column: token.column }
                );
            }
            return this.parseAggregate();
        }

        if (this.check('IDENTIFIER')) {
            return this.parseColumnReference();
        }

        throw this.error('a column or a literal value');
    }

    /**
     * Aggregates are ordinary identifiers followed by '('.
     */
    private isAggregateAhead(): boolean {
        const token = this.peek();
        return (
            token.kind === 'IDENTIFIER' &&
            AGGREGATE_FUNCTIONS.has(token.lexeme.toUpperCase()) &&
            this.peekAt(1).kind === 'LPAREN'
        );
    }

    private parseAggregate(): AggregateCall {
        const name = this.advance().lexeme.toUpperCase();
        if (!isAggregateFunction(name)) {
            throw this.error('an aggregate function');
        }
        const fn = name;

        this.consume('LPAREN');

        if (this.check('STAR')) {
            if (fn !== 'COUNT') {
                throw this.error(`a column inside ${fn}()`);
            }
            this.advance();
            this.consume('RPAREN', undefined, "')'");
            return { kind: 'aggregate', fn, argument: '*' };
        }

        if (this.check('KEYWORD', 'DISTINCT')) {
            throw new UnsupportedFeatureError(`${fn}(DISTINCT ...)`);
        }

        if (!this.check('IDENTIFIER') || this.isAggregateAhead()) {
            if (this.check('RPAREN') || this.isAtEnd()) {
                throw this.error(`a column inside ${fn}()`);
            }
            throw new UnsupportedFeatureError(`expression arguments to ${fn}()`);
        }

        const argument = this.parseColumnReference();

        if (!this.check('RPAREN')) {
            throw new UnsupportedFeatureError(`expression arguments to ${fn}()`);
        }
        this.advance();

        return { kind: 'aggregate', fn, argument };
    }

    private parseColumnReference(): ColumnReference {
        const first = this.consumeIdentifier('column name');

        if (this.check('DOT')) {
            this.advance();
            const column = this.consumeIdentifier('column name');
            return { kind: 'column', table: first, column };
        }

        return { kind: 'column', column: first };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    private peek(): Token {
        return this.tokens[this.current];
    }

    /**
     * Look ahead without consuming. Past the end this is the EOF token.
     */
    private peekAt(offset: number): Token {
        const index = Math.min(this.current + offset, this.tokens.length - 1);
        return this.tokens[index];
    }

    private isAtEnd(): boolean {
        return this.peek().kind === 'EOF';
    }

    private advance(): Token {
        const token = this.peek();
        if (!this.isAtEnd()) {
            this.current++;
        }
        return token;
    }

    /**
     * Check if the current token matches the expected kind and lexeme.
     */
    private check(kind: TokenKind, lexeme?: string): boolean {
        const token = this.peek();
        if (token.kind !== kind) return false;
        if (lexeme !== undefined && token.lexeme !== lexeme) return false;
        return true;
    }

    /**
     * Consume the expected token or throw a syntax error naming what was
     * expected.
     */
    private consume(kind: TokenKind, lexeme?: string, expected?: string): Token {
        if (this.check(kind, lexeme)) {
            return this.advance();
        }
        throw this.error(expected ?? (lexeme !== undefined ? lexeme : describeKind(kind)));
    }

    private consumeIdentifier(what: string): string {
        const token = this.peek();
        if (token.kind === 'IDENTIFIER') {
            this.advance();
            return token.lexeme;
        }
        throw this.error(what);
    }

    private consumeNumber(what: string): number {
        const token = this.consume('NUMBER', undefined, what);
        return Number(token.lexeme);
    }

    /**
     * Build a syntax error at the current token.
     */
    private error(expected: string): SQLSyntaxError {
        const token = this.peek();
        const found = token.kind === 'EOF' ? 'end of input' : `'${token.lexeme}'`;
        return new SQLSyntaxError(
            token.kind === 'EOF' ? ErrorCode.UNEXPECTED_EOF : ErrorCode.UNEXPECTED_TOKEN,
            `Parse error at line ${token.line}, column ${token.column}: expected ${expected}, got ${found}`,
            token.lexeme,
            { offset: token.position, line: token.line, column: token.column }
        );
    }
}

function describeKind(kind: TokenKind): string {
    switch (kind) {
        case 'LPAREN':
            return "'('";
        case 'RPAREN':
            return "')'";
        case 'COMMA':
            return "','";
        case 'SEMICOLON':
            return "';'";
        case 'EQUALS':
            return "'='";
        case 'DOT':
            return "'.'";
        case 'STAR':
            return "'*'";
        default:
            return kind.toLowerCase();
    }
}

/**
 * Parse a single statement.
 */
export function parse(sql: string): ParsedStatement {
    return new Parser(sql).parse();
}

/**
 * Parse a semicolon-separated script.
 */
export function parseScript(sql: string): ParsedStatement[] {
    return new Parser(sql).parseScript();
}
