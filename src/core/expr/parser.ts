import { Lexer, type Token, type TokenSource, type TokenType } from './tokenizer.js';
import type {
    BooleanLiteral,
    CallExpression,
    Expression,
    ExpressionStatement,
    Identifier,
    InfixExpression,
    IntegerLiteral,
    LetStatement,
    PrefixExpression,
    Program,
    ReturnStatement,
    Statement,
} from './ast.js';
import { parseInt64 } from './int64.js';
import type { Diagnostic, Range } from '../../types/diagnostic.js';

type PrefixParseFn = () => Expression | null;
type InfixParseFn = (left: Expression | null) => Expression | null;

export type ParseErrorCode = 'PARSE_UNEXPECTED_TOKEN' | 'PARSE_NO_PREFIX' | 'PARSE_INVALID_INTEGER' | 'PARSE_TOO_DEEP';

// Deepest expression nesting accepted before the statement is abandoned
export const MAX_NESTING_DEPTH = 1000;

export interface ParseError {
    code: ParseErrorCode;
    message: string;
    range: Range;
}

// Precedence levels
export enum Precedence {
    Lowest = 1,
    Equals, // == !=
    LessGreater, // < >
    Sum, // + -
    Product, // * /
    Prefix, // -x !x
    Call, // f(x)
}

const PRECEDENCES: ReadonlyMap<TokenType, Precedence> = new Map<TokenType, Precedence>([
    ['Eq', Precedence.Equals],
    ['NotEq', Precedence.Equals],
    ['Lt', Precedence.LessGreater],
    ['Gt', Precedence.LessGreater],
    ['Plus', Precedence.Sum],
    ['Minus', Precedence.Sum],
    ['Slash', Precedence.Product],
    ['Asterisk', Precedence.Product],
    ['LParen', Precedence.Call],
]);

export class Parser {
    private readonly source: TokenSource;
    private readonly errorLog: ParseError[] = [];
    private readonly prefixParseFns: ReadonlyMap<TokenType, PrefixParseFn>;
    private readonly infixParseFns: ReadonlyMap<TokenType, InfixParseFn>;

    private curToken: Token;
    private peekToken: Token;

    private depth = 0;
    // Set once a statement is abandoned for nesting too deeply; silences the errors of the frames unwinding from it
    private abandoned = false;

    constructor(source: TokenSource) {
        this.source = source;

        // Read two tokens so curToken and peekToken are both set
        this.curToken = source.nextToken();
        this.peekToken = source.nextToken();

        this.prefixParseFns = new Map<TokenType, PrefixParseFn>([
            ['Ident', () => this.parseIdentifier()],
            ['Int', () => this.parseIntegerLiteral()],
            ['Bang', () => this.parsePrefixExpression()],
            ['Minus', () => this.parsePrefixExpression()],
            ['True', () => this.parseBoolean()],
            ['False', () => this.parseBoolean()],
            ['LParen', () => this.parseGroupedExpression()],
        ]);

        const infix: InfixParseFn = left => this.parseInfixExpression(left);
        this.infixParseFns = new Map<TokenType, InfixParseFn>([
            ['Plus', infix],
            ['Minus', infix],
            ['Slash', infix],
            ['Asterisk', infix],
            ['Eq', infix],
            ['NotEq', infix],
            ['Lt', infix],
            ['Gt', infix],
            ['LParen', left => this.parseCallExpression(left)],
        ]);
    }

    public parseProgram(): Program {
        const program: Program = { kind: 'Program', statements: [] };

        while (!this.curTokenIs('EOF')) {
            const stmt = this.parseStatement();
            if (stmt) {
                program.statements.push(stmt);
            }
            this.abandoned = false;
            this.nextToken();
        }

        return program;
    }

    public errors(): string[] {
        return this.errorLog.map(e => e.message);
    }

    public parseErrors(): readonly ParseError[] {
        return this.errorLog;
    }

    public diagnostics(file: string): Diagnostic[] {
        return this.errorLog.map((e): Diagnostic => ({
            code: e.code,
            message: e.message,
            severity: 'error',
            file,
            range: e.range,
        }));
    }

    private nextToken(): void {
        this.curToken = this.peekToken;
        this.peekToken = this.source.nextToken();
    }

    private parseStatement(): Statement | null {
        switch (this.curToken.type) {
            case 'Let':
                return this.parseLetStatement();
            case 'Return':
                return this.parseReturnStatement();
            default:
                return this.parseExpressionStatement();
        }
    }

    private parseLetStatement(): LetStatement | null {
        const token = this.curToken;

        if (!this.expectPeek('Ident')) return null;
        const name: Identifier = { kind: 'Identifier', token: this.curToken, value: this.curToken.literal };

        if (!this.expectPeek('Assign')) return null;

        // TODO: parse the bound expression instead of skipping to the semicolon
        this.skipToSemicolon();
        return { kind: 'LetStatement', token, name, value: null };
    }

    private parseReturnStatement(): ReturnStatement {
        const token = this.curToken;
        this.nextToken();

        // TODO: parse the returned expression instead of skipping to the semicolon
        this.skipToSemicolon();
        return { kind: 'ReturnStatement', token, returnValue: null };
    }

    private skipToSemicolon(): void {
        while (!this.curTokenIs('Semicolon') && !this.curTokenIs('EOF')) {
            this.nextToken();
        }
    }

    private parseExpressionStatement(): ExpressionStatement {
        const token = this.curToken;
        const expression = this.parseExpression(Precedence.Lowest);

        if (this.peekTokenIs('Semicolon')) {
            this.nextToken();
        }
        return { kind: 'ExpressionStatement', token, expression };
    }

    private parseExpression(precedence: Precedence): Expression | null {
        if (this.depth >= MAX_NESTING_DEPTH) {
            this.error('PARSE_TOO_DEEP', 'expression nested too deeply', this.curToken.range);
            this.abandoned = true;
            this.skipToSemicolon();
            return null;
        }

        this.depth++;
        try {
            return this.parseNestedExpression(precedence);
        } finally {
            this.depth--;
        }
    }

    private parseNestedExpression(precedence: Precedence): Expression | null {
        const prefix = this.prefixParseFns.get(this.curToken.type);
        if (!prefix) {
            this.noPrefixParseFnError(this.curToken);
            return null;
        }

        let left = prefix();

        while (!this.peekTokenIs('Semicolon') && precedence < this.peekPrecedence()) {
            const infix = this.infixParseFns.get(this.peekToken.type);
            if (!infix) return left;

            this.nextToken();
            left = infix(left);
        }

        return left;
    }

    private parseIdentifier(): Identifier {
        return { kind: 'Identifier', token: this.curToken, value: this.curToken.literal };
    }

    private parseIntegerLiteral(): IntegerLiteral | null {
        const token = this.curToken;
        const value = parseInt64(token.literal);
        if (value === undefined) {
            this.error('PARSE_INVALID_INTEGER', `could not parse "${token.literal}" as integer`, token.range);
            return null;
        }
        return { kind: 'IntegerLiteral', token, value };
    }

    private parseBoolean(): BooleanLiteral {
        return { kind: 'BooleanLiteral', token: this.curToken, value: this.curTokenIs('True') };
    }

    private parsePrefixExpression(): PrefixExpression {
        const token = this.curToken;
        this.nextToken();

        const right = this.parseExpression(Precedence.Prefix);
        return { kind: 'PrefixExpression', token, operator: token.literal, right };
    }

    private parseInfixExpression(left: Expression | null): InfixExpression {
        const token = this.curToken;
        const precedence = this.curPrecedence();
        this.nextToken();

        // Parsing the right side at the operator's own precedence makes equal-precedence chains left-associative
        const right = this.parseExpression(precedence);
        return { kind: 'InfixExpression', token, left, operator: token.literal, right };
    }

    private parseGroupedExpression(): Expression | null {
        this.nextToken();

        const expression = this.parseExpression(Precedence.Lowest);
        if (!this.expectPeek('RParen')) return null;
        return expression;
    }

    private parseCallExpression(func: Expression | null): CallExpression {
        const token = this.curToken;
        const args = this.parseCallArguments();
        return { kind: 'CallExpression', token, func, args };
    }

    private parseCallArguments(): Array<Expression | null> {
        const args: Array<Expression | null> = [];

        if (this.peekTokenIs('RParen')) {
            this.nextToken();
            return args;
        }

        this.nextToken();
        args.push(this.parseExpression(Precedence.Lowest));

        while (this.peekTokenIs('Comma')) {
            this.nextToken();
            this.nextToken();
            args.push(this.parseExpression(Precedence.Lowest));
        }

        if (!this.expectPeek('RParen')) return [];
        return args;
    }

    // Helpers
    private curTokenIs(type: TokenType): boolean {
        return this.curToken.type === type;
    }

    private peekTokenIs(type: TokenType): boolean {
        return this.peekToken.type === type;
    }

    private curPrecedence(): Precedence {
        return PRECEDENCES.get(this.curToken.type) ?? Precedence.Lowest;
    }

    private peekPrecedence(): Precedence {
        return PRECEDENCES.get(this.peekToken.type) ?? Precedence.Lowest;
    }

    private expectPeek(type: TokenType): boolean {
        if (this.peekTokenIs(type)) {
            this.nextToken();
            return true;
        }
        this.error(
            'PARSE_UNEXPECTED_TOKEN',
            `expected next token to be ${type}, got ${this.peekToken.type} instead`,
            this.peekToken.range
        );
        return false;
    }

    private noPrefixParseFnError(token: Token): void {
        this.error('PARSE_NO_PREFIX', `no prefix parse function for ${token.type} found`, token.range);
    }

    private error(code: ParseErrorCode, message: string, range: Range): void {
        if (this.abandoned) return;
        this.errorLog.push({ code, message, range });
    }
}

export function parseProgram(input: string): { program: Program; errors: ParseError[] } {
    const parser = new Parser(new Lexer(input));
    const program = parser.parseProgram();
    return { program, errors: [...parser.parseErrors()] };
}
