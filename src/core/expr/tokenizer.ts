import type { Location, Range } from '../../types/diagnostic.js';

export type TokenType =
    | 'Illegal'
    | 'EOF'
    // Identifiers and literals
    | 'Ident'
    | 'Int'
    // Operators
    | 'Assign'
    | 'Plus'
    | 'Minus'
    | 'Bang'
    | 'Asterisk'
    | 'Slash'
    | 'Lt'
    | 'Gt'
    | 'Eq'
    | 'NotEq'
    // Delimiters
    | 'Comma'
    | 'Semicolon'
    | 'LParen'
    | 'RParen'
    // Keywords
    | 'Let'
    | 'Return'
    | 'True'
    | 'False';

export interface Token {
    readonly type: TokenType;
    readonly literal: string;
    readonly range: Range;
}

export interface TokenSource {
    nextToken(): Token;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['let', 'Let'],
    ['return', 'Return'],
    ['true', 'True'],
    ['false', 'False'],
]);

const SINGLE_CHAR: Readonly<Record<string, TokenType>> = {
    '=': 'Assign',
    '+': 'Plus',
    '-': 'Minus',
    '!': 'Bang',
    '*': 'Asterisk',
    '/': 'Slash',
    '<': 'Lt',
    '>': 'Gt',
    ',': 'Comma',
    ';': 'Semicolon',
    '(': 'LParen',
    ')': 'RParen',
};

const TWO_CHAR: Readonly<Record<string, TokenType>> = {
    '==': 'Eq',
    '!=': 'NotEq',
};

export function lookupIdent(ident: string): TokenType {
    return KEYWORDS.get(ident) ?? 'Ident';
}

export class Lexer implements TokenSource {
    private readonly input: string;
    private offset = 0;
    private line = 1;
    private col = 1;

    constructor(input: string) {
        this.input = input;
    }

    nextToken(): Token {
        this.skipWhitespace();

        const start = this.location();
        if (this.offset >= this.input.length) {
            return { type: 'EOF', literal: '', range: { start, end: start } };
        }

        const char = this.input[this.offset];

        // Check two-char operators first
        const pair = this.input.slice(this.offset, this.offset + 2);
        const twoCharType = TWO_CHAR[pair];
        if (twoCharType) {
            this.advance(2);
            return this.token(twoCharType, pair, start);
        }

        const singleType = SINGLE_CHAR[char];
        if (singleType) {
            this.advance(1);
            return this.token(singleType, char, start);
        }

        if (isLetter(char)) {
            const literal = this.readWhile(c => isLetter(c) || isDigit(c));
            return this.token(lookupIdent(literal), literal, start);
        }

        if (isDigit(char)) {
            const literal = this.readWhile(isDigit);
            return this.token('Int', literal, start);
        }

        this.advance(1);
        return this.token('Illegal', char, start);
    }

    private token(type: TokenType, literal: string, start: Location): Token {
        return { type, literal, range: { start, end: this.location() } };
    }

    private location(): Location {
        return { line: this.line, col: this.col, offset: this.offset };
    }

    private readWhile(predicate: (char: string) => boolean): string {
        const begin = this.offset;
        while (this.offset < this.input.length && predicate(this.input[this.offset])) {
            this.advance(1);
        }
        return this.input.slice(begin, this.offset);
    }

    private skipWhitespace(): void {
        while (this.offset < this.input.length && /\s/.test(this.input[this.offset])) {
            this.advance(1);
        }
    }

    private advance(count: number): void {
        for (let i = 0; i < count; i++) {
            if (this.input[this.offset] === '\n') {
                this.line++;
                this.col = 1;
            } else {
                this.col++;
            }
            this.offset++;
        }
    }
}

function isLetter(char: string): boolean {
    return /[A-Za-z_]/.test(char);
}

function isDigit(char: string): boolean {
    return /[0-9]/.test(char);
}

export function tokenize(input: string): Token[] {
    const lexer = new Lexer(input);
    const tokens: Token[] = [];

    for (;;) {
        const token = lexer.nextToken();
        tokens.push(token);
        if (token.type === 'EOF') return tokens;
    }
}
