import { describe, it, expect } from 'vitest';
import { Lexer, lookupIdent, tokenize } from '../../src/core/expr/tokenizer.js';

function types(input: string) {
    return tokenize(input).map(t => t.type);
}

describe('tokenize', () => {
    it('tokenizes a let statement', () => {
        const tokens = tokenize('let x = 5;');

        expect(tokens.map(t => [t.type, t.literal])).toEqual([
            ['Let', 'let'],
            ['Ident', 'x'],
            ['Assign', '='],
            ['Int', '5'],
            ['Semicolon', ';'],
            ['EOF', '']
        ]);
    });

    it('prefers two-char operators over their one-char prefixes', () => {
        expect(types('a == b != !c')).toEqual(['Ident', 'Eq', 'Ident', 'NotEq', 'Bang', 'Ident', 'EOF']);
    });

    it('tokenizes arithmetic, comparison and delimiters', () => {
        expect(types('add(1, 2) * 3 / 4 - 5 + 6 < 7 > 8')).toEqual([
            'Ident', 'LParen', 'Int', 'Comma', 'Int', 'RParen',
            'Asterisk', 'Int', 'Slash', 'Int', 'Minus', 'Int', 'Plus', 'Int', 'Lt', 'Int', 'Gt', 'Int',
            'EOF'
        ]);
    });

    it('recognizes keywords and leaves other words as identifiers', () => {
        expect(types('let return true false lettuce')).toEqual(['Let', 'Return', 'True', 'False', 'Ident', 'EOF']);
        expect(lookupIdent('returns')).toBe('Ident');
    });

    it('allows underscores and trailing digits in identifiers', () => {
        const [token] = tokenize('_foo1');
        expect(token.type).toBe('Ident');
        expect(token.literal).toBe('_foo1');
    });

    it('splits a number from a following identifier', () => {
        expect(tokenize('5x').map(t => t.literal)).toEqual(['5', 'x', '']);
    });

    it('emits Illegal for unknown characters instead of throwing', () => {
        const [token] = tokenize('@');
        expect(token.type).toBe('Illegal');
        expect(token.literal).toBe('@');
    });

    it('tracks line, column and offset ranges', () => {
        const tokens = tokenize('1\n  foo');

        expect(tokens[1].range).toEqual({
            start: { line: 2, col: 3, offset: 4 },
            end: { line: 2, col: 6, offset: 7 }
        });
    });
});

describe('Lexer', () => {
    it('keeps returning EOF once the input is exhausted', () => {
        const lexer = new Lexer('x');

        expect(lexer.nextToken().type).toBe('Ident');
        expect(lexer.nextToken().type).toBe('EOF');
        expect(lexer.nextToken().type).toBe('EOF');
    });

    it('produces only EOF for blank input', () => {
        expect(types('  \n\t ')).toEqual(['EOF']);
    });
});
