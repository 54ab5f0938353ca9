import type { Token } from './tokenizer.js';

export type Identifier = { kind: 'Identifier'; token: Token; value: string };
export type IntegerLiteral = { kind: 'IntegerLiteral'; token: Token; value: bigint };
export type BooleanLiteral = { kind: 'BooleanLiteral'; token: Token; value: boolean };
export type PrefixExpression = { kind: 'PrefixExpression'; token: Token; operator: string; right: Expression | null };
export type InfixExpression = {
    kind: 'InfixExpression';
    token: Token;
    left: Expression | null;
    operator: string;
    right: Expression | null;
};
export type CallExpression = { kind: 'CallExpression'; token: Token; func: Expression | null; args: Array<Expression | null> };

export type Expression =
    | Identifier
    | IntegerLiteral
    | BooleanLiteral
    | PrefixExpression
    | InfixExpression
    | CallExpression;

// `value` and `returnValue` stay null until their right-hand sides are parsed.
export type LetStatement = { kind: 'LetStatement'; token: Token; name: Identifier; value: Expression | null };
export type ReturnStatement = { kind: 'ReturnStatement'; token: Token; returnValue: Expression | null };
export type ExpressionStatement = { kind: 'ExpressionStatement'; token: Token; expression: Expression | null };

export type Statement = LetStatement | ReturnStatement | ExpressionStatement;

export type Program = { kind: 'Program'; statements: Statement[] };

export type Node = Program | Statement | Expression;

export function tokenLiteral(node: Node): string {
    if (node.kind === 'Program') {
        const first = node.statements[0];
        return first ? first.token.literal : '';
    }
    return node.token.literal;
}

/**
 * Renders a node back to source form, wrapping every prefix and infix
 * expression in parentheses so the parsed grouping is visible.
 */
export function formatNode(node: Node | null): string {
    if (node === null) return '';

    switch (node.kind) {
        case 'Program':
            return node.statements.map(formatNode).join('');
        case 'LetStatement':
            return `${node.token.literal} ${formatNode(node.name)} = ${formatNode(node.value)};`;
        case 'ReturnStatement':
            return `${node.token.literal} ${formatNode(node.returnValue)};`;
        case 'ExpressionStatement':
            return formatNode(node.expression);
        case 'Identifier':
            return node.value;
        case 'IntegerLiteral':
        case 'BooleanLiteral':
            return node.token.literal;
        case 'PrefixExpression':
            return `(${node.operator}${formatNode(node.right)})`;
        case 'InfixExpression':
            return `(${formatNode(node.left)} ${node.operator} ${formatNode(node.right)})`;
        case 'CallExpression':
            return `${formatNode(node.func)}(${node.args.map(formatNode).join(', ')})`;
    }
}
