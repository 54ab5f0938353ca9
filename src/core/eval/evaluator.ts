import type { Node, Statement } from '../expr/ast.js';
import { createInteger, nativeBoolToBoolean, type Value } from '../value/types.js';

/**
 * Reduces a syntax tree to a runtime value.
 *
 * Returns null for nodes that have no evaluation rule yet; callers treat
 * that as "nothing to report", not as a failure.
 */
export function evaluate(node: Node | null): Value | null {
    if (node === null) return null;

    switch (node.kind) {
        // Statements
        case 'Program':
            return evaluateStatements(node.statements);
        case 'ExpressionStatement':
            return evaluate(node.expression);

        // Expressions
        case 'IntegerLiteral':
            return createInteger(node.value);
        case 'BooleanLiteral':
            return nativeBoolToBoolean(node.value);

        // Not evaluated yet: bindings, returns, names, operators and calls
        case 'LetStatement':
        case 'ReturnStatement':
        case 'Identifier':
        case 'PrefixExpression':
        case 'InfixExpression':
        case 'CallExpression':
            return null;
    }
}

function evaluateStatements(statements: Statement[]): Value | null {
    let result: Value | null = null;
    for (const statement of statements) {
        result = evaluate(statement);
    }
    return result;
}
