// IMPORTS
// ================================================================================================
import type { ExpressionNode, FeedbackRule } from 'nfsr-cycles';
import { tokenize } from './tokenizer';
import { parseOperations, ExpressionItem } from './parser';
import { RegisterNode, LiteralNode } from './nodes';
import { NfsrError } from '../NfsrError';

// RE-EXPORTS
// ================================================================================================
export { LiteralNode, RegisterNode, NotNode, OperationNode } from './nodes';

// PUBLIC FUNCTIONS
// ================================================================================================
export function parseExpression(expression: string, registerLength: number): ExpressionNode {
    if (typeof expression !== 'string') throw new TypeError('Expression parameter must be a string');
    if (!expression.trim()) throw new NfsrError('Expression is empty');

    const tokens = tokenize(expression, true);

    // convert registers and literals to AST nodes
    const items: ExpressionItem[] = [];
    for (let token of tokens) {
        if (token.type === 'register') {
            const register = new RegisterNode(token.value);
            validateRegisterIndex(register, registerLength);
            items.push(register);
        }
        else if (token.type === 'literal') {
            items.push(new LiteralNode(token.value));
        }
        else {
            items.push(token);
        }
    }

    return parseOperations(items);
}

export function compileExpression(expression: string, registerLength: number): FeedbackRule {
    const ast = parseExpression(expression, registerLength);
    return (bits) => ast.evaluate(bits);
}

// HELPER FUNCTIONS
// ================================================================================================
function validateRegisterIndex(r: RegisterNode, registerLength: number) {
    if (r.index >= registerLength) {
        throw new NfsrError(`Invalid register reference '${r.toString()}': register index must be smaller than ${registerLength}`);
    }
}
