// IMPORTS
// ================================================================================================
import type { ExpressionNode } from 'nfsr-cycles';
import { Token } from './tokenizer';
import { NotNode, OperationNode, BinaryOperator } from './nodes';
import { NfsrError } from '../NfsrError';

// INTERFACES
// ================================================================================================
export type ExpressionItem = Token | ExpressionNode;
type Operator = BinaryOperator | 'not';

// MODULE VARIABLES
// ================================================================================================
const OPERATORS: { [symbol: string]: Operator } = {
    '~'     : 'not',
    '!'     : 'not',
    'not'   : 'not',
    '&'     : 'and',
    '*'     : 'and',
    'and'   : 'and',
    '^'     : 'xor',
    '+'     : 'xor',
    'xor'   : 'xor',
    '|'     : 'or',
    'or'    : 'or'
};

// from the tightest binding to the loosest
const BINARY_PRECEDENCE: BinaryOperator[] = ['and', 'xor', 'or'];

// PUBLIC FUNCTIONS
// ================================================================================================
export function parseOperations(items: ExpressionItem[]): ExpressionNode {
    let result = pullSubExpressions(items);
    if (result.length === 0) throw new NfsrError('Expression is empty');

    // validate operators
    const first = result[0];
    if (first instanceof Token && getOperator(first) !== 'not') {
        throw new NfsrError(`Leading operator: ${first.value}`);
    }
    const last = result[result.length - 1];
    if (last instanceof Token) {
        throw new NfsrError(`Trailing operator: ${last.value}`);
    }

    // process unary operators first, then binary operators in order of precedence
    result = pullNegations(result);
    for (let operator of BINARY_PRECEDENCE) {
        result = pullOperators(operator, result);
    }

    if (result.length !== 1) throw new NfsrError('Expression is missing an operator between operands');
    const root = result[0];
    if (root instanceof Token) throw new NfsrError(`Unexpected operator: ${root.value}`);
    return root;
}

// HELPER FUNCTIONS
// ================================================================================================
function pullSubExpressions(items: ExpressionItem[]): ExpressionItem[] {
    let parenDepth = 0;
    let subExprItems: ExpressionItem[] = [];
    const output: ExpressionItem[] = [];

    for (let item of items) {
        const paren = (item instanceof Token && item.type === 'paren') ? item.value : undefined;
        if (parenDepth === 0) {
            if (paren === ')') throw new NfsrError('Unexpected close parenthesis ")"');
            if (paren === '(') {
                parenDepth += 1;
                subExprItems = [];
            }
            else {
                output.push(item);
            }
        }
        else {
            if (paren) {
                parenDepth += (paren === '(') ? +1 : -1;
                if (parenDepth === 0) {
                    if (subExprItems.length === 0) throw new NfsrError('Empty parentheses');
                    output.push(parseOperations(subExprItems));
                }
                else {
                    subExprItems.push(item);
                }
            }
            else {
                subExprItems.push(item);
            }
        }
    }
    if (parenDepth !== 0) throw new NfsrError('Unclosed parenthesis');
    return output;
}

function pullNegations(items: ExpressionItem[]): ExpressionItem[] {
    const output: ExpressionItem[] = [];

    // right to left, so that chained negations wrap an already negated operand
    for (let i = items.length - 1; i >= 0; i--) {
        const item = items[i];
        if (item instanceof Token && getOperator(item) === 'not') {
            const operand = output.shift();
            if (operand === undefined || operand instanceof Token) {
                throw new NfsrError(`Operator ${item.value} must be followed by an operand`);
            }
            output.unshift(new NotNode(operand));
        }
        else {
            output.unshift(item);
        }
    }

    return output;
}

function pullOperators(operator: BinaryOperator, items: ExpressionItem[]): ExpressionItem[] {
    const output: ExpressionItem[] = [];

    for (let i = 0; i < items.length; i++) {
        const item = items[i];
        if (item instanceof Token && getOperator(item) === operator) {
            const left = output.pop();
            const right = items[i + 1];
            if (left === undefined || left instanceof Token || right === undefined || right instanceof Token) {
                throw new NfsrError(`Sequential operator: ${item.value}`);
            }
            output.push(new OperationNode(operator, [left, right]));
            i++;
        }
        else {
            output.push(item);
        }
    }

    return output;
}

function getOperator(token: Token): Operator {
    const operator = OPERATORS[token.value.toLowerCase()];
    if (!operator) throw new NfsrError(`Unexpected token: ${token.value}`);
    return operator;
}
