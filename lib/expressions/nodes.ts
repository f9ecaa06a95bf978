// IMPORTS
// ================================================================================================
import type { Bit, ExpressionNode } from 'nfsr-cycles';
import { NfsrError } from '../NfsrError';

// INTERFACES
// ================================================================================================
export type BinaryOperator = 'and' | 'xor' | 'or';

// LITERAL
// ================================================================================================
export class LiteralNode implements ExpressionNode {

    readonly value: Bit;

    constructor(value: string) {
        if (value === '0') {
            this.value = 0;
        }
        else if (value === '1') {
            this.value = 1;
        }
        else {
            throw new NfsrError(`Literal '${value}' is not a bit; only 0 and 1 are allowed`);
        }
    }

    evaluate(): Bit {
        return this.value;
    }

    toString() {
        return String(this.value);
    }
}

// REGISTER
// ================================================================================================
export class RegisterNode implements ExpressionNode {

    readonly index  : number;

    constructor(register: string) {
        const digits = /\d+/.exec(register);
        if (!digits) throw new NfsrError(`Register reference '${register}' is missing an index`);
        this.index = Number.parseInt(digits[0], 10);
    }

    evaluate(bits: readonly Bit[]): Bit {
        if (this.index >= bits.length) {
            throw new NfsrError(`Register bit x[${this.index}] does not exist in a ${bits.length}-bit register`);
        }
        return bits[this.index];
    }

    toString() {
        return `x[${this.index}]`;
    }
}

// NEGATION
// ================================================================================================
export class NotNode implements ExpressionNode {

    readonly operand: ExpressionNode;

    constructor(operand: ExpressionNode) {
        this.operand = operand;
    }

    evaluate(bits: readonly Bit[]): Bit {
        return this.operand.evaluate(bits) === 1 ? 0 : 1;
    }

    toString() {
        return `~${this.operand.toString()}`;
    }
}

// OPERATION
// ================================================================================================
const OP_SYMBOLS: { [op in BinaryOperator]: string } = {
    'and'   : '&',
    'xor'   : '^',
    'or'    : '|'
};

export class OperationNode implements ExpressionNode {

    readonly operation  : BinaryOperator;
    readonly children   : [ExpressionNode, ExpressionNode];

    constructor(operation: BinaryOperator, children: [ExpressionNode, ExpressionNode]) {
        this.operation = operation;
        this.children = children;
    }

    evaluate(bits: readonly Bit[]): Bit {
        const [c1, c2] = this.children;
        const v1 = c1.evaluate(bits), v2 = c2.evaluate(bits);
        switch (this.operation) {
            case 'and'  : return (v1 === 1 && v2 === 1) ? 1 : 0;
            case 'xor'  : return (v1 !== v2) ? 1 : 0;
            case 'or'   : return (v1 === 1 || v2 === 1) ? 1 : 0;
        }
    }

    toString() {
        const [c1, c2] = this.children;
        return `(${c1.toString()} ${OP_SYMBOLS[this.operation]} ${c2.toString()})`;
    }
}
