// IMPORTS
// ================================================================================================
import type { Bit, FeedbackExample as IFeedbackExample, FeedbackRule } from 'nfsr-cycles';
import { compileExpression } from '../expressions';
import { NfsrError } from '../NfsrError';
import galoisTaps from './galoisTaps.json';

// INTERFACES
// ================================================================================================
interface ExampleDefinition {
    name                : string;
    description         : string;
    recommendedLength   : number;
    minLength           : number;
    expression?         : string;
    build?              : (registerLength: number) => FeedbackRule;
    supports?           : (registerLength: number) => boolean;
}

// MODULE VARIABLES
// ================================================================================================
const GALOIS_TAPS: { [length: string]: number[] } = galoisTaps;

const THRESHOLD = 0.7;

// CLASS DEFINITION
// ================================================================================================
export class FeedbackExample implements IFeedbackExample {

    readonly name               : string;
    readonly description        : string;
    readonly recommendedLength  : number;
    readonly minLength          : number;
    readonly expression?        : string;

    private readonly definition : ExampleDefinition;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(definition: ExampleDefinition) {
        this.name = definition.name;
        this.description = definition.description;
        this.recommendedLength = definition.recommendedLength;
        this.minLength = definition.minLength;
        this.expression = definition.expression;
        this.definition = definition;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    supports(registerLength: number): boolean {
        if (!Number.isInteger(registerLength) || registerLength < this.minLength) return false;
        return this.definition.supports ? this.definition.supports(registerLength) : true;
    }

    createRule(registerLength: number): FeedbackRule {
        if (!this.supports(registerLength)) {
            throw new NfsrError(`${this.name} feedback does not support a ${registerLength}-bit register`);
        }

        if (this.definition.build) {
            return this.definition.build(registerLength);
        }
        else if (this.definition.expression) {
            return compileExpression(this.definition.expression, registerLength);
        }
        else {
            throw new NfsrError(`${this.name} feedback has no definition`);
        }
    }
}

// EXAMPLE LIBRARY
// ================================================================================================
const examples: FeedbackExample[] = [
    new FeedbackExample({
        name                : 'Example Nonlinear',
        description         : 'Small nonlinear feedback x0 + x1*x2',
        recommendedLength   : 3,
        minLength           : 3,
        expression          : 'x[0] ^ (x[1] & x[2])'
    }),
    new FeedbackExample({
        name                : 'Fibonacci LFSR',
        description         : 'Linear feedback x0 + x1; maximum-length for a 4-bit register',
        recommendedLength   : 4,
        minLength           : 2,
        expression          : 'x[0] ^ x[1]'
    }),
    new FeedbackExample({
        name                : 'Grain Stream Cipher',
        description         : 'Simplified Grain NFSR feedback; the cipher itself uses a much longer register',
        recommendedLength   : 5,
        minLength           : 5,
        expression          : 'x[0] ^ x[1] ^ x[3] ^ x[4] ^ (x[1] & x[2]) ^ (x[2] & x[3]) ^ (x[3] & x[4])'
    }),
    new FeedbackExample({
        name                : 'Trivium Stream Cipher',
        description         : 'Simplified Trivium feedback x0 + x2 + x1*x2',
        recommendedLength   : 4,
        minLength           : 3,
        expression          : 'x[0] ^ x[2] ^ (x[1] & x[2])'
    }),
    new FeedbackExample({
        name                : 'Alternating Step Generator',
        description         : 'Simplified alternating step generator: x1 when x0 is set, x2 otherwise',
        recommendedLength   : 3,
        minLength           : 3,
        build               : () => (bits) => bits[0] === 1 ? bits[1] : bits[2]
    }),
    new FeedbackExample({
        name                : 'Majority Function',
        description         : 'Majority of all register bits; ties in even-length registers give 0',
        recommendedLength   : 5,
        minLength           : 1,
        build               : (n) => (bits) => countOnes(bits) > Math.floor(n / 2) ? 1 : 0
    }),
    new FeedbackExample({
        name                : 'Threshold (70%)',
        description         : `1 when at least ${THRESHOLD * 100}% of the register bits are set`,
        recommendedLength   : 5,
        minLength           : 1,
        build               : (n) => (bits) => countOnes(bits) / n >= THRESHOLD ? 1 : 0
    }),
    new FeedbackExample({
        name                : 'Even Parity',
        description         : 'XOR of all register bits',
        recommendedLength   : 4,
        minLength           : 1,
        build               : () => (bits) => countOnes(bits) % 2
    }),
    new FeedbackExample({
        name                : 'Galois LFSR',
        description         : 'Linear feedback over tabulated taps; only tabulated register lengths are supported',
        recommendedLength   : 4,
        minLength           : 2,
        supports            : (n) => GALOIS_TAPS[String(n)] !== undefined,
        build               : (n) => {
            const taps = GALOIS_TAPS[String(n)];
            return (bits) => taps.reduce((result, tap) => result ^ bits[tap], 0);
        }
    })
];

// PUBLIC FUNCTIONS
// ================================================================================================
export function listExamples(): FeedbackExample[] {
    return examples.slice();
}

export function findExample(name: string): FeedbackExample | undefined {
    const key = String(name).trim().toLowerCase();
    return examples.find(e => e.name.toLowerCase() === key);
}

export function getExample(name: string): FeedbackExample {
    const example = findExample(name);
    if (!example) {
        throw new NfsrError(`Feedback example '${name}' does not exist; available examples: ${examples.map(e => e.name).join(', ')}`);
    }
    return example;
}

// HELPER FUNCTIONS
// ================================================================================================
function countOnes(bits: readonly Bit[]): number {
    let count = 0;
    for (let bit of bits) {
        count += bit;
    }
    return count;
}
