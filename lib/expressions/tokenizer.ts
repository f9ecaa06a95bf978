// IMPORTS
// ================================================================================================
import { NfsrError } from '../NfsrError';

// INTERFACES
// ================================================================================================
export type TokenType = 'space' | 'literal' | 'register' | 'paren' | 'operator';

// MODULE VARIABLES
// ================================================================================================
export const matchers: { type: TokenType, match: RegExp }[] = [
    { type: 'space',    match: /^\s+/ },
    { type: 'register', match: /^x(?:\[\s*\d+\s*\]|\d+)/i },
    { type: 'literal',  match: /^\d+/ },
    { type: 'paren',    match: /^[()]/ },
    { type: 'operator', match: /^(?:[~!&*^+|]|(?:and|or|xor|not)\b)/i }
];

// PUBLIC FUNCTIONS
// ================================================================================================
export function tokenize(expression: string, skipWhitespace: boolean): Token[] {
    const tokens: Token[] = [];

    let remainder = expression;
    while (remainder) {
        let next = Token.read(remainder);
        if (!skipWhitespace || next.token.type !== 'space') {
            tokens.push(next.token);
        }
        remainder = next.remainder;
    }

    return tokens;
}

// TOKEN CLASS
// ================================================================================================
export class Token {

    readonly type   : TokenType;
    readonly value  : string;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(type: TokenType, value: string) {
        this.type = type;
        this.value = value;
    }

    // PUBLIC FUNCTIONS
    // --------------------------------------------------------------------------------------------
    static read(expression: string) {
        for (let matcher of matchers) {
            let match = matcher.match.exec(expression);
            if (match) {
                const token = new Token(matcher.type, match[0]);
                return { token, remainder: expression.slice(token.value.length) };
            }
        }
        throw new NfsrError(`Expression contains an invalid token at '${expression}'`);
    }
}
