// IMPORTS
// ================================================================================================
import type { Bit, FeedbackRule } from 'nfsr-cycles';
import { NfsrError } from '../NfsrError';

// INTERFACES
// ================================================================================================
export type TransitionFunction = (state: number) => number;

// MODULE VARIABLES
// ================================================================================================
// state arithmetic relies on 32-bit bitwise operators
export const MAX_REGISTER_LENGTH = 30;

// PUBLIC FUNCTIONS
// ================================================================================================
export function computeSuccessor(state: number, registerLength: number, feedback: FeedbackRule): number {
    validateRegisterLength(registerLength);
    if (typeof feedback !== 'function') throw new TypeError('Feedback rule must be a function');
    validateState(state, registerLength);
    return createTransitionFunction(registerLength, feedback)(state);
}

/**
 * Builds T(s) for a register of the specified length without re-validating its arguments on every
 * call; the register length is expected to have been validated already.
 */
export function createTransitionFunction(registerLength: number, feedback: FeedbackRule): TransitionFunction {
    return function (state: number): number {
        const bits = decodeState(state, registerLength);
        const fb = evaluateFeedback(feedback, bits, state);
        // x'[i] = x[i + 1], x'[n - 1] = fb
        return encodeState([...bits.slice(1), fb]);
    };
}

/** Splits a state into register bits; x[0] is the most significant bit of the state */
export function decodeState(state: number, registerLength: number): Bit[] {
    const bits = new Array<Bit>(registerLength);
    for (let i = 0; i < registerLength; i++) {
        bits[i] = (state >>> (registerLength - 1 - i)) & 1 ? 1 : 0;
    }
    return bits;
}

export function encodeState(bits: readonly Bit[]): number {
    let state = 0;
    for (let i = 0; i < bits.length; i++) {
        state = (state << 1) | bits[i];
    }
    return state >>> 0;
}

// VALIDATORS
// ================================================================================================
export function validateRegisterLength(registerLength: number) {
    if (typeof registerLength !== 'number' || !Number.isInteger(registerLength)) {
        throw new TypeError('Register length must be an integer');
    }
    else if (registerLength < 1 || registerLength > MAX_REGISTER_LENGTH) {
        throw new TypeError(`Register length must be between 1 and ${MAX_REGISTER_LENGTH}`);
    }
}

export function validateState(state: number, registerLength: number) {
    if (!Number.isInteger(state) || state < 0 || state >= 2**registerLength) {
        throw new TypeError(`State ${state} is outside of the state space of a ${registerLength}-bit register`);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function evaluateFeedback(feedback: FeedbackRule, bits: readonly Bit[], state: number): Bit {
    let value: number;
    try {
        value = feedback(bits);
    }
    catch (error) {
        throw new NfsrError(`Failed to evaluate feedback rule for state ${state}`, error);
    }

    if (value !== 0 && value !== 1) {
        throw new NfsrError(`Feedback rule returned ${value} for state ${state}; expected 0 or 1`);
    }
    return value;
}
