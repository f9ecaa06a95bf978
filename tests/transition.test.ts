import { describe, test, expect } from 'vitest';
import type { Bit, FeedbackRule } from 'nfsr-cycles';
import { computeSuccessor, decodeState, encodeState, createTransitionFunction } from '../lib/components';
import { NfsrError } from '../lib/NfsrError';

const nonlinear: FeedbackRule = (x) => x[0] ^ (x[1] & x[2]);

describe('Transition function', () => {

    test('decodes the most significant bit as the front of the register', () => {
        expect(decodeState(6, 3)).toEqual([1, 1, 0]);
        expect(decodeState(1, 4)).toEqual([0, 0, 0, 1]);
        expect(encodeState([0, 1, 1])).toBe(3);
        expect(encodeState([1, 0, 0, 0])).toBe(8);
    });

    test('shifts towards the front and appends the feedback bit', () => {
        const successors = [0, 1, 2, 3, 4, 5, 6, 7].map(s => computeSuccessor(s, 3, nonlinear));
        expect(successors).toEqual([0, 2, 4, 7, 1, 3, 5, 6]);
    });

    test('matches re-encoding of the shifted bit vector', () => {
        const rule: FeedbackRule = (x) => (x[0] & x[3]) | (x[1] ^ x[2]);
        for (let s = 0; s < 16; s++) {
            const bits = decodeState(s, 4);
            const fb: Bit = rule(bits) === 1 ? 1 : 0;
            expect(computeSuccessor(s, 4, rule)).toBe(encodeState([...bits.slice(1), fb]));
        }
    });

    test('walks 001, 010, 100 from state 1 of the 3-bit nonlinear register', () => {
        const next = createTransitionFunction(3, nonlinear);
        expect([1, next(1), next(next(1))]).toEqual([1, 2, 4]);
    });

    test('replaces the only bit of a 1-bit register', () => {
        const not: FeedbackRule = (x) => x[0] === 1 ? 0 : 1;
        expect(computeSuccessor(0, 1, not)).toBe(1);
        expect(computeSuccessor(1, 1, not)).toBe(0);
    });

    test('handles the widest supported register', () => {
        const rule: FeedbackRule = () => 1;
        expect(computeSuccessor(0, 30, rule)).toBe(1);
        expect(computeSuccessor(2**29, 30, rule)).toBe(1);
        expect(createTransitionFunction(30, rule)(2**30 - 1)).toBe(2**30 - 1);
    });

    test('rejects invalid register lengths and states', () => {
        expect(() => computeSuccessor(0, 0, nonlinear)).toThrow(TypeError);
        expect(() => computeSuccessor(0, 2.5, nonlinear)).toThrow('Register length must be an integer');
        expect(() => computeSuccessor(0, 31, nonlinear)).toThrow('Register length must be between 1 and 30');
        expect(() => computeSuccessor(8, 3, nonlinear)).toThrow('State 8 is outside of the state space of a 3-bit register');
        expect(() => computeSuccessor(-1, 3, nonlinear)).toThrow(TypeError);
    });

    test('surfaces faults of the feedback rule', () => {
        const failing: FeedbackRule = () => { throw new Error('boom'); };
        expect(() => computeSuccessor(0, 2, failing)).toThrow(NfsrError);
        expect(() => computeSuccessor(0, 2, failing)).toThrow('Failed to evaluate feedback rule for state 0: boom');

        const notABit: FeedbackRule = () => 2;
        expect(() => computeSuccessor(3, 2, notABit)).toThrow('Feedback rule returned 2 for state 3; expected 0 or 1');
    });
});
