import { describe, test, expect } from 'vitest';
import type { Bit, FeedbackRule } from 'nfsr-cycles';
import { listExamples, getExample } from '../lib/feedback';
import { decodeState } from '../lib/components';
import { NfsrError } from '../lib/NfsrError';

function truthTable(rule: FeedbackRule, registerLength: number): number[] {
    const outputs: number[] = [];
    for (let s = 0; s < 2**registerLength; s++) {
        outputs.push(rule(decodeState(s, registerLength)));
    }
    return outputs;
}

describe('Example feedback library', () => {

    test('lists the examples in a fixed order', () => {
        expect(listExamples().map(e => e.name)).toEqual([
            'Example Nonlinear',
            'Fibonacci LFSR',
            'Grain Stream Cipher',
            'Trivium Stream Cipher',
            'Alternating Step Generator',
            'Majority Function',
            'Threshold (70%)',
            'Even Parity',
            'Galois LFSR'
        ]);
    });

    test('looks examples up by name regardless of case', () => {
        expect(getExample('grain stream cipher').name).toBe('Grain Stream Cipher');
        expect(getExample('  Even Parity ').recommendedLength).toBe(4);
        expect(() => getExample('nope')).toThrow(NfsrError);
        expect(() => getExample('nope')).toThrow("Feedback example 'nope' does not exist");
    });

    test('refuses register lengths an example cannot handle', () => {
        const grain = getExample('Grain Stream Cipher');
        expect(grain.supports(4)).toBe(false);
        expect(grain.supports(5)).toBe(true);
        expect(() => grain.createRule(4)).toThrow('Grain Stream Cipher feedback does not support a 4-bit register');

        const galois = getExample('Galois LFSR');
        expect(galois.supports(12)).toBe(false);
        expect(galois.supports(16)).toBe(true);
    });

    test('computes the expression-based examples', () => {
        const trivium = getExample('Trivium Stream Cipher').createRule(4);
        const expected = (x: readonly Bit[]) => x[0] ^ x[2] ^ (x[1] & x[2]);
        expect(truthTable(trivium, 4)).toEqual(truthTable(expected, 4));

        const grain = getExample('Grain Stream Cipher').createRule(5);
        expect(grain([1, 0, 0, 0, 0])).toBe(1);
        expect(grain([0, 1, 1, 0, 0])).toBe(0);
        expect(grain([0, 0, 1, 1, 0])).toBe(0);
    });

    test('computes the function-based examples', () => {
        const asg = getExample('Alternating Step Generator').createRule(3);
        expect(asg([1, 0, 1])).toBe(0);
        expect(asg([0, 0, 1])).toBe(1);

        const majority = getExample('Majority Function').createRule(4);
        expect(majority([1, 1, 0, 0])).toBe(0);
        expect(majority([1, 1, 1, 0])).toBe(1);

        const threshold = getExample('Threshold (70%)').createRule(5);
        expect(threshold([1, 1, 1, 1, 0])).toBe(1);
        expect(threshold([1, 1, 1, 0, 0])).toBe(0);

        const parity = getExample('Even Parity').createRule(4);
        expect(parity([1, 1, 1, 0])).toBe(1);
        expect(parity([1, 1, 0, 0])).toBe(0);

        const galois = getExample('Galois LFSR').createRule(4);
        expect(galois([1, 0, 0, 0])).toBe(1);
        expect(galois([1, 1, 0, 0])).toBe(0);

        const galois16 = getExample('Galois LFSR').createRule(16);
        const bits = decodeState(1 << 12, 16);
        expect(galois16(bits)).toBe(1);
    });
});
