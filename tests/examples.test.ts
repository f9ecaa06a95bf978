import { describe, test, expect, vi, afterEach } from 'vitest';

describe('Example scripts', () => {

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('demo decomposes every invertible register without tail states', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        await import('../examples/demo');

        const lines = log.mock.calls.map(call => String(call[0]));
        expect(lines.filter(line => line.startsWith('length ')).slice(0, 3)).toEqual([
            'length 1: 000',
            'length 3: 001 -> 010 -> 100',
            'length 4: 011 -> 111 -> 110 -> 101'
        ]);
        expect(lines.filter(line => line === '-'.repeat(20)).length).toBe(5);
    });
});
