import { describe, test, expect, vi, afterEach } from 'vitest';
import type { LogFunction, Logger as ILogger } from 'nfsr-cycles';
import { instantiate, decomposeCycles, Nfsr, NfsrError } from '../index';
import { Logger, noopLogger, noop } from '../lib/utils';

// HELPERS
// ================================================================================================
function createRecordingLogger() {
    const messages: string[] = [];
    const logger: ILogger = {
        start: (message?: string) => {
            if (message) messages.push(`start: ${message}`);
            return (m: string) => { messages.push(`log: ${m}`); };
        },
        sub: () => noop,
        done: (log: LogFunction, message?: string) => {
            if (message) messages.push(`done: ${message}`);
        }
    };
    return { logger, messages };
}

// TESTS
// ================================================================================================
describe('Nfsr', () => {

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('steps and traces the register', () => {
        const nfsr = instantiate({ feedback: { type: 'example', name: 'Example Nonlinear' } }, null);
        expect(nfsr.registerLength).toBe(3);
        expect(nfsr.stateCount).toBe(8);
        expect(nfsr.next(1)).toBe(2);
        expect(nfsr.trace(1, 4)).toEqual([1, 2, 4, 1]);
        expect(nfsr.trace(3, 1)).toEqual([3]);
        expect(() => nfsr.next(8)).toThrow(TypeError);
        expect(() => nfsr.trace(0, 0)).toThrow('Number of steps must be a positive integer');
    });

    test('finds the same cycles as the decomposition engine', () => {
        const nfsr = instantiate({ registerLength: 5, feedback: { type: 'example', name: 'Majority Function' } }, null);
        const rule = (x: readonly number[]) => x.filter(b => b === 1).length > 2 ? 1 : 0;
        expect(nfsr.findCycles()).toEqual(decomposeCycles(5, rule));
    });

    test('narrates the decomposition through its logger', () => {
        const { logger, messages } = createRecordingLogger();
        const nfsr = instantiate({ feedback: { type: 'example', name: 'Example Nonlinear' } }, logger);
        nfsr.findCycles();
        expect(messages).toEqual([
            'start: Decomposing 8 states of 3-bit register (Example Nonlinear)',
            'log: Found 3 cycles covering 8 states',
            'done: Cycle decomposition completed'
        ]);
    });

    test('logs to the console by default', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        instantiate({ feedback: { type: 'example', name: 'Fibonacci LFSR' } }).findCycles();
        expect(spy).toHaveBeenCalledWith('Decomposing 16 states of 4-bit register (Fibonacci LFSR)');
        expect(spy).toHaveBeenCalledWith(expect.stringMatching(/^Found 2 cycles covering 16 states in \d+ ms$/));
        expect(spy).toHaveBeenCalledWith(expect.stringMatching(/^Cycle decomposition completed in \d+ ms$/));
    });

    test('wraps feedback faults into an NfsrError', () => {
        const nfsr = new Nfsr({
            registerLength  : 2,
            feedbackRule    : () => { throw new Error('boom'); },
            feedbackLabel   : 'broken'
        }, noopLogger);
        expect(() => nfsr.findCycles()).toThrow(NfsrError);
        expect(() => nfsr.findCycles()).toThrow('Cycle decomposition failed: Failed to evaluate feedback rule for state 0: boom');
    });
});

describe('Logger', () => {

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('reports elapsed time for steps and for the whole task', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new Logger();
        const log = logger.start('Task');
        log('Step one');
        logger.done(log, 'Task finished');

        expect(spy.mock.calls.length).toBe(3);
        expect(spy.mock.calls[0][0]).toBe('Task');
        expect(spy.mock.calls[1][0]).toMatch(/^Step one in \d+ ms$/);
        expect(spy.mock.calls[2][0]).toMatch(/^Task finished in \d+ ms$/);
    });

    test('indents sub-tasks and can disable them', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const sub = new Logger().sub('Sub task');
        sub('detail');
        expect(spy.mock.calls[0][0]).toBe('  Sub task');
        expect(spy.mock.calls[1][0]).toMatch(/^ {2}detail in \d+ ms$/);

        expect(new Logger(false).sub('hidden')).toBe(noop);
        expect(spy.mock.calls.length).toBe(2);
    });
});
