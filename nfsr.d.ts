declare module 'nfsr-cycles' {

    // PUBLIC FUNCTIONS
    // --------------------------------------------------------------------------------------------

    /**
     * Creates an NFSR analyzer from the provided options.
     * @param options Register length and feedback source for the analyzer.
     * @param logger Optional logger; defaults to console logging; set to null to disable.
     */
    export function instantiate(options: AnalysisOptions, logger?: Logger | null): Nfsr;

    /**
     * Returns the successor of a register state: the register is shifted towards the front by one
     * position and the feedback bit is written into the vacated last position.
     * @param state Register state in [0, 2^registerLength).
     * @param registerLength Number of bits in the register.
     * @param feedback Rule computing the new bit from the current bits.
     */
    export function computeSuccessor(state: number, registerLength: number, feedback: FeedbackRule): number;

    /**
     * Partitions the full state space of the register into the cycles of its transition function;
     * states which only lead into a cycle are not reported.
     */
    export function decomposeCycles(registerLength: number, feedback: FeedbackRule): CycleDecomposition;

    /** Parses a boolean feedback expression over register bits x[0] ... x[registerLength - 1] */
    export function parseExpression(expression: string, registerLength: number): ExpressionNode;

    /** Parses a boolean feedback expression and wraps it into a feedback rule */
    export function compileExpression(expression: string, registerLength: number): FeedbackRule;

    export function listExamples(): FeedbackExample[];
    export function getExample(name: string): FeedbackExample;

    /** Validates analysis options and resolves the feedback source into a feedback rule */
    export function parseAnalysisConfig(options: AnalysisOptions): AnalysisConfig;

    export function getDistribution(decomposition: CycleDecomposition): CycleDistribution;

    /** Renders a state as its binary value; the front bit x[0] is the leftmost character */
    export function formatState(state: number, registerLength: number): string;
    export function formatCycle(cycle: Cycle, registerLength: number): string;
    export function renderDistributionTable(distribution: CycleDistribution): string;

    /**
     * Renders a plain-text report listing the cycle length distribution and every cycle.
     * @param log Optional log function receiving progress messages.
     */
    export function renderReport(decomposition: CycleDecomposition, options: ReportOptions, log?: LogFunction): string;
    export function writeReport(path: string, decomposition: CycleDecomposition, options: ReportOptions, logger: Logger): void;

    /** Largest register length the transition arithmetic supports */
    export const MAX_REGISTER_LENGTH: number;

    export class NfsrError extends Error {
        constructor(message: string, cause?: unknown);
    }

    // REGISTER
    // --------------------------------------------------------------------------------------------
    export type Bit = 0 | 1;

    /**
     * Boolean function of the register bits; must be deterministic and must return 0 or 1 for every
     * input. bits[0] is the front of the register.
     */
    export type FeedbackRule = (bits: readonly Bit[]) => number;

    /** Ordered register states; the successor of the last state is the first state */
    export type Cycle = number[];

    export interface CycleDecomposition {

        /** Number of bits in the register */
        readonly registerLength     : number;

        /** Number of possible register states (2^registerLength) */
        readonly stateCount         : number;

        /** Cycles grouped by length; cycles of the same length are in order of discovery */
        readonly cycles             : Map<number, Cycle[]>;

        readonly cycleCount         : number;
        readonly cyclicStateCount   : number;
        readonly tailStateCount     : number;
    }

    export class Nfsr {

        readonly registerLength : number;
        readonly stateCount     : number;
        readonly feedbackLabel  : string;
        readonly logger         : Logger;

        /**
         * Creates an analyzer for a validated configuration
         * @param config Output of option validation
         * @param logger Logger for timing narration
         */
        constructor(config: AnalysisConfig, logger: Logger);

        /** Returns the successor of the provided state */
        next(state: number): number;

        /**
         * Returns the states the register passes through starting from the seed
         * @param seed Initial register state
         * @param steps Number of states to return, including the seed
         */
        trace(seed: number, steps: number): number[];

        /** Decomposes the state space of the register into cycles */
        findCycles(): CycleDecomposition;

        /** Writes a plain-text report of the decomposition to the specified file */
        writeReport(path: string, decomposition: CycleDecomposition): void;
    }

    // CONFIGURATION
    // --------------------------------------------------------------------------------------------
    export type FeedbackSource = ExampleFeedbackSource | ExpressionFeedbackSource;

    export interface ExampleFeedbackSource {
        type: 'example';

        /** Name of a feedback function from the example library (case-insensitive) */
        name: string;
    }

    export interface ExpressionFeedbackSource {
        type: 'expression';

        /** Boolean expression over x[i], e.g. 'x[0] ^ (x[1] & x[2])' */
        expression: string;
    }

    export interface AnalysisOptions {

        /**
         * Number of bits in the register; defaults to the recommended length of an example
         * feedback function and is required for custom expressions
         */
        registerLength?: number;

        feedback: FeedbackSource;

        /** Largest register length the analyzer will accept; defaults to 20 */
        maxRegisterLength?: number;
    }

    export interface AnalysisConfig {
        readonly registerLength : number;
        readonly feedbackRule   : FeedbackRule;
        readonly feedbackLabel  : string;
    }

    // FEEDBACK FUNCTIONS
    // --------------------------------------------------------------------------------------------
    export interface ExpressionNode {
        evaluate(bits: readonly Bit[]): Bit;
        toString(): string;
    }

    export interface FeedbackExample {
        readonly name               : string;
        readonly description        : string;
        readonly recommendedLength  : number;

        /** Source of the rule for examples which are defined by an expression */
        readonly expression?        : string;

        supports(registerLength: number): boolean;
        createRule(registerLength: number): FeedbackRule;
    }

    // STATISTICS
    // --------------------------------------------------------------------------------------------
    export interface DistributionEntry {
        readonly length : number;
        readonly count  : number;
        readonly states : number;

        /** Fraction of all possible states lying on cycles of this length */
        readonly share  : number;
    }

    export interface CycleDistribution {
        readonly registerLength     : number;
        readonly stateCount         : number;
        readonly cycleCount         : number;
        readonly cyclicStateCount   : number;
        readonly tailStateCount     : number;

        /** One entry per cycle length, in ascending order of length */
        readonly entries            : DistributionEntry[];
    }

    export interface ReportOptions {
        feedbackLabel       : string;

        /** Number of cycles between progress messages; defaults to 10000 */
        progressInterval?   : number;
    }

    // UTILITIES
    // --------------------------------------------------------------------------------------------
    export interface Logger {
        start(message?: string, prefix?: string) : LogFunction;
        sub(message?: string): LogFunction;
        done(log: LogFunction, message?: string): void;
    }

    export type LogFunction = (message: string) => void;
}
