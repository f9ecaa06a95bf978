// IMPORTS
// ================================================================================================
import type { Nfsr as INfsr, AnalysisConfig, CycleDecomposition, FeedbackRule, Logger } from 'nfsr-cycles';
import { computeSuccessor, createTransitionFunction, decomposeCycles, validateState } from './components';
import { writeReport } from './Report';
import { NfsrError } from './NfsrError';

// CLASS DEFINITION
// ================================================================================================
export class Nfsr implements INfsr {

    readonly registerLength     : number;
    readonly stateCount         : number;
    readonly feedbackLabel      : string;
    readonly logger             : Logger;

    private readonly feedback   : FeedbackRule;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(config: AnalysisConfig, logger: Logger) {
        this.registerLength = config.registerLength;
        this.stateCount = 2**config.registerLength;
        this.feedbackLabel = config.feedbackLabel;
        this.feedback = config.feedbackRule;
        this.logger = logger;
    }

    // TRANSITIONS
    // --------------------------------------------------------------------------------------------
    next(state: number): number {
        return computeSuccessor(state, this.registerLength, this.feedback);
    }

    trace(seed: number, steps: number): number[] {
        validateState(seed, this.registerLength);
        if (!Number.isInteger(steps) || steps < 1) throw new TypeError('Number of steps must be a positive integer');

        const next = createTransitionFunction(this.registerLength, this.feedback);
        const states = new Array<number>(steps);
        states[0] = seed;
        for (let i = 1; i < steps; i++) {
            states[i] = next(states[i - 1]);
        }
        return states;
    }

    // CYCLES
    // --------------------------------------------------------------------------------------------
    findCycles(): CycleDecomposition {

        const log = this.logger.start(`Decomposing ${this.stateCount} states of ${this.registerLength}-bit register (${this.feedbackLabel})`);

        let decomposition: CycleDecomposition;
        try {
            decomposition = decomposeCycles(this.registerLength, this.feedback);
        }
        catch (error) {
            throw new NfsrError('Cycle decomposition failed', error);
        }
        log(`Found ${decomposition.cycleCount} cycles covering ${decomposition.cyclicStateCount} states`);

        this.logger.done(log, 'Cycle decomposition completed');
        return decomposition;
    }

    // PERSISTENCE
    // --------------------------------------------------------------------------------------------
    writeReport(path: string, decomposition: CycleDecomposition): void {
        writeReport(path, decomposition, { feedbackLabel: this.feedbackLabel }, this.logger);
    }
}
