// IMPORTS
// ================================================================================================
import type { Cycle, CycleDecomposition, FeedbackRule } from 'nfsr-cycles';
import { createTransitionFunction, validateRegisterLength } from './TransitionFunction';

// MODULE VARIABLES
// ================================================================================================
// non-negative marks are positions of in-progress states within the current trajectory
const UNSEEN = -1;
const TAIL   = -2;
const CYCLE  = -3;

// PUBLIC FUNCTIONS
// ================================================================================================
export function decomposeCycles(registerLength: number, feedback: FeedbackRule): CycleDecomposition {
    validateRegisterLength(registerLength);
    if (typeof feedback !== 'function') throw new TypeError('Feedback rule must be a function');

    const next = createTransitionFunction(registerLength, feedback);
    const stateCount = 2**registerLength;

    const marks = new Int32Array(stateCount).fill(UNSEEN);
    const trajectory: number[] = [];
    const cycles = new Map<number, Cycle[]>();

    let cycleCount = 0;
    let cyclicStateCount = 0;

    for (let start = 0; start < stateCount; start++) {
        if (marks[start] !== UNSEEN) continue;

        // follow the trajectory until it reaches a state which is not unseen; every state on the
        // way has its successor computed exactly once
        trajectory.length = 0;
        let state = start;
        while (marks[state] === UNSEEN) {
            marks[state] = trajectory.length;
            trajectory.push(state);
            state = next(state);
        }

        // reaching a state of this very walk closes a new cycle; anything else is a tail
        let cycleStart = trajectory.length;
        if (marks[state] >= 0) {
            cycleStart = marks[state];
            const cycle = trajectory.slice(cycleStart);
            const group = cycles.get(cycle.length);
            if (group) {
                group.push(cycle);
            }
            else {
                cycles.set(cycle.length, [cycle]);
            }
            cycleCount++;
            cyclicStateCount += cycle.length;
        }

        for (let i = 0; i < trajectory.length; i++) {
            marks[trajectory[i]] = (i < cycleStart) ? TAIL : CYCLE;
        }
    }

    return {
        registerLength,
        stateCount,
        cycles,
        cycleCount,
        cyclicStateCount,
        tailStateCount: stateCount - cyclicStateCount
    };
}
