// IMPORTS
// ================================================================================================
import type { CycleDecomposition, CycleDistribution, DistributionEntry } from 'nfsr-cycles';

// PUBLIC FUNCTIONS
// ================================================================================================
export function getDistribution(decomposition: CycleDecomposition): CycleDistribution {
    const lengths = Array.from(decomposition.cycles.keys()).sort((a, b) => a - b);

    const entries = new Array<DistributionEntry>(lengths.length);
    for (let i = 0; i < lengths.length; i++) {
        let length = lengths[i];
        let count = decomposition.cycles.get(length)?.length ?? 0;
        entries[i] = {
            length  : length,
            count   : count,
            states  : length * count,
            share   : (length * count) / decomposition.stateCount
        };
    }

    return {
        registerLength      : decomposition.registerLength,
        stateCount          : decomposition.stateCount,
        cycleCount          : decomposition.cycleCount,
        cyclicStateCount    : decomposition.cyclicStateCount,
        tailStateCount      : decomposition.tailStateCount,
        entries             : entries
    };
}
