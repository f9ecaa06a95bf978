// IMPORTS
// ================================================================================================
import assert from 'assert';
import type { AnalysisOptions } from 'nfsr-cycles';
import { instantiate, getDistribution, formatCycle, renderDistributionTable } from '../index';

// ANALYSES
// ================================================================================================
// Runs the cycle decomposition for a handful of feedback functions. Invertible feedback (one of
// the form x0 + g(x1, ..., xn-1)) must leave no tail states behind.

const analyses: AnalysisOptions[] = [
    { feedback: { type: 'example', name: 'Example Nonlinear' } },                       // 3 bits
    { feedback: { type: 'example', name: 'Fibonacci LFSR' } },                          // 4 bits
    { feedback: { type: 'example', name: 'Grain Stream Cipher' } },                     // 5 bits
    { feedback: { type: 'example', name: 'Trivium Stream Cipher' }, registerLength: 4 },
    { feedback: { type: 'expression', expression: 'x[0] ^ x[1] ^ (x[2] & x[3])' }, registerLength: 4 }
];

for (let options of analyses) {
    const nfsr = instantiate(options);
    const decomposition = nfsr.findCycles();
    const distribution = getDistribution(decomposition);

    for (let [length, cycles] of decomposition.cycles) {
        console.log(`length ${length}: ${cycles.map(c => formatCycle(c, nfsr.registerLength)).join(' | ')}`);
    }
    console.log(renderDistributionTable(distribution));

    assert.strictEqual(decomposition.tailStateCount, 0);
    assert.strictEqual(distribution.cyclicStateCount, nfsr.stateCount);
    console.log('-'.repeat(20));
}
