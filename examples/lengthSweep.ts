// IMPORTS
// ================================================================================================
import { instantiate, getExample } from '../index';

// LENGTH SWEEP
// ================================================================================================
// Shows how the cycle structure of one feedback function changes with the register length.

const name = process.argv[2] || 'Majority Function';
const maxLength = Number(process.argv[3] || 16);
const example = getExample(name);

console.log(`${example.name}: ${example.description}`);
for (let n = 1; n <= maxLength; n++) {
    if (!example.supports(n)) continue;

    const nfsr = instantiate({ registerLength: n, feedback: { type: 'example', name } }, null);
    let start = Date.now();
    const decomposition = nfsr.findCycles();
    const longest = Math.max(...decomposition.cycles.keys());

    console.log(`n=${n}: ${decomposition.cycleCount} cycles, longest ${longest}, `
        + `${decomposition.tailStateCount} tail states (${Date.now() - start} ms)`);
}
