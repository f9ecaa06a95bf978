// IMPORTS
// ================================================================================================
import Table from 'cli-table3';
import type { Cycle, CycleDistribution } from 'nfsr-cycles';

// RE-EXPORTS
// ================================================================================================
export { Logger, noopLogger } from './Logger';

// FORMATTING
// ================================================================================================
/** Renders a state as its binary value; the front bit x[0] is the leftmost character */
export function formatState(state: number, registerLength: number): string {
    return state.toString(2).padStart(registerLength, '0');
}

export function formatCycle(cycle: Cycle, registerLength: number): string {
    return cycle.map(state => formatState(state, registerLength)).join(' -> ');
}

export function formatShare(share: number): string {
    return `${(share * 100).toFixed(2)}%`;
}

export function renderDistributionTable(distribution: CycleDistribution): string {
    const table = new Table({
        head    : ['Cycle length', 'Cycles', 'States', 'Share of states'],
        style   : { head: [], border: [] }
    });

    for (let entry of distribution.entries) {
        table.push([entry.length, entry.count, entry.states, formatShare(entry.share)]);
    }

    table.push(['total', distribution.cycleCount, distribution.cyclicStateCount,
        formatShare(distribution.cyclicStateCount / distribution.stateCount)]);

    return table.toString();
}

// OTHER
// ================================================================================================
export function noop() {}
