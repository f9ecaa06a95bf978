// IMPORTS
// ================================================================================================
import * as fs from 'fs';
import type { CycleDecomposition, LogFunction, Logger, ReportOptions } from 'nfsr-cycles';
import { getDistribution } from './statistics';
import { formatCycle, formatShare, noop } from './utils';
import { NfsrError } from './NfsrError';

// MODULE VARIABLES
// ================================================================================================
const DEFAULT_PROGRESS_INTERVAL = 10000;

// PUBLIC FUNCTIONS
// ================================================================================================
export function renderReport(decomposition: CycleDecomposition, options: ReportOptions, log: LogFunction = noop): string {

    const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    if (!Number.isInteger(progressInterval) || progressInterval < 1) {
        throw new TypeError('Progress interval must be a positive integer');
    }

    const n = decomposition.registerLength;
    const distribution = getDistribution(decomposition);

    const lines = [
        'NFSR cycle analysis',
        `Feedback: ${options.feedbackLabel}`,
        `Register length: ${n}`,
        `Possible states: ${decomposition.stateCount}`,
        `Distinct cycles: ${decomposition.cycleCount}`,
        `Cyclic states: ${decomposition.cyclicStateCount}`,
        `Tail states: ${decomposition.tailStateCount}`,
        '',
        'Cycle length distribution:'
    ];

    for (let entry of distribution.entries) {
        lines.push(`  length ${entry.length}: ${entry.count} cycle(s), ${entry.states} state(s) (${formatShare(entry.share)})`);
    }

    let written = 0;
    for (let entry of distribution.entries) {
        lines.push('', `Cycles of length ${entry.length}:`);
        for (let cycle of decomposition.cycles.get(entry.length) ?? []) {
            lines.push(`  ${formatCycle(cycle, n)}`);
            written++;
            if (written % progressInterval === 0) {
                log(`Rendered ${written} of ${decomposition.cycleCount} cycles`);
            }
        }
    }

    return lines.join('\n') + '\n';
}

export function writeReport(path: string, decomposition: CycleDecomposition, options: ReportOptions, logger: Logger): void {
    const log = logger.start(`Writing ${decomposition.cycleCount} cycles to ${path}`);

    const progress = logger.sub('Rendering cycles');
    const report = renderReport(decomposition, options, progress);
    logger.done(progress, 'Cycles rendered');

    try {
        fs.writeFileSync(path, report, 'utf8');
    }
    catch (error) {
        throw new NfsrError(`Failed to write report to ${path}`, error);
    }

    logger.done(log, `Report written to ${path}`);
}
