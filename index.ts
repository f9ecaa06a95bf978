// IMPORTS
// ================================================================================================
import type { AnalysisOptions, Logger } from 'nfsr-cycles';
import { Nfsr } from './lib/Nfsr';
import { parseAnalysisConfig } from './lib/config';
import { Logger as ConsoleLogger, noopLogger } from './lib/utils';

// RE-EXPORTS
// ================================================================================================
export { Nfsr } from './lib/Nfsr';
export { NfsrError } from './lib/NfsrError';
export { parseAnalysisConfig } from './lib/config';
export { computeSuccessor, decomposeCycles, MAX_REGISTER_LENGTH } from './lib/components';
export { parseExpression, compileExpression } from './lib/expressions';
export { listExamples, getExample } from './lib/feedback';
export { getDistribution } from './lib/statistics';
export { renderReport, writeReport } from './lib/Report';
export { formatState, formatCycle, renderDistributionTable } from './lib/utils';

// PUBLIC FUNCTIONS
// ================================================================================================
export function instantiate(options: AnalysisOptions, logger?: Logger | null): Nfsr {
    if (logger === null) {
        logger = noopLogger;
    }
    else if (logger === undefined) {
        logger = new ConsoleLogger();
    }

    const config = parseAnalysisConfig(options);
    return new Nfsr(config, logger);
}
