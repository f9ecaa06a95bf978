// IMPORTS
// ================================================================================================
import { Command, InvalidArgumentError } from 'commander';
import type { AnalysisOptions, FeedbackSource } from 'nfsr-cycles';
import { instantiate, listExamples, getDistribution, formatCycle, renderDistributionTable } from '../index';

// INTERFACES
// ================================================================================================
interface AnalyzeOptions {
    length?     : number;
    example?    : string;
    expression? : string;
    output?     : string;
    maxLength?  : number;
    show        : number;
    quiet?      : boolean;
}

// MODULE VARIABLES
// ================================================================================================
const DEFAULT_EXAMPLE = 'Example Nonlinear';
const DEFAULT_SHOWN_CYCLES = 10;

// PUBLIC FUNCTIONS
// ================================================================================================
export function createProgram(): Command {
    const program = new Command();

    program
        .name('nfsr-cycles')
        .description('Decompose the state space of a nonlinear feedback shift register into cycles.')
        .version('0.1.0')
        .addHelpText('after', `
Examples:
  $ nfsr-cycles analyze -e "Grain Stream Cipher"
  $ nfsr-cycles analyze -n 4 -x "x[0] ^ x[1] ^ (x[2] & x[3])" -o cycles.txt
  $ nfsr-cycles examples`);

    program
        .command('analyze')
        .description('Find every cycle of the register and print the cycle length distribution')
        .option('-n, --length <n>', 'Register length; defaults to the recommended length of the example', parsePositiveInteger)
        .option('-e, --example <name>', `Feedback function from the example library (default: "${DEFAULT_EXAMPLE}")`)
        .option('-x, --expression <expr>', 'Custom feedback expression over x[0] ... x[n-1] using & | ^ ~ (or AND OR XOR NOT)')
        .option('-o, --output <path>', 'Write the full list of cycles to a file')
        .option('--max-length <n>', 'Largest register length to accept', parsePositiveInteger)
        .option('--show <k>', 'Number of cycles to print for each cycle length', parsePositiveInteger, DEFAULT_SHOWN_CYCLES)
        .option('-q, --quiet', 'Suppress timing output')
        .action((options: AnalyzeOptions) => runCommand(() => analyze(options)));

    program
        .command('examples')
        .description('List the example feedback functions')
        .action(() => runCommand(printExamples));

    return program;
}

// COMMANDS
// ================================================================================================
function analyze(options: AnalyzeOptions) {
    if (options.example !== undefined && options.expression !== undefined) {
        throw new InvalidArgumentError('Options --example and --expression cannot be used together');
    }

    const feedback: FeedbackSource = (options.expression !== undefined)
        ? { type: 'expression', expression: options.expression }
        : { type: 'example', name: options.example ?? DEFAULT_EXAMPLE };

    const analysisOptions: AnalysisOptions = {
        registerLength      : options.length,
        feedback            : feedback,
        maxRegisterLength   : options.maxLength
    };

    const nfsr = instantiate(analysisOptions, options.quiet ? null : undefined);
    const decomposition = nfsr.findCycles();
    const distribution = getDistribution(decomposition);
    const n = nfsr.registerLength;

    console.log(`Feedback: ${nfsr.feedbackLabel}`);
    console.log(`Register length: ${n} (${nfsr.stateCount} states)`);
    for (let entry of distribution.entries) {
        const cycles = decomposition.cycles.get(entry.length) ?? [];
        console.log(`Cycles of length ${entry.length} (${entry.count}):`);
        for (let cycle of cycles.slice(0, options.show)) {
            console.log(`  ${formatCycle(cycle, n)}`);
        }
        if (cycles.length > options.show) {
            console.log(`  ... ${cycles.length - options.show} more`);
        }
    }
    console.log(renderDistributionTable(distribution));
    console.log(`Tail states: ${distribution.tailStateCount}`);

    if (options.output) {
        nfsr.writeReport(options.output, decomposition);
    }
}

function printExamples() {
    for (let example of listExamples()) {
        console.log(`${example.name} (recommended length ${example.recommendedLength})`);
        console.log(`  ${example.description}`);
        if (example.expression) {
            console.log(`  ${example.expression}`);
        }
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function runCommand(command: () => void) {
    try {
        command();
    }
    catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}

function parsePositiveInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer');
    }
    return parsed;
}
