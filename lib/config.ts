// IMPORTS
// ================================================================================================
import type { AnalysisOptions, AnalysisConfig } from 'nfsr-cycles';
import { MAX_REGISTER_LENGTH } from './components';
import { compileExpression } from './expressions';
import { findExample, listExamples } from './feedback';

// MODULE VARIABLES
// ================================================================================================
// the classification table and the emitted cycles both grow as 2^n
export const DEFAULT_MAX_REGISTER_LENGTH = 20;

// PUBLIC FUNCTIONS
// ================================================================================================
export function parseAnalysisConfig(options: AnalysisOptions): AnalysisConfig {

    if (typeof options !== 'object' || options === null) throw new TypeError('Options parameter must be an object');

    // register length ceiling
    const maxRegisterLength = options.maxRegisterLength ?? DEFAULT_MAX_REGISTER_LENGTH;
    if (!Number.isInteger(maxRegisterLength) || maxRegisterLength < 1 || maxRegisterLength > MAX_REGISTER_LENGTH) {
        throw new TypeError(`Register length ceiling must be an integer between 1 and ${MAX_REGISTER_LENGTH}`);
    }

    // feedback source
    const source = options.feedback;
    if (typeof source !== 'object' || source === null) throw new TypeError('Feedback source must be provided');

    if (source.type === 'example') {
        const example = findExample(source.name);
        if (!example) {
            const names = listExamples().map(e => e.name).join(', ');
            throw new TypeError(`Feedback example '${source.name}' is not defined; available examples: ${names}`);
        }

        const registerLength = options.registerLength ?? example.recommendedLength;
        validateRegisterLength(registerLength, maxRegisterLength);
        if (!example.supports(registerLength)) {
            throw new TypeError(`${example.name} feedback does not support a ${registerLength}-bit register`);
        }

        return {
            registerLength  : registerLength,
            feedbackRule    : example.createRule(registerLength),
            feedbackLabel   : example.name
        };
    }
    else if (source.type === 'expression') {
        if (typeof source.expression !== 'string' || !source.expression.trim()) {
            throw new TypeError('Feedback expression must be a non-empty string');
        }

        const registerLength = options.registerLength;
        if (registerLength === undefined) {
            throw new TypeError('Register length must be provided for a custom feedback expression');
        }
        validateRegisterLength(registerLength, maxRegisterLength);

        return {
            registerLength  : registerLength,
            feedbackRule    : compileExpression(source.expression, registerLength),
            feedbackLabel   : source.expression.trim()
        };
    }
    else {
        throw new TypeError('Feedback source type must be either example or expression');
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function validateRegisterLength(registerLength: number, maxRegisterLength: number) {
    if (!Number.isInteger(registerLength) || registerLength < 1 || registerLength > maxRegisterLength) {
        throw new TypeError(`Register length must be an integer between 1 and ${maxRegisterLength}`);
    }
}
