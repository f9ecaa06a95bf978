// CLASS DEFINITION
// ================================================================================================
export class NfsrError extends Error {

    constructor(message: string, cause?: unknown) {
        if (cause === undefined) {
            super(message);
        }
        else {
            super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`);
        }
        this.name = 'NfsrError';
    }

}
