/**
 * Structured Error System for the translation engine
 *
 * Every problem found while translating a graph is described by a
 * machine-readable diagnostic with a code, the offending node and predicate,
 * and an optional suggestion.
 */

/**
 * Error codes for translation operations
 */
export type TranslationErrorCode =
    | 'MALFORMED_CONSTRUCT'    // Required triple missing or wrong arity/shape
    | 'UNSUPPORTED_CONSTRUCT'  // Recognizable shape that cannot be represented
    | 'CYCLIC_CONSTRUCT'       // Node re-entered while still in progress
    | 'RESIDUE_TRIPLES'        // Triples left unconsumed after a full pass
    | 'RESIDUE_REJECTED'       // Residue policy refused a non-empty residue
    | 'INVARIANT_VIOLATION'    // Engine bookkeeping disagrees with itself
    | 'LOAD_ERROR'             // Source document could not be split into triples
    | 'CONFIG_ERROR';          // Invalid configuration value

/**
 * Codes that stay attached to one node and never abort a translation.
 */
export const LOCAL_ERROR_CODES: ReadonlySet<TranslationErrorCode> = new Set<TranslationErrorCode>([
    'MALFORMED_CONSTRUCT',
    'UNSUPPORTED_CONSTRUCT',
    'CYCLIC_CONSTRUCT',
    'RESIDUE_TRIPLES',
]);

/**
 * Structured diagnostic with code, message, location and suggestion
 */
export interface TranslationDiagnostic {
    code: TranslationErrorCode;
    message: string;
    node?: string;             // Canonical key of the offending node
    predicate?: string;        // Predicate IRI involved, when known
    suggestion?: string;
    details?: Record<string, unknown>;
}

/**
 * Exception class wrapping a TranslationDiagnostic for throw/catch patterns
 */
export class TranslationException extends Error {
    public readonly diagnostic: TranslationDiagnostic;

    constructor(diagnostic: TranslationDiagnostic) {
        super(diagnostic.message);
        this.name = 'TranslationException';
        this.diagnostic = diagnostic;

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, TranslationException);
        }
    }

    get code(): TranslationErrorCode {
        return this.diagnostic.code;
    }

    toJSON(): TranslationDiagnostic {
        return this.diagnostic;
    }
}

/**
 * True for exceptions that are recorded as diagnostics instead of propagated.
 */
export function isLocalFailure(error: unknown): error is TranslationException {
    return error instanceof TranslationException && LOCAL_ERROR_CODES.has(error.code);
}

/**
 * Create a malformed-construct error
 */
export function createMalformedError(
    message: string,
    node?: string,
    predicate?: string,
    details?: Record<string, unknown>
): TranslationException {
    return new TranslationException({
        code: 'MALFORMED_CONSTRUCT',
        message,
        node,
        predicate,
        suggestion: 'Check that the construct carries each required triple exactly once',
        details,
    });
}

/**
 * Create an unsupported-construct error
 */
export function createUnsupportedError(
    message: string,
    node?: string,
    predicate?: string,
    details?: Record<string, unknown>
): TranslationException {
    return new TranslationException({
        code: 'UNSUPPORTED_CONSTRUCT',
        message,
        node,
        predicate,
        details,
    });
}

/**
 * Create a cyclic-construct error for the node that was re-entered
 */
export function createCyclicError(node: string): TranslationException {
    return new TranslationException({
        code: 'CYCLIC_CONSTRUCT',
        message: `Node ${node} refers back to itself while it is being translated`,
        node,
        suggestion: 'Anonymous expressions must form a tree; break the cycle with a named class',
    });
}

/**
 * Create the informational residue diagnostic
 */
export function createResidueDiagnostic(count: number): TranslationDiagnostic {
    return {
        code: 'RESIDUE_TRIPLES',
        message: `${count} triple${count === 1 ? '' : 's'} could not be assigned to any axiom`,
        details: { count },
    };
}

/**
 * Create the error raised when a residue policy rejects a translation
 */
export function createResidueRejectedError(count: number): TranslationException {
    return new TranslationException({
        code: 'RESIDUE_REJECTED',
        message: `Translation left ${count} unconsumed triple${count === 1 ? '' : 's'}`,
        suggestion: 'Inspect the residue, or relax the residue policy to warn or ignore',
        details: { count },
    });
}

/**
 * Create an invariant violation. These indicate a bug in the engine.
 */
export function createInvariantViolation(
    message: string,
    details?: Record<string, unknown>
): TranslationException {
    return new TranslationException({
        code: 'INVARIANT_VIOLATION',
        message: `Engine invariant violated: ${message}`,
        details,
    });
}

/**
 * Create a load error for documents that cannot be split into triples
 */
export function createLoadError(
    message: string,
    suggestion?: string,
    details?: Record<string, unknown>
): TranslationException {
    return new TranslationException({
        code: 'LOAD_ERROR',
        message,
        suggestion,
        details,
    });
}

/**
 * Create a configuration error
 */
export function createConfigError(
    message: string,
    details?: Record<string, unknown>
): TranslationException {
    return new TranslationException({
        code: 'CONFIG_ERROR',
        message: `Invalid configuration: ${message}`,
        details,
    });
}

/**
 * Serialize a diagnostic for JSON output, dropping absent fields
 */
export function serializeDiagnostic(diagnostic: TranslationDiagnostic): object {
    return {
        code: diagnostic.code,
        message: diagnostic.message,
        ...(diagnostic.node && { node: diagnostic.node }),
        ...(diagnostic.predicate && { predicate: diagnostic.predicate }),
        ...(diagnostic.suggestion && { suggestion: diagnostic.suggestion }),
        ...(diagnostic.details && { details: diagnostic.details }),
    };
}
