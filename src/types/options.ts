import type { TranslationDiagnostic } from './errors.js';

export interface TranslateOptions {
    /** Translate anonymous class expressions that no axiom refers to. */
    translateOrphans?: boolean;
    /** Longest RDF list accepted before the list is reported as malformed. */
    maxListLength?: number;
    /** Called for every diagnostic as soon as it is recorded. */
    onDiagnostic?: (diagnostic: TranslationDiagnostic) => void;
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current phase.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export type ResiduePolicy = 'ignore' | 'warn' | 'error';
export type OutputFormat = 'json' | 'summary';

export const DEFAULTS = {
    translateOrphans: true,
    maxListLength: 10000,
    residuePolicy: 'warn',
    format: 'summary',
} as const;
