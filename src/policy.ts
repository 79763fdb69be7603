/**
 * Residue policy
 *
 * The engine always returns its residue; whether leftover triples are
 * acceptable is decided here, by the caller's policy.
 */

import chalk from 'chalk';
import { createResidueDiagnostic, createResidueRejectedError } from './types/errors.js';
import type { ResiduePolicy } from './types/options.js';
import type { TranslationResult } from './types/responses.js';
import { formatTriple } from './utils/formatting.js';

/** Residue triples echoed by the warn policy before the rest are elided. */
export const MAX_WARNED_TRIPLES = 5;

export function applyResiduePolicy(result: TranslationResult, policy: ResiduePolicy): void {
    const count = result.residue.length;
    if (count === 0 || policy === 'ignore') {
        return;
    }
    if (policy === 'error') {
        throw createResidueRejectedError(count);
    }

    console.warn(chalk.yellow(`⚠ ${createResidueDiagnostic(count).message}`));
    for (const t of result.residue.slice(0, MAX_WARNED_TRIPLES)) {
        console.warn(chalk.dim(`  ${formatTriple(t)}`));
    }
    if (count > MAX_WARNED_TRIPLES) {
        console.warn(chalk.dim(`  ... and ${count - MAX_WARNED_TRIPLES} more`));
    }
}
