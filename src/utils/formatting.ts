/**
 * Formatting utilities
 */
import type { TranslationDiagnostic } from '../types/errors.js';
import type { TranslationResult, TranslationSummary } from '../types/responses.js';
import type { AxiomType } from '../types/model.js';
import type { Triple } from '../types/rdf.js';
import { tripleKey } from '../model/terms.js';

/**
 * Format a triple as an N-Triples line
 */
export function formatTriple(t: Triple): string {
    return `${tripleKey(t)} .`;
}

/**
 * Format a diagnostic as a single line
 */
export function formatDiagnostic(diagnostic: TranslationDiagnostic): string {
    const where = [diagnostic.node, diagnostic.predicate && `<${diagnostic.predicate}>`].filter(Boolean).join(' ');
    return where ? `[${diagnostic.code}] ${where}: ${diagnostic.message}` : `[${diagnostic.code}] ${diagnostic.message}`;
}

/**
 * Count what a translation produced
 */
export function summarize(result: TranslationResult): TranslationSummary {
    const axiomCounts: Partial<Record<AxiomType, number>> = {};
    for (const axiom of result.axioms) {
        axiomCounts[axiom.type] = (axiomCounts[axiom.type] ?? 0) + 1;
    }
    return {
        axiomCounts,
        totalAxioms: result.axioms.length,
        expressions: result.expressions.length,
        residue: result.residue.length,
        diagnostics: result.diagnostics.length,
    };
}

/**
 * Format a summary as human-readable lines, axiom types in name order
 */
export function formatSummary(summary: TranslationSummary): string {
    const lines: string[] = [];
    lines.push(`Axioms: ${summary.totalAxioms}`);
    const entries = Object.entries(summary.axiomCounts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [type, count] of entries) {
        lines.push(`  ${type}: ${count ?? 0}`);
    }
    lines.push(`Orphan expressions: ${summary.expressions}`);
    lines.push(`Residue triples: ${summary.residue}`);
    lines.push(`Diagnostics: ${summary.diagnostics}`);
    return lines.join('\n');
}
