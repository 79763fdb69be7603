/**
 * Result types for the translation engine
 */

import type { TranslationDiagnostic } from './errors.js';
import type { Axiom, AxiomType, ClassExpression, IRI } from './model.js';
import type { Triple } from './rdf.js';

/**
 * Ontology header found in the graph
 */
export interface OntologyHeader {
    iri?: IRI;
    versionIri?: IRI;
    imports: IRI[];
}

/**
 * Everything produced by one translation
 */
export interface TranslationResult {
    axioms: Axiom[];
    /** Anonymous class expressions translated without any axiom referring to them. */
    expressions: ClassExpression[];
    /** Triples no construct claimed, in canonical key order. */
    residue: Triple[];
    diagnostics: TranslationDiagnostic[];
    ontology: OntologyHeader;
}

/**
 * Per-type counts, for reporting
 */
export interface TranslationSummary {
    axiomCounts: Partial<Record<AxiomType, number>>;
    totalAxioms: number;
    expressions: number;
    residue: number;
    diagnostics: number;
}
