/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { blank, iri, literal, triple } from '../src/model/terms.js';
import type { BlankNode, IriNode, NodeRef, ObjectTerm, Triple } from '../src/types/rdf.js';
import { TranslationException, type TranslationDiagnostic, type TranslationErrorCode } from '../src/types/errors.js';
import type { Axiom, AxiomType } from '../src/types/model.js';
import { OWL, RDF, RDFS, XSD } from '../src/vocab/index.js';

export const EX = 'http://example.org/';

/** Named node in the example namespace */
export function ex(local: string): IriNode {
    return iri(`${EX}${local}`);
}

/** IRI string in the example namespace, for predicates */
export function exIri(local: string): string {
    return `${EX}${local}`;
}

export function b(label: string): BlankNode {
    return blank(label);
}

export function str(value: string): ObjectTerm {
    return literal(value);
}

export function int(value: number): ObjectTerm {
    return literal(String(value), XSD.nonNegativeInteger);
}

export function typed(subject: NodeRef, type: string): Triple {
    return triple(subject, RDF.type, iri(type));
}

/**
 * RDF list whose cells are labelled `${prefix}0`, `${prefix}1`, ...
 */
export function list(prefix: string, items: ObjectTerm[]): { head: ObjectTerm; triples: Triple[] } {
    if (items.length === 0) {
        return { head: iri(RDF.nil), triples: [] };
    }
    const triples: Triple[] = [];
    items.forEach((item, i) => {
        const cell = blank(`${prefix}${i}`);
        const next = i + 1 < items.length ? blank(`${prefix}${i + 1}`) : iri(RDF.nil);
        triples.push(triple(cell, RDF.first, item), triple(cell, RDF.rest, next));
    });
    return { head: blank(`${prefix}0`), triples };
}

/**
 * `_:node a owl:Restriction; owl:onProperty property; predicate filler`
 */
export function restriction(node: BlankNode, property: NodeRef, predicate: string, filler: ObjectTerm): Triple[] {
    return [
        typed(node, OWL.Restriction),
        triple(node, OWL.onProperty, property),
        triple(node, predicate, filler),
    ];
}

/**
 * A chain of `depth` someValuesFrom restrictions whose last filler is the first node.
 */
export function cyclicChain(depth: number): Triple[] {
    const triples: Triple[] = [];
    for (let i = 0; i < depth; i++) {
        const next = b(`c${(i + 1) % depth}`);
        triples.push(...restriction(b(`c${i}`), ex('p'), OWL.someValuesFrom, next));
    }
    return triples;
}

/**
 * Deterministic Fisher-Yates shuffle; seed must be positive
 */
export function shuffle<T>(items: T[], seed: number): T[] {
    const copy = [...items];
    let state = seed;
    for (let i = copy.length - 1; i > 0; i--) {
        state = (state * 16807) % 2147483647;
        const j = state % (i + 1);
        [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
}

export function codes(diagnostics: TranslationDiagnostic[]): TranslationErrorCode[] {
    return diagnostics.map(d => d.code);
}

export function withCode(diagnostics: TranslationDiagnostic[], code: TranslationErrorCode): TranslationDiagnostic[] {
    return diagnostics.filter(d => d.code === code);
}

export function axiomsOfType<T extends AxiomType>(axioms: Axiom[], type: T): Extract<Axiom, { type: T }>[] {
    return axioms.filter((axiom): axiom is Extract<Axiom, { type: T }> => axiom.type === type);
}

/**
 * Diagnostic carried by the TranslationException `fn` throws
 */
export function thrownDiagnostic(fn: () => unknown): TranslationDiagnostic {
    try {
        fn();
    } catch (e) {
        if (e instanceof TranslationException) {
            return e.diagnostic;
        }
        throw e;
    }
    throw new Error('Expected a TranslationException');
}

// === Common graphs ===

/**
 * Pizza-style ontology exercising declarations, class axioms, property
 * axioms and assertions.
 */
export function pizzaGraph(): Triple[] {
    const toppings = list('l', [ex('Mozzarella'), ex('Tomato')]);
    return [
        typed(ex('pizza'), OWL.Ontology),
        typed(ex('Pizza'), OWL.Class),
        typed(ex('Topping'), OWL.Class),
        typed(ex('Margherita'), OWL.Class),
        typed(ex('hasTopping'), OWL.ObjectProperty),
        typed(ex('hasTopping'), OWL.TransitiveProperty),
        typed(ex('price'), OWL.DatatypeProperty),
        triple(ex('Margherita'), RDFS.subClassOf, ex('Pizza')),
        triple(ex('Margherita'), RDFS.subClassOf, b('r')),
        ...restriction(b('r'), ex('hasTopping'), OWL.someValuesFrom, b('u')),
        triple(b('u'), OWL.unionOf, toppings.head),
        ...toppings.triples,
        triple(ex('hasTopping'), RDFS.domain, ex('Pizza')),
        triple(ex('price'), RDFS.range, iri(XSD.integer)),
        triple(ex('m1'), RDF.type, ex('Margherita')),
        triple(ex('m1'), exIri('price'), literal('9', XSD.integer)),
        triple(ex('Pizza'), RDFS.label, literal('Pizza', RDF.langString, 'en')),
    ];
}
