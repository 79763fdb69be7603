/**
 * Property-kind and datatype detection
 *
 * Pure reads over the store used to decide between the object and data
 * variants of a construct.
 */

import type { TripleStore } from '../store/tripleStore.js';
import type { ObjectTerm } from '../types/rdf.js';
import { iri } from '../model/terms.js';
import { BUILTIN_ANNOTATION_PROPERTIES, BUILTIN_DATATYPES, CHARACTERISTIC_TYPES, OWL, RDF, RDFS, XSD_NS } from '../vocab/index.js';

export type PropertyKind = 'object' | 'data' | 'annotation';

/**
 * Kind of a property IRI as declared in the graph, or undefined when
 * nothing in the graph says.
 */
export function declaredPropertyKind(store: TripleStore, propertyIri: string): PropertyKind | undefined {
    const node = iri(propertyIri);
    if (store.has(node, RDF.type, iri(OWL.DatatypeProperty))) return 'data';
    if (store.has(node, RDF.type, iri(OWL.ObjectProperty))) return 'object';
    if (store.has(node, RDF.type, iri(OWL.AnnotationProperty))) return 'annotation';
    if (BUILTIN_ANNOTATION_PROPERTIES.has(propertyIri)) return 'annotation';
    for (const characteristic of CHARACTERISTIC_TYPES.keys()) {
        // Functional is shared with data properties, so it says nothing here
        if (characteristic === OWL.FunctionalProperty) continue;
        if (store.has(node, RDF.type, iri(characteristic))) return 'object';
    }
    if (store.has(node, OWL.inverseOf) || store.subjects(OWL.inverseOf, node).length > 0) return 'object';
    if (store.has(node, OWL.propertyChainAxiom)) return 'object';
    return undefined;
}

/**
 * True when the term denotes a datatype or a data range.
 */
export function isDatatypeTerm(store: TripleStore, term: ObjectTerm): boolean {
    switch (term.type) {
        case 'literal':
            return false;
        case 'iri':
            return term.value.startsWith(XSD_NS)
                || BUILTIN_DATATYPES.has(term.value)
                || store.has(term, RDF.type, iri(RDFS.Datatype));
        case 'blank':
            return store.has(term, RDF.type, iri(RDFS.Datatype))
                || store.has(term, OWL.onDatatype)
                || store.has(term, OWL.datatypeComplementOf);
    }
}
