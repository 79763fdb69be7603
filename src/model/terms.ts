/**
 * RDF term constructors and canonical keys
 *
 * A term's key is its stable identifier: the store, the memoization caches
 * and the consumption flags are all keyed by it.
 */

import type { BlankNode, IriNode, LiteralNode, NodeRef, ObjectTerm, Triple } from '../types/rdf.js';
import { XSD } from '../vocab/index.js';

export function iri(value: string): IriNode {
    return { type: 'iri', value };
}

export function blank(value: string): BlankNode {
    return { type: 'blank', value };
}

export function literal(value: string, datatype: string = XSD.string, language?: string): LiteralNode {
    return language !== undefined
        ? { type: 'literal', value, datatype, language }
        : { type: 'literal', value, datatype };
}

export function triple(subject: NodeRef, predicate: string, object: ObjectTerm): Triple {
    return { subject, predicate, object };
}

export function isBlank(term: ObjectTerm): term is BlankNode {
    return term.type === 'blank';
}

export function isIri(term: ObjectTerm): term is IriNode {
    return term.type === 'iri';
}

export function isLiteral(term: ObjectTerm): term is LiteralNode {
    return term.type === 'literal';
}

export function termKey(term: ObjectTerm): string {
    switch (term.type) {
        case 'iri':
            return `<${term.value}>`;
        case 'blank':
            return `_:${term.value}`;
        case 'literal': {
            const lexical = JSON.stringify(term.value);
            return term.language ? `${lexical}@${term.language}` : `${lexical}^^<${term.datatype}>`;
        }
    }
}

export function tripleKey(t: Triple): string {
    return `${termKey(t.subject)} <${t.predicate}> ${termKey(t.object)}`;
}

export function termEquals(a: ObjectTerm, b: ObjectTerm): boolean {
    return termKey(a) === termKey(b);
}
