/**
 * RDF collection reader
 */

import type { TripleStore } from '../store/tripleStore.js';
import type { ObjectTerm, Triple } from '../types/rdf.js';
import type { TranslationContext } from './context.js';
import { iri, termKey } from '../model/terms.js';
import { createMalformedError } from '../types/errors.js';
import { RDF } from '../vocab/index.js';

export interface RdfList {
    items: ObjectTerm[];
    /** Every triple that makes up the list structure. */
    triples: Triple[];
}

export function isListNode(term: ObjectTerm, store: TripleStore): boolean {
    if (term.type === 'iri') return term.value === RDF.nil;
    return term.type === 'blank' && store.has(term, RDF.first);
}

/**
 * Walk rdf:first / rdf:rest from `head` to rdf:nil.
 * Reading is a pure operation; the caller consumes `triples` on success.
 */
export function readList(head: ObjectTerm, ctx: TranslationContext): RdfList {
    const { store } = ctx;
    const items: ObjectTerm[] = [];
    const triples: Triple[] = [];
    const visited = new Set<string>();
    let cell = head;

    while (!(cell.type === 'iri' && cell.value === RDF.nil)) {
        const key = termKey(cell);
        if (cell.type !== 'blank') {
            throw createMalformedError(`List cell ${key} is not a blank node`, key, RDF.rest);
        }
        if (visited.has(key)) {
            throw createMalformedError(`List starting at ${termKey(head)} loops back to ${key}`, termKey(head), RDF.rest);
        }
        if (items.length >= ctx.options.maxListLength) {
            throw createMalformedError(
                `List starting at ${termKey(head)} is longer than ${ctx.options.maxListLength} items`,
                termKey(head),
                RDF.rest,
                { maxListLength: ctx.options.maxListLength }
            );
        }
        visited.add(key);

        const first = store.singletonTriple(cell, RDF.first);
        const rest = store.singletonTriple(cell, RDF.rest);
        items.push(first.object);
        triples.push(first, rest, ...store.match({ subject: cell, predicate: RDF.type, object: iri(RDF.List) }));
        cell = rest.object;
    }

    return { items, triples };
}
