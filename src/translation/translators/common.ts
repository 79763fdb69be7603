/**
 * Shared pieces of the expression translators
 */

import type { TranslationContext } from '../context.js';
import type { BlankNode, NodeRef, ObjectTerm, Triple } from '../../types/rdf.js';
import { iri, termKey } from '../../model/terms.js';
import { createMalformedError, createUnsupportedError } from '../../types/errors.js';
import { OWL, RDF } from '../../vocab/index.js';
import { isListNode, readList } from '../lists.js';
import { declaredPropertyKind, isDatatypeTerm } from '../kinds.js';
import { describeTerm } from '../../utils/shortForm.js';

/**
 * One construct kind: a guard that claims a main node and a build step that
 * turns it into a model value.
 *
 * Guards are pure reads. Builds do every fallible step before consuming
 * anything, so a failed build leaves the node's triples untouched.
 */
export interface Translator<T> {
    readonly kind: string;
    guard(node: BlankNode, ctx: TranslationContext): boolean;
    build(node: BlankNode, ctx: TranslationContext): T;
}

/**
 * The `rdf:type` triples on a node that name one of the given types.
 */
export function typeTriples(node: NodeRef, ctx: TranslationContext, ...types: string[]): Triple[] {
    return types.flatMap(type => ctx.store.match({ subject: node, predicate: RDF.type, object: iri(type) }));
}

/**
 * Operands of an n-ary construct: an RDF list when the predicate has a
 * single list-valued object, otherwise one operand per repeated triple.
 */
export function readOperands(
    node: BlankNode,
    predicate: string,
    ctx: TranslationContext
): { terms: ObjectTerm[]; triples: Triple[] } {
    const triples = ctx.store.match({ subject: node, predicate });
    if (triples.length === 1 && isListNode(triples[0].object, ctx.store)) {
        const list = readList(triples[0].object, ctx);
        return { terms: list.items, triples: [triples[0], ...list.triples] };
    }
    return { terms: triples.map(t => t.object), triples };
}

/**
 * True when a restriction quantifies over a data property.
 */
export function isDataRestriction(node: BlankNode, ctx: TranslationContext): boolean {
    const { store } = ctx;
    for (const property of store.objects(node, OWL.onProperty)) {
        if (property.type === 'blank') return false;
        if (property.type === 'iri') {
            const kind = declaredPropertyKind(store, property.value);
            if (kind === 'data') return true;
            if (kind === 'object') return false;
        }
    }
    if (store.has(node, OWL.onDataRange)) return true;
    if (store.has(node, OWL.onClass)) return false;
    for (const predicate of [OWL.someValuesFrom, OWL.allValuesFrom]) {
        if (store.objects(node, predicate).some(filler => isDatatypeTerm(store, filler))) return true;
    }
    return store.objects(node, OWL.hasValue).some(value => value.type === 'literal');
}

/**
 * Parse a cardinality triple's object as a non-negative integer. A valid
 * integer past the safe range is unsupported rather than malformed.
 */
export function parseCardinality(t: Triple): number {
    const { object } = t;
    if (object.type !== 'literal' || !/^\+?\d+$/.test(object.value.trim())) {
        throw createMalformedError(
            `Cardinality on ${termKey(t.subject)} must be a non-negative integer literal, got ${termKey(object)}`,
            termKey(t.subject),
            t.predicate
        );
    }
    const value = Number.parseInt(object.value.trim(), 10);
    if (!Number.isSafeInteger(value)) {
        throw createUnsupportedError(
            `Cardinality ${object.value.trim()} on ${termKey(t.subject)} is too large to represent`,
            termKey(t.subject),
            t.predicate,
            { max: Number.MAX_SAFE_INTEGER }
        );
    }
    return value;
}

/**
 * Resolve every operand on its own. A failing operand is dropped and
 * reported once, as an unsupported operand carrying its own diagnostics as
 * causes. The construct fails only when no operand is left.
 */
export function resolveEach<T>(
    node: BlankNode,
    predicate: string,
    terms: ObjectTerm[],
    ctx: TranslationContext,
    resolve: (term: ObjectTerm) => T | undefined
): T[] {
    if (terms.length === 0) {
        throw createMalformedError(`<${predicate}> on ${termKey(node)} has no operands`, termKey(node), predicate);
    }
    const resolved: T[] = [];
    for (const term of terms) {
        const { value, diagnostics } = ctx.collect(() => resolve(term));
        if (value === undefined) {
            ctx.report(createUnsupportedError(
                `Operand ${describeTerm(term)} of <${predicate}> on ${termKey(node)} could not be translated`,
                termKey(term),
                predicate,
                { parent: termKey(node), causes: diagnostics }
            ).diagnostic);
            continue;
        }
        diagnostics.forEach(d => ctx.report(d));
        resolved.push(value);
    }
    if (resolved.length === 0) {
        throw createUnsupportedError(
            `None of the ${terms.length} operand(s) of <${predicate}> on ${termKey(node)} could be translated`,
            termKey(node),
            predicate
        );
    }
    return resolved;
}
