/**
 * Node Resolver
 *
 * Turns graph nodes into model values. Named nodes are terminal; anonymous
 * nodes are handed to the dispatcher once and memoized, so every reference to
 * the same blank node receives the same object. A cache entry keeps the
 * triples its translation consumed, so a later hit can claim them again after
 * an enclosing failure released them. A blank node re-entered in the same
 * category while its own translation is still running is a cycle.
 */

import type { TranslationContext } from './context.js';
import type {
    ClassExpression,
    DataRange,
    Individual,
    Literal,
    NamedDataProperty,
    ObjectPropertyExpression,
} from '../types/model.js';
import type { BlankNode, ObjectTerm, Triple } from '../types/rdf.js';
import {
    createCyclicError,
    createInvariantViolation,
    createUnsupportedError,
    isLocalFailure,
} from '../types/errors.js';
import {
    createAnonymousIndividual,
    createDataProperty,
    createDatatype,
    createLiteral,
    createNamedClass,
    createNamedIndividual,
    createObjectProperty,
} from '../model/factory.js';
import { termKey } from '../model/terms.js';
import { describeTerm } from '../utils/shortForm.js';
import { dispatch, type DispatchCategory, type DispatchResult } from './dispatcher.js';
import { UnresolvedDependency } from './dependency.js';

export type NodeClass = 'named' | 'anonymous' | 'literal';

interface CacheEntry<T> {
    value: T;
    triples: Triple[];
}

type Caches = { [K in DispatchCategory]: Map<string, CacheEntry<DispatchResult[K]>> };

export class NodeResolver {
    private readonly caches: Caches = {
        classExpression: new Map(),
        dataRange: new Map(),
        propertyExpression: new Map(),
    };
    private readonly individuals = new Map<string, Individual>();
    private readonly inProgress = new Set<string>();
    private readonly failed = new Set<string>();

    constructor(private readonly ctx: TranslationContext) {}

    classify(term: ObjectTerm): NodeClass {
        switch (term.type) {
            case 'iri':
                return 'named';
            case 'blank':
                return 'anonymous';
            case 'literal':
                return 'literal';
        }
    }

    resolveClassExpression(term: ObjectTerm): ClassExpression | undefined {
        switch (term.type) {
            case 'iri':
                return createNamedClass(term.value);
            case 'blank':
                return this.memoize('classExpression', term);
            case 'literal':
                return this.reject(term, 'class expression');
        }
    }

    resolveDataRange(term: ObjectTerm): DataRange | undefined {
        switch (term.type) {
            case 'iri':
                return createDatatype(term.value);
            case 'blank':
                return this.memoize('dataRange', term);
            case 'literal':
                return this.reject(term, 'data range');
        }
    }

    resolveObjectProperty(term: ObjectTerm): ObjectPropertyExpression | undefined {
        switch (term.type) {
            case 'iri':
                return createObjectProperty(term.value);
            case 'blank':
                return this.memoize('propertyExpression', term);
            case 'literal':
                return this.reject(term, 'object property');
        }
    }

    resolveDataProperty(term: ObjectTerm): NamedDataProperty | undefined {
        if (term.type === 'iri') {
            return createDataProperty(term.value);
        }
        return this.reject(term, 'data property');
    }

    resolveIndividual(term: ObjectTerm): Individual | undefined {
        switch (term.type) {
            case 'iri':
                return createNamedIndividual(term.value);
            case 'blank': {
                const key = termKey(term);
                let individual = this.individuals.get(key);
                if (!individual) {
                    individual = createAnonymousIndividual(term.value);
                    this.individuals.set(key, individual);
                }
                return individual;
            }
            case 'literal':
                return this.reject(term, 'individual');
        }
    }

    resolveLiteral(term: ObjectTerm): Literal | undefined {
        if (term.type === 'literal') {
            return createLiteral(term);
        }
        return this.reject(term, 'literal');
    }

    /**
     * Cached translation of a blank node, if it has been translated.
     */
    cached<K extends DispatchCategory>(category: K, node: BlankNode): DispatchResult[K] | undefined {
        const cache: Map<string, CacheEntry<DispatchResult[K]>> = this.caches[category];
        return cache.get(termKey(node))?.value;
    }

    hasFailed(category: DispatchCategory, node: BlankNode): boolean {
        return this.failed.has(`${category} ${termKey(node)}`);
    }

    private memoize<K extends DispatchCategory>(category: K, node: BlankNode): DispatchResult[K] | undefined {
        const key = termKey(node);
        const slot = `${category} ${key}`;
        const cache: Map<string, CacheEntry<DispatchResult[K]>> = this.caches[category];

        const hit = cache.get(key);
        if (hit !== undefined) {
            if (this.inProgress.has(slot)) {
                throw createInvariantViolation(`${key} is both cached and in progress`, { category });
            }
            this.ctx.consume(hit.triples);
            return hit.value;
        }
        if (this.failed.has(slot)) {
            return undefined;
        }
        if (this.inProgress.has(slot)) {
            throw createCyclicError(key);
        }

        this.inProgress.add(slot);
        try {
            const { value, triples } = this.ctx.transaction(() => dispatch(category, node, this.ctx));
            if (cache.has(key)) {
                throw createInvariantViolation(`${key} was translated twice`, { category });
            }
            cache.set(key, { value, triples });
            return value;
        } catch (e) {
            if (e instanceof UnresolvedDependency) {
                this.failed.add(slot);
                return undefined;
            }
            if (!isLocalFailure(e)) {
                throw e;
            }
            this.failed.add(slot);
            // A cycle is reported once, by the node it closes on; the nodes
            // between that node and the re-entry fail with it.
            if (e.code === 'CYCLIC_CONSTRUCT' && e.diagnostic.node !== key) {
                throw e;
            }
            this.ctx.report(e.diagnostic);
            return undefined;
        } finally {
            this.inProgress.delete(slot);
        }
    }

    private reject(term: ObjectTerm, expected: string): undefined {
        this.ctx.report(createUnsupportedError(
            `${describeTerm(term)} cannot be used as ${/^[aeiou]/.test(expected) ? 'an' : 'a'} ${expected}`,
            termKey(term),
            undefined,
            { expected }
        ).diagnostic);
        return undefined;
    }
}
